import type { SecurityEvent } from '../domain/index.js';

/**
 * Append-only, insertion-ordered store for ingested events.
 *
 * Node.js runs every `append()` and every read to completion on the
 * event loop, so concurrent ingest requests can never interleave inside
 * one of them. Reads hand out a fresh copy: an append that lands after
 * a snapshot was taken is never visible in that snapshot.
 */
export class EventStore {
  private readonly events: SecurityEvent[] = [];

  /** Adds the event to the end of the collection. */
  append(event: SecurityEvent): void {
    this.events.push(event);
  }

  /** Point-in-time copy of all events, oldest first. */
  all(): readonly SecurityEvent[] {
    return this.events.slice();
  }

  /** Point-in-time copy of threat events only, oldest first. */
  threats(): readonly SecurityEvent[] {
    return this.events.filter((e) => e.is_threat);
  }

  get size(): number {
    return this.events.length;
  }
}
