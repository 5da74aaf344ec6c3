import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { GeoResolver, SecurityEvent, ThreatIndicatorSet } from '../domain/index.js';
import type { EventStore } from './event-store.js';
import type { DispatchOutcome } from './alert-dispatcher.js';

/** The part of AlertDispatcher the pipeline depends on. */
export interface AlertSink {
  maybeDispatch(event: SecurityEvent): DispatchOutcome;
}

export interface IngestionPipelineDeps {
  readonly geo: GeoResolver;
  readonly threats: ThreatIndicatorSet;
  readonly store: EventStore;
  readonly alerts: AlertSink;
  readonly log: Logger;
  /** Clock function, injectable for tests. */
  readonly nowFn?: () => number;
  readonly idFn?: () => string;
}

export interface EventSummary {
  readonly total: number;
  readonly suspicious: number;
}

/** Formats epoch ms as ISO-8601 UTC, truncated to whole seconds. */
export function toSecondTimestamp(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19) + 'Z';
}

/**
 * Single entry point for recording a security event.
 *
 * Pure orchestration:
 * 1. Stamps the event (id + second-resolution timestamp).
 * 2. Enriches it with geo origin.
 * 3. Classifies it against the threat indicator set.
 * 4. Stores it.
 * 5. Hands threats to the alert sink without waiting on delivery.
 *
 * Every step is synchronous and none of them can fail, so the caller
 * always gets the complete event back.
 */
export class IngestionPipeline {
  private readonly nowFn: () => number;
  private readonly idFn: () => string;

  constructor(private readonly deps: IngestionPipelineDeps) {
    this.nowFn = deps.nowFn ?? Date.now;
    this.idFn = deps.idFn ?? randomUUID;
  }

  ingest(description: string, sourceAddress: string): SecurityEvent {
    const timestamp = toSecondTimestamp(this.nowFn());
    const geo = this.deps.geo.resolve(sourceAddress);
    const isThreat = this.deps.threats.contains(sourceAddress);

    const event: SecurityEvent = Object.freeze({
      event_id: this.idFn(),
      timestamp,
      source_address: sourceAddress,
      description,
      country: geo.country,
      city: geo.city,
      latitude: geo.latitude,
      longitude: geo.longitude,
      is_threat: isThreat,
    });

    this.deps.store.append(event);

    if (isThreat) {
      this.deps.log.warn(
        { event_id: event.event_id, source_address: sourceAddress },
        'Threat indicator matched',
      );
      this.deps.alerts.maybeDispatch(event);
    }

    return event;
  }

  listEvents(): readonly SecurityEvent[] {
    return this.deps.store.all();
  }

  listThreats(): readonly SecurityEvent[] {
    return this.deps.store.threats();
  }

  /** Event counts for the dashboard banner. */
  summary(): EventSummary {
    return {
      total: this.deps.store.size,
      suspicious: this.deps.store.threats().length,
    };
  }
}
