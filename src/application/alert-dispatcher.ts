import type { Logger } from 'pino';
import type { Notifier, SecurityEvent } from '../domain/index.js';
import { formatAlertMessage } from './alert-message.js';

/**
 * What `maybeDispatch()` decided for an event.
 *
 * - `disabled`   alerting is switched off
 * - `cooling`    a successful alert for the address is younger than the cooldown
 * - `pending`    an earlier send for the address has not settled yet; the
 *                event is held and retried if that send fails
 * - `dispatched` a send was scheduled
 */
export type DispatchOutcome = 'disabled' | 'cooling' | 'pending' | 'dispatched';

export interface AlertDispatcherOptions {
  readonly enabled: boolean;
  readonly cooldownSeconds: number;
  /** Clock function, injectable for tests. */
  readonly nowFn?: () => number;
}

/** Yields to the event loop so the send never runs on the caller's stack. */
function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Rate-limited, fire-and-forget alert dispatch.
 *
 * Maintains per-address state:
 * - Cooldown ledger: address → time (ms) of the last *successful* send.
 * - Pending map: address → in-flight send task.
 * - Deferred map: address → latest event that arrived while a send was
 *   in flight. Re-dispatched when that send fails, dropped when it
 *   succeeds (the cooldown then covers it).
 *
 * The decision in `maybeDispatch()` is synchronous and does no I/O.
 * The send itself runs in a separate task; only that task writes the
 * ledger, and only when the notifier reports success. A failed send
 * leaves the address eligible for the very next qualifying event.
 *
 * Both maps belong to this class alone and are only touched from
 * synchronous sections, so no two dispatch decisions can interleave.
 */
export class AlertDispatcher {
  private readonly ledger: Map<string, number> = new Map();
  private readonly pending: Map<string, Promise<void>> = new Map();
  private readonly deferred: Map<string, SecurityEvent> = new Map();
  private readonly enabled: boolean;
  private readonly cooldownMs: number;
  private readonly nowFn: () => number;

  constructor(
    private readonly notifier: Notifier,
    private readonly log: Logger,
    options: AlertDispatcherOptions,
  ) {
    this.enabled = options.enabled;
    this.cooldownMs = Math.max(options.cooldownSeconds, 0) * 1000;
    this.nowFn = options.nowFn ?? Date.now;
  }

  maybeDispatch(event: SecurityEvent): DispatchOutcome {
    if (!this.enabled) return 'disabled';

    const address = event.source_address;
    const now = this.nowFn();

    const lastSent = this.ledger.get(address);
    if (lastSent !== undefined && now - lastSent < this.cooldownMs) {
      this.log.info(
        { source_address: address, last_sent_seconds_ago: Math.floor((now - lastSent) / 1000) },
        'Alert suppressed (cooldown)',
      );
      return 'cooling';
    }

    if (this.pending.has(address)) {
      this.deferred.set(address, event);
      this.log.debug({ source_address: address }, 'Alert deferred (send in flight)');
      return 'pending';
    }

    const message = formatAlertMessage(event);
    let sent = false;

    const task = yieldToEventLoop()
      .then(() => this.notifier.send(message.subject, message.body))
      .then((ok) => {
        sent = ok;
        if (ok) {
          this.ledger.set(address, this.nowFn());
          this.log.info({ source_address: address, event_id: event.event_id }, 'Alert sent');
        } else {
          this.log.warn({ source_address: address, event_id: event.event_id }, 'Alert send failed');
        }
      })
      .catch((err: unknown) => {
        this.log.error({ err, source_address: address }, 'Alert notifier threw');
      })
      .finally(() => {
        this.pending.delete(address);

        const followUp = this.deferred.get(address);
        this.deferred.delete(address);
        if (followUp !== undefined && !sent) {
          this.maybeDispatch(followUp);
        }
      });

    this.pending.set(address, task);
    return 'dispatched';
  }

  /** Resolves once every send scheduled so far has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending.values()]);
    }
  }

  /** Time (ms) of the last successful alert for an address, if any. */
  lastSentAt(address: string): number | undefined {
    return this.ledger.get(address);
  }

  /** For testing — number of sends in flight. */
  get pendingCount(): number {
    return this.pending.size;
  }
}
