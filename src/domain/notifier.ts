/**
 * Delivers an alert to the single configured recipient.
 *
 * Resolves `true` when the message was accepted for delivery and
 * `false` on any failure. Implementations should not reject, but
 * callers must tolerate it.
 */
export interface Notifier {
  send(subject: string, body: string): Promise<boolean>;
}
