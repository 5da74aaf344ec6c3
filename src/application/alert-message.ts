import type { SecurityEvent } from '../domain/index.js';

export interface AlertMessage {
  readonly subject: string;
  readonly body: string;
}

/** Builds the plain-text notification sent for a threat event. */
export function formatAlertMessage(event: SecurityEvent): AlertMessage {
  const address = event.source_address;

  return {
    subject: `Security Alert: Suspicious IP ${address}`,
    body: [
      'Suspicious event detected',
      '',
      `Timestamp: ${event.timestamp}`,
      `IP: ${address}`,
      `Event: ${event.description}`,
      `Country: ${event.country}`,
      `City: ${event.city}`,
      '',
      'This is an automated alert from your security event monitor.',
    ].join('\n'),
  };
}
