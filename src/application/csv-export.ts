import type { SecurityEvent } from '../domain/index.js';

const HEADER = ['Timestamp', 'Source IP', 'Event', 'Country', 'City', 'Status'] as const;
const STATUS = 'Suspicious';
const EOL = '\r\n';

/** Quotes a field when it contains a separator, a quote or a line break (RFC 4180). */
function csvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function csvRow(fields: readonly string[]): string {
  return fields.map(csvField).join(',') + EOL;
}

/**
 * Renders events as CSV bytes.
 *
 * Export is only offered over threat events, so every row carries the
 * `Suspicious` status.
 */
export function exportCsv(events: readonly SecurityEvent[]): Buffer {
  let out = csvRow(HEADER);

  for (const e of events) {
    out += csvRow([e.timestamp, e.source_address, e.description, e.country, e.city, STATUS]);
  }

  return Buffer.from(out, 'utf-8');
}
