import { describe, it, expect } from 'vitest';
import { exportCsv } from '../../src/application/csv-export.js';
import { makeEvent } from '../helpers.js';

function lines(buf: Buffer): string[] {
  return buf.toString('utf-8').split('\r\n').slice(0, -1);
}

describe('exportCsv', () => {
  it('returns a Buffer', () => {
    expect(Buffer.isBuffer(exportCsv([]))).toBe(true);
  });

  it('writes only the header for an empty list', () => {
    expect(exportCsv([]).toString('utf-8')).toBe('Timestamp,Source IP,Event,Country,City,Status\r\n');
  });

  it('one threat event produces exactly two lines in column order', () => {
    const csv = exportCsv([
      makeEvent({
        timestamp: '2026-02-18T12:00:00Z',
        source_address: '185.60.216.35',
        description: 'port scan',
        country: 'Netherlands',
        city: 'Amsterdam',
      }),
    ]);

    expect(lines(csv)).toEqual([
      'Timestamp,Source IP,Event,Country,City,Status',
      '2026-02-18T12:00:00Z,185.60.216.35,port scan,Netherlands,Amsterdam,Suspicious',
    ]);
  });

  it('marks every row Suspicious, in input order', () => {
    const csv = exportCsv([
      makeEvent({ source_address: '10.0.0.1' }),
      makeEvent({ source_address: '10.0.0.2' }),
    ]);
    const rows = lines(csv).slice(1);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toBe('2026-02-18T12:00:00Z,10.0.0.1,Failed login attempt,Unknown,Unknown,Suspicious');
    expect(rows[1]).toBe('2026-02-18T12:00:00Z,10.0.0.2,Failed login attempt,Unknown,Unknown,Suspicious');
  });

  it('quotes fields containing commas and doubles embedded quotes', () => {
    const csv = exportCsv([
      makeEvent({ description: 'failed login, user "root"', city: 'Washington, D.C.' }),
    ]);

    expect(lines(csv)[1]).toBe(
      '2026-02-18T12:00:00Z,185.60.216.35,"failed login, user ""root""",Unknown,"Washington, D.C.",Suspicious',
    );
  });

  it('quotes fields containing line breaks', () => {
    const csv = exportCsv([makeEvent({ description: 'line one\nline two' })]);
    expect(csv.toString('utf-8')).toContain(',"line one\nline two",');
  });
});
