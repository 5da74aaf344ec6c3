import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { eventRoutes } from '../../src/interfaces/http/index.js';
import { AlertDispatcher, EventStore, IngestionPipeline } from '../../src/application/index.js';
import { ThreatIndex } from '../../src/infrastructure/threat-feed/threat-index.js';
import { UNKNOWN_GEO } from '../../src/domain/index.js';
import { fakeLogger, makeClock } from '../helpers.js';

const THREAT = '185.60.216.35';

describe('event routes', () => {
  let app: FastifyInstance;
  let send: Mock;
  let dispatcher: AlertDispatcher;

  beforeEach(async () => {
    const clock = makeClock();
    send = vi.fn().mockResolvedValue(true);
    dispatcher = new AlertDispatcher({ send }, fakeLogger(), {
      enabled: true,
      cooldownSeconds: 600,
      nowFn: clock.fn,
    });
    const pipeline = new IngestionPipeline({
      geo: { resolve: () => UNKNOWN_GEO },
      threats: new ThreatIndex([THREAT]),
      store: new EventStore(),
      alerts: dispatcher,
      log: fakeLogger(),
      nowFn: clock.fn,
    });

    app = Fastify();
    await app.register(eventRoutes, { pipeline });
    await app.ready();
  });

  afterEach(async () => {
    await dispatcher.drain();
    await app.close();
  });

  function postEvent(payload: Record<string, unknown>) {
    return app.inject({ method: 'POST', url: '/api/v1/events', payload });
  }

  it('POST records a threat event and returns it', async () => {
    const res = await postEvent({ description: 'port scan', source_ip: ` ${THREAT} ` });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({
      source_address: THREAT,
      description: 'port scan',
      country: 'Unknown',
      city: 'Unknown',
      latitude: null,
      longitude: null,
      is_threat: true,
      timestamp: '2026-02-18T12:00:00Z',
    });

    await dispatcher.drain();
    expect(send).toHaveBeenCalledOnce();
  });

  it('POST records a benign event without alerting', async () => {
    const res = await postEvent({ description: 'login ok', source_ip: '8.8.8.8' });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({ is_threat: false });

    await dispatcher.drain();
    expect(send).not.toHaveBeenCalled();
  });

  it('POST rejects a missing source_ip with 400', async () => {
    const res = await postEvent({ description: 'port scan' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'Validation failed' });
  });

  it('POST rejects a blank description with 400', async () => {
    const res = await postEvent({ description: '   ', source_ip: '8.8.8.8' });
    expect(res.statusCode).toBe(400);
  });

  it('GET lists all events and threats separately', async () => {
    await postEvent({ description: 'port scan', source_ip: THREAT });
    await postEvent({ description: 'login ok', source_ip: '8.8.8.8' });

    const all = await app.inject({ method: 'GET', url: '/api/v1/events' });
    const threats = await app.inject({ method: 'GET', url: '/api/v1/events/threats' });
    const summary = await app.inject({ method: 'GET', url: '/api/v1/events/summary' });

    expect(all.json().count).toBe(2);
    expect(all.json().data.map((e: { description: string }) => e.description)).toEqual(['port scan', 'login ok']);
    expect(threats.json().count).toBe(1);
    expect(threats.json().data[0].source_address).toBe(THREAT);
    expect(summary.json()).toEqual({ total: 2, suspicious: 1 });
  });

  it('GET export.csv downloads threat events as CSV', async () => {
    await postEvent({ description: 'port scan', source_ip: THREAT });
    await postEvent({ description: 'login ok', source_ip: '8.8.8.8' });

    const res = await app.inject({ method: 'GET', url: '/api/v1/events/export.csv' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="suspicious_events.csv"');
    expect(res.body).toBe(
      'Timestamp,Source IP,Event,Country,City,Status\r\n' +
        '2026-02-18T12:00:00Z,185.60.216.35,port scan,Unknown,Unknown,Suspicious\r\n',
    );
  });
});
