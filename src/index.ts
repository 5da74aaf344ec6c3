import Fastify from 'fastify';
import pino from 'pino';

import {
  AlertDispatcher,
  EventStore,
  IngestionPipeline,
} from './application/index.js';

import {
  loadConfig,
  loadThreatFeed,
  MaxmindGeoResolver,
  EmailNotifier,
} from './infrastructure/index.js';

import { eventRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config
 * 2) Lookup structures (threat feed, geo database), loaded once
 * 3) Alerting + store + pipeline
 * 4) HTTP routes and shutdown hooks
 * 5) listen()
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

async function main(): Promise<void> {
  const config = loadConfig();

  log.info(
    {
      alerting: config.alerting,
      smtp_host: config.email.smtp_host,
      smtp_port: config.email.smtp_port,
      threat_feed: config.threat_feed.path,
      geoip: config.geoip.path,
    },
    'Config loaded',
  );

  // --------------------------------------------------
  // Lookup structures
  // --------------------------------------------------

  const threats = loadThreatFeed(config.threat_feed.path, log);
  const geo = await MaxmindGeoResolver.open(config.geoip.path, log);

  log.info(
    { threat_indicators: threats.size, geo_available: geo.available },
    'Lookup structures ready',
  );

  // --------------------------------------------------
  // Pipeline
  // --------------------------------------------------

  const dispatcher = new AlertDispatcher(
    new EmailNotifier(config.email, log.child({ component: 'email' })),
    log.child({ component: 'alert-dispatcher' }),
    {
      enabled: config.alerting.enabled,
      cooldownSeconds: config.alerting.cooldown_seconds,
    },
  );

  const pipeline = new IngestionPipeline({
    geo,
    threats,
    store: new EventStore(),
    alerts: dispatcher,
    log: log.child({ component: 'pipeline' }),
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = Fastify({ loggerInstance: log });

  await fastify.register(eventRoutes, { pipeline });

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    await dispatcher.drain();
    log.info('In-flight alerts settled');
  });

  const shutdown = (): void => {
    log.info('Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
