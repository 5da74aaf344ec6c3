import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ingestEventSchema, exportCsv } from '../../application/index.js';
import type { IngestionPipeline } from '../../application/index.js';

export interface EventRoutesOptions {
  pipeline: IngestionPipeline;
}

/**
 * Registers the event routes.
 *
 * POST /api/v1/events             — record one event
 * GET  /api/v1/events             — all events, oldest first
 * GET  /api/v1/events/threats     — threat events only
 * GET  /api/v1/events/summary     — total / suspicious counts
 * GET  /api/v1/events/export.csv  — threat events as a CSV download
 */
async function eventRoutes(fastify: FastifyInstance, opts: EventRoutesOptions): Promise<void> {
  const { pipeline } = opts;

  /**
   * Validates → ingests → returns the stored event.
   * Alert delivery happens in the background; the response never waits on it.
   */
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = ingestEventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = pipeline.ingest(parsed.data.description, parsed.data.source_ip);

      return reply.status(201).send(event);
    },
  );

  fastify.get(
    '/api/v1/events',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const data = pipeline.listEvents();
      return reply.status(200).send({ data, count: data.length });
    },
  );

  fastify.get(
    '/api/v1/events/threats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const data = pipeline.listThreats();
      return reply.status(200).send({ data, count: data.length });
    },
  );

  fastify.get(
    '/api/v1/events/summary',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(pipeline.summary());
    },
  );

  fastify.get(
    '/api/v1/events/export.csv',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const threats = pipeline.listThreats();

      fastify.log.debug({ rows: threats.length }, 'Exporting suspicious events');

      return reply
        .status(200)
        .type('text/csv; charset=utf-8')
        .header('content-disposition', 'attachment; filename="suspicious_events.csv"')
        .send(exportCsv(threats));
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  fastify: '5.x',
});
