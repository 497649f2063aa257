import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  EnvelopeValidationError,
  GateClosedError,
  getRecord,
  httpEnvelopeBatchSchema,
  listRecords,
  toEnvelopeInput,
  toEpochSeconds,
} from '../../application/index.js';

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for garbage.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Chronicle read and ingestion routes.
 *
 * POST /api/v1/chronicle        — append one envelope or an array of them
 * GET  /api/v1/chronicle        — records by time range and/or source
 * GET  /api/v1/chronicle/stats  — gate counters
 * GET  /api/v1/chronicle/:id    — single record by id
 */
async function chronicleRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Validates the whole body up-front; one bad envelope rejects the
   * batch. Answers 202 once everything is queued, before the commit.
   */
  fastify.post(
    '/api/v1/chronicle',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = httpEnvelopeBatchSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      try {
        const receipts = await fastify.chronicle.appendMany(parsed.data.map(toEnvelopeInput));
        return reply.status(202).send({
          status: 'accepted',
          count: receipts.length,
          ids: receipts.map((receipt) => receipt.id),
        });
      } catch (err: unknown) {
        if (err instanceof EnvelopeValidationError) {
          return reply.status(400).send({ error: err.message, issues: err.issues });
        }
        if (err instanceof GateClosedError) {
          return reply.status(503).send({ error: err.message });
        }
        throw err;
      }
    },
  );

  /**
   * GET /api/v1/chronicle
   *
   * Query params: from, to (epoch seconds or ISO-8601), source, limit, offset
   */
  fastify.get(
    '/api/v1/chronicle',
    async (
      request: FastifyRequest<{
        Querystring: {
          from?: string;
          to?: string;
          source?: string;
          limit?: string;
          offset?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      const from = q.from === undefined ? undefined : toEpochSeconds(q.from);
      const to = q.to === undefined ? undefined : toEpochSeconds(q.to);
      if (q.from !== undefined && from === undefined) {
        return reply.status(400).send({ error: 'from must be epoch seconds or an ISO-8601 timestamp' });
      }
      if (q.to !== undefined && to === undefined) {
        return reply.status(400).send({ error: 'to must be epoch seconds or an ISO-8601 timestamp' });
      }
      if (from !== undefined && to !== undefined && from > to) {
        return reply.status(400).send({ error: 'from must not be after to' });
      }
      if (from === undefined && to === undefined && q.source === undefined) {
        return reply.status(400).send({ error: 'Provide from/to or source' });
      }

      const result = await listRecords(fastify.chronicle, {
        ...(from !== undefined ? { from } : {}),
        ...(to !== undefined ? { to } : {}),
        ...(q.source !== undefined ? { source: q.source } : {}),
        ...(limit !== undefined ? { limit } : {}),
        ...(offset !== undefined ? { offset } : {}),
      });
      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/v1/chronicle/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.chronicle.stats());
    },
  );

  fastify.get(
    '/api/v1/chronicle/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const record = await getRecord(fastify.chronicle, request.params.id);
      if (record === null) {
        return reply.status(404).send({ error: 'Record not found' });
      }
      return reply.status(200).send(record);
    },
  );
}

export default fp(chronicleRoutes, {
  name: 'chronicle-routes',
  dependencies: ['chronicle-runtime'],
  fastify: '5.x',
});
