import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/health: liveness plus a one-line view of the runtime.
 * Reports `degraded` once the gate has been shut down.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const gate = fastify.chronicle.state;
      const nodes = fastify.sensors.nodes();
      const running = nodes.filter((node) => node.running).length;
      const status = gate === 'stopped' ? 'degraded' : 'ok';

      return reply.status(status === 'ok' ? 200 : 503).send({
        status,
        gate,
        pending: fastify.chronicle.pending,
        sensors: { registered: nodes.length, running },
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['chronicle-runtime'],
  fastify: '5.x',
});
