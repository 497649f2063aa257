import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  bulkAction,
  bulkActionSchema,
  listSensors,
  registerSensor,
  registerSensorSchema,
  toggleSensor,
  toggleSensorSchema,
  unregisterSensor,
} from '../../application/index.js';

/**
 * Sensor control routes. Every mutation answers a SensorActionResult
 * whose `status_code` is also the HTTP status.
 *
 * GET    /api/v1/sensors                    — list sensors
 * POST   /api/v1/sensors                    — register a sensor by type
 * DELETE /api/v1/sensors/:sensor_id         — unregister
 * POST   /api/v1/sensors/:sensor_id/toggle  — start/stop one sensor
 * POST   /api/v1/sensors/bulk               — start/stop many sensors
 */
async function sensorRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/sensors',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(listSensors(fastify.sensors));
    },
  );

  fastify.post(
    '/api/v1/sensors',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = registerSensorSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = registerSensor(fastify.sensors, parsed.data);
      return reply.status(result.status_code).send(result);
    },
  );

  fastify.delete(
    '/api/v1/sensors/:sensor_id',
    async (request: FastifyRequest<{ Params: { sensor_id: string } }>, reply: FastifyReply) => {
      const result = unregisterSensor(fastify.sensors, request.params.sensor_id);
      return reply.status(result.status_code).send(result);
    },
  );

  fastify.post(
    '/api/v1/sensors/:sensor_id/toggle',
    async (
      request: FastifyRequest<{ Params: { sensor_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = toggleSensorSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = toggleSensor(fastify.sensors, request.params.sensor_id, parsed.data.enable);
      return reply.status(result.status_code).send(result);
    },
  );

  fastify.post(
    '/api/v1/sensors/bulk',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = bulkActionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const result = bulkAction(fastify.sensors, parsed.data.sensor_ids, parsed.data.enable);
      return reply.status(result.status_code).send(result);
    },
  );
}

export default fp(sensorRoutes, {
  name: 'sensor-routes',
  dependencies: ['chronicle-runtime'],
  fastify: '5.x',
});
