import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ChronicleGate } from '../../application/chronicle-gate.js';
import type { SensorEventHub } from '../../application/sensor-event-hub.js';
import type { SensorManager } from '../../application/sensor-manager.js';

export interface RuntimePluginOptions {
  gate: ChronicleGate;
  manager: SensorManager;
  hub: SensorEventHub;
}

/**
 * Fastify plugin that exposes the chronicle runtime to routes.
 *
 * Decorates `fastify.chronicle`, `fastify.sensors` and `fastify.sensorHub`.
 * On close, stops every sensor and drains the gate before its handles go.
 */
async function runtimePlugin(fastify: FastifyInstance, options: RuntimePluginOptions): Promise<void> {
  fastify.decorate('chronicle', options.gate);
  fastify.decorate('sensors', options.manager);
  fastify.decorate('sensorHub', options.hub);

  fastify.addHook('onClose', async () => {
    options.manager.stopAll();
    await options.gate.shutdown();
    fastify.log.info('Chronicle runtime stopped');
  });
}

export default fp(runtimePlugin, {
  name: 'chronicle-runtime',
  fastify: '5.x',
});

/** Extend Fastify's type system so the runtime is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    chronicle: ChronicleGate;
    sensors: SensorManager;
    sensorHub: SensorEventHub;
  }
}
