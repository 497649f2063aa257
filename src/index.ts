import Fastify from 'fastify';
import { existsSync } from 'node:fs';

import {
  ChronicleGate,
  MissingScriptLog,
  SensorEventHub,
  SensorManager,
  SensorRegistry,
  filterSensorEntries,
} from './application/index.js';
import {
  createLogger,
  loadAppConfig,
  loadSensorDocument,
  registerBuiltinSensors,
  runtimePlugin,
} from './infrastructure/index.js';
import { chronicleRoutes, healthRoutes, sensorRoutes } from './interfaces/http/index.js';
import { SubscriptionServer } from './interfaces/ws/index.js';

/**
 * Bootstrap the chronicle service.
 *
 * Order:
 * 1) Config + logger + hub
 * 2) Gate, registry, manager; sensors from the configuration document
 * 3) HTTP routes + shutdown hooks
 * 4) listen(), then the subscription server
 * 5) Start sensors and the health monitor
 */
async function main(): Promise<void> {
  const config = loadAppConfig();
  const { log, feed } = createLogger(config.logLevel);

  const hub = new SensorEventHub();
  feed.connect((event) => hub.publishLog(event));

  // --------------------------------------------------
  // Core
  // --------------------------------------------------

  const gate = new ChronicleGate({ root: config.dataDir, log, ...config.gate });

  const registry = registerBuiltinSensors(new SensorRegistry(), log);
  const manager = new SensorManager({
    registry,
    log,
    hub,
    maxRestartAttempts: config.sensors.maxRestartAttempts,
    restartBackoffMs: config.sensors.restartBackoffMs,
  });
  manager.bindSink(async (envelopes) => {
    await gate.appendMany(envelopes);
  });

  const document = await loadSensorDocument(
    { configPath: config.sensors.configPath, inlineConfig: config.sensors.inlineConfig },
    log,
  );
  const entries = filterSensorEntries(document.sensors, {
    hasFactory: (type) => registry.hasFactory(type),
    scriptExists: (path) => existsSync(path),
    log,
    missingScripts: new MissingScriptLog(),
  });

  manager.applyGlobalConfig(document.global_config);
  for (const entry of entries) {
    try {
      manager.registerSensor(entry.sensor_type, { sensorId: entry.sensor_id, config: entry.config });
    } catch (err: unknown) {
      log.error({ err, sensorType: entry.sensor_type }, 'Sensor from configuration rejected');
    }
  }

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = Fastify({ loggerInstance: log });

  await fastify.register(runtimePlugin, { gate, manager, hub });
  await fastify.register(healthRoutes);
  await fastify.register(sensorRoutes);
  await fastify.register(chronicleRoutes);

  const subscriptions = new SubscriptionServer(hub, log.child({ component: 'subscriptions' }));
  const monitor = new AbortController();
  let monitorTask: Promise<void> | null = null;

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    subscriptions.close();
    monitor.abort();
    if (monitorTask) await monitorTask;
  });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  try {
    await fastify.listen({ host: config.host, port: config.port });
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
      log.fatal({ host: config.host, port: config.port }, 'Port already in use; another chronicle instance is running');
    } else {
      log.fatal({ err }, 'Failed to bind service port');
    }
    await gate.shutdown();
    process.exit(1);
  }

  subscriptions.attach(fastify.server);

  // --------------------------------------------------
  // Sensors
  // --------------------------------------------------

  const started = manager.startAll();
  log.info({ started }, 'Sensors started');

  monitorTask = manager.monitorHealth(monitor.signal, config.sensors.healthIntervalMs).catch((err: unknown) => {
    log.error({ err }, 'Sensor health monitor crashed');
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    void fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start chronicle', err);
  process.exit(1);
});
