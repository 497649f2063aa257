import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import {
  ControlClient,
  DEFAULT_BASE_URL,
  type ChronicleRecordView,
  type SensorActionResultView,
  type SensorNodeView,
} from '../client/control-client.js';
import { SubscriptionClient } from '../client/subscription-client.js';

const DEFAULT_TIMEOUT_SECONDS = 10;

export type GlobalOptions = {
  url: string;
  timeout: number;
  json?: boolean;
};

export type CliDependencies = {
  controlClient?: (options: GlobalOptions) => ControlClient;
  subscriptionClient?: (options: GlobalOptions) => Promise<SubscriptionClient>;
  out?: (line: string) => void;
  setExitCode?: (code: number) => void;
  /** Ends the streaming commands; SIGINT when absent. */
  signal?: AbortSignal;
  now?: () => number;
};

const statusEventSchema = z.object({
  sensor_id: z.string(),
  status: z.string(),
  message: z.string(),
  timestamp: z.string(),
});

const logEventSchema = z.object({
  timestamp: z.string(),
  level: z.string(),
  message: z.string(),
  name: z.string(),
});

function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return n;
}

function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return n;
}

/** `http://host:port` → `ws://host:port/graphql` */
export function subscriptionUrlFor(baseUrl: string): string {
  const url = new URL(baseUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  url.pathname = '/graphql';
  url.search = '';
  return url.toString();
}

export function formatSensorTable(sensors: readonly SensorNodeView[]): string[] {
  if (sensors.length === 0) return ['No sensors found'];
  const header = `${'ID'.padEnd(24)} ${'Name'.padEnd(20)} ${'Status'.padEnd(10)} ${'Running'.padEnd(8)} Errors`;
  return [
    header,
    '-'.repeat(header.length),
    ...sensors.map((s) =>
      `${s.id.padEnd(24)} ${s.name.padEnd(20)} ${s.status.padEnd(10)} ${String(s.running).padEnd(8)} ${s.error_count}`,
    ),
  ];
}

export function formatRecord(record: ChronicleRecordView): string {
  const at = new Date(record.timestamp * 1000).toISOString();
  const blob = record.blob_path ? ` blob=${record.blob_path}` : '';
  return `${at} ${record.id} [${record.source ?? '-'}] ${record.content}${blob}`;
}

/** Whether a feed event is no older than `maxAgeSeconds` at `nowMs`. */
export function isRecent(timestamp: string, maxAgeSeconds: number, nowMs: number): boolean {
  const at = Date.parse(timestamp);
  if (Number.isNaN(at)) return true;
  return (nowMs - at) / 1000 <= maxAgeSeconds;
}

function createControlClient(options: GlobalOptions): ControlClient {
  return new ControlClient({ baseUrl: options.url, timeoutMs: options.timeout * 1000 });
}

function createSubscriptionClient(options: GlobalOptions): Promise<SubscriptionClient> {
  return SubscriptionClient.connect({
    url: subscriptionUrlFor(options.url),
    handshakeTimeoutMs: options.timeout * 1000,
  });
}

export function createProgram(deps: CliDependencies = {}): Command {
  const controlClient = deps.controlClient ?? createControlClient;
  const subscriptionClient = deps.subscriptionClient ?? createSubscriptionClient;
  const out = deps.out ?? ((line: string) => console.log(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const now = deps.now ?? Date.now;

  const program = new Command();
  program
    .name('chronicle')
    .description('Control sensors and read the chronicle of a running service')
    .option('--url <url>', 'Service base URL', process.env['CHRONICLE_URL'] ?? DEFAULT_BASE_URL)
    .option('--timeout <seconds>', 'HTTP and handshake timeout in seconds', parsePositiveNumber, DEFAULT_TIMEOUT_SECONDS)
    .option('--json', 'Print raw JSON responses');

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const report = (result: SensorActionResultView): void => {
    if (globals().json) {
      out(JSON.stringify(result, null, 2));
    } else {
      out(`${result.message} (status=${result.status_code})`);
      if (result.error_stack.length > 0) out(`Errors: ${result.error_stack.join(', ')}`);
      for (const line of formatSensorTable(result.sensors)) out(line);
    }
    if (result.status_code >= 400) setExitCode(1);
  };

  /** Runs one subscription until the server completes it or the user interrupts. */
  const stream = async (query: string, onPayload: (data: Record<string, unknown>) => void): Promise<void> => {
    const client = await subscriptionClient(globals());
    const stop = (): void => client.close();
    const external = deps.signal;
    if (external) {
      if (external.aborted) stop();
      external.addEventListener('abort', stop, { once: true });
    } else {
      process.once('SIGINT', stop);
    }

    try {
      for await (const payload of client.subscribe(query)) {
        if (payload.data) onPayload(payload.data);
      }
    } finally {
      if (external) external.removeEventListener('abort', stop);
      else process.off('SIGINT', stop);
      client.close();
    }
  };

  program
    .command('sensors')
    .description('List all sensors')
    .action(async () => {
      const sensors = await controlClient(globals()).listSensors();
      if (globals().json) {
        out(JSON.stringify(sensors, null, 2));
        return;
      }
      for (const line of formatSensorTable(sensors)) out(line);
    });

  program
    .command('toggle')
    .description('Flip a sensor between running and stopped')
    .argument('<sensor_id>', 'Sensor id')
    .action(async (sensorId: string) => {
      report(await controlClient(globals()).toggleSensor(sensorId));
    });

  program
    .command('start')
    .description('Start a sensor')
    .argument('<sensor_id>', 'Sensor id')
    .action(async (sensorId: string) => {
      report(await controlClient(globals()).toggleSensor(sensorId, true));
    });

  program
    .command('stop')
    .description('Stop a sensor')
    .argument('<sensor_id>', 'Sensor id')
    .action(async (sensorId: string) => {
      report(await controlClient(globals()).toggleSensor(sensorId, false));
    });

  program
    .command('bulk-start')
    .description('Start several sensors')
    .argument('<sensor_ids...>', 'Sensor ids')
    .action(async (sensorIds: string[]) => {
      report(await controlClient(globals()).bulkAction(sensorIds, true));
    });

  program
    .command('bulk-stop')
    .description('Stop several sensors')
    .argument('<sensor_ids...>', 'Sensor ids')
    .action(async (sensorIds: string[]) => {
      report(await controlClient(globals()).bulkAction(sensorIds, false));
    });

  program
    .command('register')
    .description('Register a sensor by type')
    .argument('<sensor_type>', 'Registered sensor type')
    .option('--sensor-id <id>', 'Id for the new sensor (defaults to the type)')
    .option('--config <json>', 'JSON object passed to the sensor')
    .action(async (sensorType: string, cmdOptions: { sensorId?: string; config?: string }) => {
      let config: Record<string, unknown> | undefined;
      if (cmdOptions.config !== undefined) {
        const parsed = z.record(z.string(), z.unknown()).safeParse(safeJson(cmdOptions.config));
        if (!parsed.success) {
          throw new InvalidArgumentError('--config must be a JSON object');
        }
        config = parsed.data;
      }
      report(await controlClient(globals()).registerSensor(sensorType, {
        ...(cmdOptions.sensorId !== undefined ? { sensorId: cmdOptions.sensorId } : {}),
        ...(config !== undefined ? { config } : {}),
      }));
    });

  program
    .command('unregister')
    .description('Unregister a sensor')
    .argument('<sensor_id>', 'Sensor id')
    .action(async (sensorId: string) => {
      report(await controlClient(globals()).unregisterSensor(sensorId));
    });

  program
    .command('status-stream')
    .description('Follow sensor status changes')
    .action(async () => {
      await stream('subscription { sensorStatus { sensor_id status message timestamp } }', (data) => {
        const event = statusEventSchema.safeParse(data['sensorStatus']);
        if (!event.success) return;
        const e = event.data;
        out(`[${e.timestamp}] sensor=${e.sensor_id} status=${e.status} message=${e.message}`);
      });
    });

  program
    .command('log-stream')
    .description('Follow the service log')
    .option('--max-age-seconds <seconds>', 'Skip entries older than this', parsePositiveNumber, 1)
    .action(async (cmdOptions: { maxAgeSeconds: number }) => {
      await stream('subscription { logStream { timestamp level message name } }', (data) => {
        const event = logEventSchema.safeParse(data['logStream']);
        if (!event.success) return;
        const e = event.data;
        if (!isRecent(e.timestamp, cmdOptions.maxAgeSeconds, now())) return;
        out(`[${e.timestamp}] ${e.level} ${e.name} ${e.message}`);
      });
    });

  program
    .command('query')
    .description('Read chronicle records by id, source or time range')
    .option('--id <object_id>', 'Single record id')
    .option('--source <source>', 'Producer category')
    .option('--from <time>', 'Range start, epoch seconds or ISO-8601')
    .option('--to <time>', 'Range end, epoch seconds or ISO-8601')
    .option('--limit <n>', 'Page size', parseInteger)
    .option('--offset <n>', 'Records to skip', parseInteger)
    .action(async (cmdOptions: {
      id?: string;
      source?: string;
      from?: string;
      to?: string;
      limit?: number;
      offset?: number;
    }) => {
      const client = controlClient(globals());

      if (cmdOptions.id !== undefined) {
        const record = await client.getRecord(cmdOptions.id);
        if (record === null) {
          out(`Record '${cmdOptions.id}' not found`);
          setExitCode(1);
          return;
        }
        out(globals().json ? JSON.stringify(record, null, 2) : formatRecord(record));
        return;
      }

      if (cmdOptions.source === undefined && cmdOptions.from === undefined && cmdOptions.to === undefined) {
        throw new InvalidArgumentError('query needs --id, --source or --from/--to');
      }

      const page = await client.queryRecords({
        ...(cmdOptions.from !== undefined ? { from: cmdOptions.from } : {}),
        ...(cmdOptions.to !== undefined ? { to: cmdOptions.to } : {}),
        ...(cmdOptions.source !== undefined ? { source: cmdOptions.source } : {}),
        ...(cmdOptions.limit !== undefined ? { limit: cmdOptions.limit } : {}),
        ...(cmdOptions.offset !== undefined ? { offset: cmdOptions.offset } : {}),
      });
      if (globals().json) {
        out(JSON.stringify(page, null, 2));
        return;
      }
      for (const record of page.data) out(formatRecord(record));
      out(`${page.pagination.count} of ${page.pagination.total} record(s)`);
    });

  return program;
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
