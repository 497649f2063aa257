import { z } from 'zod';
import { ChronicleError, errorMessage } from '../application/errors.js';

/* ------------------------------------------------------------------ */
/*  Control client: fetch wrapper for the /api/v1 control routes       */
/*                                                                     */
/*  Every response body is validated before it reaches the caller.     */
/* ------------------------------------------------------------------ */

export const DEFAULT_BASE_URL = 'http://127.0.0.1:35011';
export const DEFAULT_TIMEOUT_MS = 5000;

export class ControlApiError extends ChronicleError {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, message: string, body: unknown) {
    super(message);
    this.status = status;
    this.body = body;
  }
}

const sensorNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  status: z.enum(['running', 'stopped']),
  running: z.boolean(),
  last_error: z.string().nullable(),
  error_count: z.number(),
});

const sensorActionResultSchema = z.object({
  status_code: z.number().int(),
  message: z.string(),
  error_stack: z.array(z.string()),
  sensors: z.array(sensorNodeSchema),
});

const chronicleRecordSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  source: z.string().nullable(),
  content: z.string(),
  blob_path: z.string().nullable(),
});

const recordPageSchema = z.object({
  data: z.array(chronicleRecordSchema),
  pagination: z.object({
    limit: z.number(),
    offset: z.number(),
    count: z.number(),
    total: z.number(),
  }),
});

const healthSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  gate: z.enum(['idle', 'running', 'stopped']),
  pending: z.number(),
  sensors: z.object({ registered: z.number(), running: z.number() }),
});

const appendResultSchema = z.object({
  status: z.literal('accepted'),
  count: z.number(),
  ids: z.array(z.string()),
});

const errorBodySchema = z.object({ error: z.string() });

export type SensorNodeView = z.infer<typeof sensorNodeSchema>;
export type SensorActionResultView = z.infer<typeof sensorActionResultSchema>;
export type ChronicleRecordView = z.infer<typeof chronicleRecordSchema>;
export type RecordPageView = z.infer<typeof recordPageSchema>;
export type HealthView = z.infer<typeof healthSchema>;
export type AppendResultView = z.infer<typeof appendResultSchema>;

export interface ControlClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export interface RecordQuery {
  from?: string | number;
  to?: string | number;
  source?: string;
  limit?: number;
  offset?: number;
}

/** Envelope as accepted by POST /api/v1/chronicle. */
export interface RemoteEnvelope {
  kind?: 'event' | 'metadata';
  object_id?: string;
  timestamp?: number | string;
  source?: string;
  content_format?: 'text' | 'image' | 'file';
  content?: unknown;
  blob_base64?: string;
  blob_ext?: string;
}

export class ControlClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ControlClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /* ── Sensors ───────────────────────────────────────────────────── */

  listSensors(): Promise<SensorNodeView[]> {
    return this.request('GET', '/sensors', z.array(sensorNodeSchema));
  }

  registerSensor(
    sensorType: string,
    options: { sensorId?: string; config?: Record<string, unknown> } = {},
  ): Promise<SensorActionResultView> {
    return this.action('POST', '/sensors', {
      sensor_type: sensorType,
      ...(options.sensorId !== undefined ? { sensor_id: options.sensorId } : {}),
      ...(options.config !== undefined ? { config: options.config } : {}),
    });
  }

  unregisterSensor(sensorId: string): Promise<SensorActionResultView> {
    return this.action('DELETE', `/sensors/${encodeURIComponent(sensorId)}`);
  }

  /** Without `enable` the server flips the current state. */
  toggleSensor(sensorId: string, enable?: boolean): Promise<SensorActionResultView> {
    return this.action(
      'POST',
      `/sensors/${encodeURIComponent(sensorId)}/toggle`,
      enable === undefined ? {} : { enable },
    );
  }

  bulkAction(sensorIds: string[], enable: boolean): Promise<SensorActionResultView> {
    return this.action('POST', '/sensors/bulk', { sensor_ids: sensorIds, enable });
  }

  /* ── Chronicle ─────────────────────────────────────────────────── */

  queryRecords(query: RecordQuery): Promise<RecordPageView> {
    const qs = new URLSearchParams();
    if (query.from !== undefined) qs.set('from', String(query.from));
    if (query.to !== undefined) qs.set('to', String(query.to));
    if (query.source) qs.set('source', query.source);
    if (query.limit !== undefined) qs.set('limit', String(query.limit));
    if (query.offset !== undefined) qs.set('offset', String(query.offset));
    const q = qs.toString();
    return this.request('GET', `/chronicle${q ? `?${q}` : ''}`, recordPageSchema);
  }

  /** Returns null when the record does not exist. */
  async getRecord(id: string): Promise<ChronicleRecordView | null> {
    try {
      return await this.request('GET', `/chronicle/${encodeURIComponent(id)}`, chronicleRecordSchema);
    } catch (err: unknown) {
      if (err instanceof ControlApiError && err.status === 404) return null;
      throw err;
    }
  }

  append(envelopes: RemoteEnvelope | RemoteEnvelope[]): Promise<AppendResultView> {
    return this.request('POST', '/chronicle', appendResultSchema, envelopes);
  }

  /* ── Health ─────────────────────────────────────────────────────── */

  health(): Promise<HealthView> {
    return this.request('GET', '/health', healthSchema, undefined, [503]);
  }

  /* ── Transport ──────────────────────────────────────────────────── */

  /**
   * Sensor mutations answer a SensorActionResult for every outcome;
   * a non-2xx one is still returned as data.
   */
  private action(method: string, path: string, body?: unknown): Promise<SensorActionResultView> {
    return this.request(method, path, sensorActionResultSchema, body, 'any');
  }

  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
    acceptStatus: number[] | 'any' = [],
  ): Promise<T> {
    const url = `${this.baseUrl}/api/v1${path}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: body === undefined ? {} : { 'content-type': 'application/json' },
        ...(body === undefined ? {} : { body: JSON.stringify(body) }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      throw new ControlApiError(0, `Request to ${url} failed: ${errorMessage(err)}`, null);
    }

    const payload = await readJson(res);
    const parsed = schema.safeParse(payload);

    if (!res.ok && !(acceptStatus === 'any' || acceptStatus.includes(res.status))) {
      throw new ControlApiError(res.status, describeFailure(res, payload), payload);
    }
    if (!res.ok && !parsed.success) {
      throw new ControlApiError(res.status, describeFailure(res, payload), payload);
    }
    if (!parsed.success) {
      throw new ControlApiError(res.status, `Unexpected response from ${method} ${path}`, payload);
    }
    return parsed.data;
  }
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeFailure(res: Response, payload: unknown): string {
  const body = errorBodySchema.safeParse(payload);
  const detail = body.success ? body.data.error : res.statusText;
  return `API ${res.status}: ${detail}`;
}
