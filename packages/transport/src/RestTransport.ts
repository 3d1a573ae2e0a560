import { DeviceRecord, ID_WIRE_KEY, ITransport, TransportRequest } from '@netform/contracts';
import { colorizedDebug, Logger, silentLogger } from '@netform/logger';
import { z } from 'zod/v4';

export interface RestTransportOptions {
  baseUrl: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  readRetries: number;
  readRetryBackoffMs: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const recordSchema = z.record(z.string(), scalar);
const responseSchema = z.union([z.array(recordSchema), recordSchema]);

const errorBodySchema = z.object({
  error: z.number().optional(),
  message: z.string().optional(),
  detail: z.string().optional(),
});

const SENSITIVE_KEYS = new Set(['password', 'secret', 'passphrase', 'private-key', 'psk']);

function redactParams(params: DeviceRecord): DeviceRecord {
  const result: DeviceRecord = {};
  for (const [key, value] of Object.entries(params)) result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : value;
  return result;
}

function toDeviceRecord(raw: Record<string, string | number | boolean>): DeviceRecord {
  const record: DeviceRecord = {};
  for (const [key, value] of Object.entries(raw)) record[key] = String(value);
  return record;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** The device's own error text when the body carries one, the HTTP status otherwise */
function describeFailure(status: number, text: string): string {
  const parsed = errorBodySchema.safeParse(parseJson(text));
  const detail = parsed.success ? (parsed.data.detail ?? parsed.data.message) : undefined;
  if (detail) return detail;

  const body = text.trim();
  return body === '' ? `HTTP ${status}` : `HTTP ${status}: ${body}`;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * JSON-over-HTTP adapter for the device's REST endpoint (`/rest/<path>`).
 * Only reads are retried; writes are sent once.
 */
export class RestTransport implements ITransport {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: RestTransportOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger();
  }

  private url(path: string, suffix: string = ''): URL {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    return new URL(`${base}/rest${path}${suffix}`);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.username !== undefined) {
      const token = Buffer.from(`${this.options.username}:${this.options.password ?? ''}`).toString('base64');
      headers.authorization = `Basic ${token}`;
    }
    return headers;
  }

  private async send(method: string, url: URL, body: DeviceRecord | undefined, idempotent: boolean): Promise<unknown> {
    const retries = idempotent ? this.options.readRetries : 0;
    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt += 1) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

      try {
        const response = await this.fetchImpl(url, {
          method,
          headers: this.headers(),
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });
        clearTimeout(timeout);

        if (idempotent && response.status >= 500 && attempt < retries) {
          await wait(this.options.readRetryBackoffMs * (attempt + 1));
          continue;
        }

        const text = await response.text();
        if (!response.ok) throw new Error(describeFailure(response.status, text));
        return text === '' ? undefined : JSON.parse(text);
      } catch (error) {
        clearTimeout(timeout);
        lastError = error;
        // Device rejections are final; only network-level failures are retried
        if (!(error instanceof Error) || (error.name !== 'AbortError' && error.name !== 'TypeError') || attempt >= retries) break;
        await wait(this.options.readRetryBackoffMs * (attempt + 1));
      }
    }

    if (lastError instanceof Error && lastError.name === 'AbortError') throw new Error(`request timed out after ${this.options.timeoutMs}ms: ${method} ${url.pathname}`);
    throw lastError;
  }

  private parseRecords(payload: unknown): DeviceRecord[] {
    if (payload === undefined) return [];
    const parsed = responseSchema.parse(payload);
    return Array.isArray(parsed) ? parsed.map(toDeviceRecord) : [toDeviceRecord(parsed)];
  }

  async execute(request: TransportRequest): Promise<DeviceRecord[]> {
    const { operation, path, params, filters } = request;
    colorizedDebug(this.logger, `rest ${operation} ${path}`, { params: redactParams(params), filters });

    const { [ID_WIRE_KEY]: id, ...fields } = params;

    switch (operation) {
      case 'read': {
        const byId = filters.find((filter) => filter.field === ID_WIRE_KEY);
        const url = byId ? this.url(path, `/${encodeURIComponent(byId.value)}`) : this.url(path);
        for (const filter of filters) if (filter !== byId) url.searchParams.set(filter.field, filter.value);
        return this.parseRecords(await this.send('GET', url, undefined, true));
      }
      case 'add': {
        return this.parseRecords(await this.send('PUT', this.url(path), fields, false));
      }
      case 'set': {
        return this.parseRecords(await this.send('PATCH', this.url(path, `/${encodeURIComponent(id ?? '')}`), fields, false));
      }
      case 'remove': {
        await this.send('DELETE', this.url(path, `/${encodeURIComponent(id ?? '')}`), undefined, false);
        return [];
      }
      case 'move': {
        await this.send('POST', this.url(path, '/move'), fields, false);
        return [];
      }
      default: {
        throw new Error(`unsupported operation: ${operation}`);
      }
    }
  }
}
