import { z } from 'zod/v4';

export type TransportKind = 'rest' | 'memory';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface AppConfig {
  url?: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  readRetries: number;
  readRetryBackoffMs: number;
  transport: TransportKind;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const envSchema = z.object({
  NETFORM_URL: z.string().optional(),
  NETFORM_USERNAME: z.string().optional(),
  NETFORM_PASSWORD: z.string().optional(),
  NETFORM_TIMEOUT_MS: z.string().optional(),
  NETFORM_READ_RETRIES: z.string().optional(),
  NETFORM_READ_RETRY_BACKOFF_MS: z.string().optional(),
  NETFORM_TRANSPORT: z.string().optional(),
  NETFORM_LOG_LEVEL: z.string().optional(),
});

function normalizeUrl(raw?: string): string | undefined {
  if (!raw || !raw.trim()) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new Error(`Invalid NETFORM_URL: ${raw}`);
  }

  // Credentials come from NETFORM_USERNAME / NETFORM_PASSWORD only
  parsed.username = '';
  parsed.password = '';
  return parsed.toString().replace(/\/+$/, '');
}

function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') return defaultValue;

  const n = Number(raw);
  if (!Number.isFinite(n)) return defaultValue;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseTransport(raw: string | undefined): TransportKind {
  return raw?.trim().toLowerCase() === 'memory' ? 'memory' : 'rest';
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    url: normalizeUrl(parsed.NETFORM_URL),
    username: parsed.NETFORM_USERNAME || undefined,
    password: parsed.NETFORM_PASSWORD || undefined,
    timeoutMs: parseNumber(parsed.NETFORM_TIMEOUT_MS, 10_000, 100, 300_000),
    readRetries: parseNumber(parsed.NETFORM_READ_RETRIES, 2, 0, 5),
    readRetryBackoffMs: parseNumber(parsed.NETFORM_READ_RETRY_BACKOFF_MS, 250, 0, 10_000),
    transport: parseTransport(parsed.NETFORM_TRANSPORT),
    logLevel: parseLogLevel(parsed.NETFORM_LOG_LEVEL),
  };
}
