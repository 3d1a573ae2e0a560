import type { TransportOperation } from './transport';

export type ErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'DECODE' | 'TRANSPORT' | 'INVARIANT';

export interface ErrorContext {
  kind?: string;
  operation?: TransportOperation | 'create' | 'update' | 'delete' | 'plan';
  identity?: string;
  field?: string;
  value?: string;
}

function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  if (context.operation) parts.push(context.operation);
  if (context.kind) parts.push(context.kind);
  if (context.identity) parts.push(`[${context.identity}]`);
  if (context.field) parts.push(`field "${context.field}"`);
  return parts.join(' ');
}

export class NetformError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    const prefix = describeContext(context);
    super(prefix ? `${prefix}: ${message}` : message, { cause: options?.cause });
    this.name = 'NetformError';
    this.code = code;
    this.context = context;
  }
}

/** A value fails its validator, or required/computed constraints are violated. Raised before any remote call. */
export class ValidationError extends NetformError {
  constructor(message: string, context: ErrorContext = {}) {
    super('VALIDATION', message, context);
    this.name = 'ValidationError';
  }
}

/** No matching record on the device; the expected outcome of drift */
export class NotFoundError extends NetformError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, context, options);
    this.name = 'NotFoundError';
  }
}

/** A device value cannot be parsed per its declared field type */
export class DecodeError extends NetformError {
  constructor(message: string, context: ErrorContext = {}) {
    super('DECODE', message, context);
    this.name = 'DecodeError';
  }
}

/** Opaque failure reported by the transport adapter, message kept verbatim */
export class TransportError extends NetformError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('TRANSPORT', message, context, options);
    this.name = 'TransportError';
  }
}

/** A codec bug: a value the system produced itself failed to parse back */
export class InvariantError extends NetformError {
  constructor(message: string) {
    super('INVARIANT', message);
    this.name = 'InvariantError';
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
