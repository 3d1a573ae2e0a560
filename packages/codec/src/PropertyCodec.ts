import {
  DecodeError,
  DeviceRecord,
  FieldSchema,
  FieldValue,
  InvariantError,
  isComputedOnly,
  ResourceSchema,
  TypedInstance,
  ValidationError,
} from '@netform/contracts';
import { colorizedDebug, Logger } from '@netform/logger';

import { formatDuration, parseDuration } from './duration';
import { toWireName, wireIndex } from './names';

export interface CodecOptions {
  logger?: Logger;
}

/** Decimal or `0x` hexadecimal integer */
export function parseInteger(text: string): number | undefined {
  if (/^-?\d+$/.test(text)) return Number(text);
  if (/^0x[\da-f]+$/i.test(text)) return Number.parseInt(text.slice(2), 16);
  return undefined;
}

function isStringRecord(value: FieldValue): value is Record<string, string> {
  return typeof value === 'object' && !Array.isArray(value) && Object.values(value).every((v) => typeof v === 'string');
}

function describeType(field: FieldSchema): string {
  if (field.format === 'int_or_auto') return "integer or 'auto'";
  if (field.format === 'duration') return 'duration';
  if (field.type === 'list') return 'list of strings';
  if (field.type === 'map') return 'map of strings';
  return field.type;
}

function outOfRange(field: FieldSchema, n: number): boolean {
  return field.range !== undefined && (n < field.range[0] || n > field.range[1]);
}

/**
 * Returns an error message when the value does not have the field's declared type.
 */
export function checkFieldType(field: FieldSchema, value: FieldValue): string | undefined {
  const expected = `expected ${describeType(field)}, got ${JSON.stringify(value)}`;

  switch (field.type) {
    case 'string': {
      if (field.format === 'int_or_auto' && typeof value === 'number') return undefined;
      return typeof value === 'string' ? undefined : expected;
    }
    case 'int': {
      return typeof value === 'number' && Number.isInteger(value) ? undefined : expected;
    }
    case 'bool': {
      return typeof value === 'boolean' ? undefined : expected;
    }
    case 'list': {
      return Array.isArray(value) ? undefined : expected;
    }
    case 'map': {
      return isStringRecord(value) ? undefined : expected;
    }
    default: {
      return `unsupported field type ${JSON.stringify(field.type)}`;
    }
  }
}

function encodeString(field: FieldSchema, value: FieldValue, fail: (message: string) => never): string {
  const text = String(value);

  if (field.format === 'duration') {
    if (text === '') return text;
    const seconds = parseDuration(text);
    if (seconds === undefined) return fail(`invalid duration "${text}"`);

    const compact = formatDuration(seconds);
    if (parseDuration(compact) !== seconds) throw new InvariantError(`duration "${text}" formatted as "${compact}" does not parse back`);
    return compact;
  }

  if (field.format === 'int_or_auto' && text !== 'auto') {
    const n = parseInteger(text);
    if (n === undefined) return fail(`expected integer or 'auto', got "${text}"`);
    if (outOfRange(field, n)) return fail(`value ${text} outside range ${field.range?.join('..')}`);
  }

  if (field.format === 'hex' && text !== '' && parseInteger(text) === undefined) return fail(`expected a number, got "${text}"`);

  return text;
}

/** Encodes one field value into its wire form. Validates first. */
export function encodeField(schema: ResourceSchema, name: string, value: FieldValue): string {
  const field = schema.fields[name];
  const fail = (message: string): never => {
    throw new ValidationError(message, { kind: schema.name, field: name });
  };
  if (!field) return fail('unknown field');

  const typeError = checkFieldType(field, value);
  if (typeError) return fail(typeError);

  const invalid = field.validate?.(value);
  if (invalid) return fail(invalid);

  const delimiter = field.delimiter ?? ',';

  if (typeof value === 'boolean') {
    if (field.boolStyle === 'yes_no') return value ? 'yes' : 'no';
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    if (outOfRange(field, value)) return fail(`value ${value} outside range ${field.range?.join('..')}`);
    return field.type === 'int' ? String(value) : encodeString(field, value, fail);
  }
  if (Array.isArray(value)) return value.join(delimiter);
  if (typeof value === 'object')
    return Object.entries(value)
      .map(([k, v]) => `${k}=${v}`)
      .join(delimiter);

  return encodeString(field, value, fail);
}

/**
 * Serializes a typed instance into a device record. Computed-only fields are never sent.
 */
export function encode(instance: TypedInstance, schema: ResourceSchema): DeviceRecord {
  const record: DeviceRecord = {};

  for (const [name, value] of Object.entries(instance)) {
    const field = schema.fields[name];
    if (field && isComputedOnly(field)) continue;

    record[toWireName(name, field)] = encodeField(schema, name, value);
  }

  return record;
}

function decodeValue(schema: ResourceSchema, name: string, field: FieldSchema, raw: string): FieldValue {
  const fail = (expected: string): never => {
    throw new DecodeError(`cannot parse "${raw}" as ${expected}`, { kind: schema.name, field: name, value: raw });
  };
  const delimiter = field.delimiter ?? ',';

  switch (field.type) {
    case 'int': {
      const n = parseInteger(raw);
      if (n === undefined) return fail('integer');
      if (outOfRange(field, n)) return fail(`integer in range ${field.range?.join('..')}`);
      return n;
    }
    case 'bool': {
      if (raw === 'true' || raw === 'yes') return true;
      if (raw === 'false' || raw === 'no') return false;
      return fail('boolean');
    }
    case 'list': {
      return raw === '' ? [] : raw.split(delimiter);
    }
    case 'map': {
      const entries: Record<string, string> = {};
      if (raw === '') return entries;
      for (const fragment of raw.split(delimiter)) {
        const eq = fragment.indexOf('=');
        if (eq <= 0) return fail('key=value fragments');
        entries[fragment.slice(0, eq)] = fragment.slice(eq + 1);
      }
      return entries;
    }
    default: {
      break;
    }
  }

  if (field.format === 'int_or_auto') {
    if (raw === 'auto') return raw;
    const n = parseInteger(raw);
    if (n === undefined) return fail("integer or 'auto'");
    if (outOfRange(field, n)) return fail(`'auto' or integer in range ${field.range?.join('..')}`);
    // Declared as a string field, so the checked text is kept
    return raw;
  }
  if (field.format === 'duration' && raw !== '' && parseDuration(raw) === undefined) return fail('duration');
  if (field.format === 'hex' && raw !== '' && parseInteger(raw) === undefined) return fail('number');

  return raw;
}

/**
 * Parses a device record into a typed instance. Wire keys the schema does not declare are skipped.
 */
export function decode(record: DeviceRecord, schema: ResourceSchema, options: CodecOptions = {}): TypedInstance {
  const index = wireIndex(schema);
  const instance: TypedInstance = {};

  for (const [wireKey, raw] of Object.entries(record)) {
    const name = index.get(wireKey);
    const field = name === undefined ? undefined : schema.fields[name];
    if (name === undefined || !field) {
      if (options.logger) colorizedDebug(options.logger, 'skipping undeclared field', { kind: schema.name, key: wireKey });
      continue;
    }

    instance[name] = decodeValue(schema, name, field, raw);
  }

  return instance;
}
