import { parseDuration, parseInteger } from '@netform/codec';
import { FieldValue, Validator } from '@netform/contracts';

export function stringInSlice(allowed: readonly string[]): Validator {
  return (value: FieldValue) => {
    if (typeof value === 'string' && allowed.includes(value)) return undefined;
    return `expected one of [${allowed.join(', ')}], got ${JSON.stringify(value)}`;
  };
}

export function stringMatch(pattern: RegExp, message: string): Validator {
  return (value: FieldValue) => (typeof value === 'string' && pattern.test(value) ? undefined : message);
}

export function intBetween(min: number, max: number): Validator {
  return (value: FieldValue) => {
    if (typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max) return undefined;
    return `expected integer in range (${min} - ${max}), got ${JSON.stringify(value)}`;
  };
}

/** MTU: the literal `auto` or an integer in 0..65535 */
export const validateMtu: Validator = (value: FieldValue) => {
  if (typeof value !== 'string' && typeof value !== 'number') return "Expected MTU value to be integer or 'auto'";

  const text = String(value);
  if (text === 'auto') return undefined;

  const mtu = parseInteger(text);
  if (mtu === undefined) return "Expected MTU value to be integer or 'auto'";
  if (mtu < 0 || mtu > 65_535) return `Expected MTU value to be in the range (0 - 65535), got ${text}`;

  return undefined;
};

export const validationTime: Validator = (value: FieldValue) => {
  if (typeof value === 'string' && parseDuration(value) !== undefined) return undefined;
  return `expected a time value such as 30s, 5m or 1h30m, got ${JSON.stringify(value)}`;
};

export const validationIpAddress = stringMatch(
  /^$|^((25[0-5]|2[0-4]\d|[01]?\d\d?)\.){3}(25[0-5]|2[0-4]\d|[01]?\d\d?)(\/([12]?\d|3[0-2]))?$/,
  'Allowed addresses must be a CIDR IP address or an empty string'
);

/** Every list element must be one of `allowed` */
export function everyInSlice(allowed: readonly string[]): Validator {
  return (value: FieldValue) => {
    if (!Array.isArray(value)) return `expected a list, got ${JSON.stringify(value)}`;
    const unknown = value.filter((item) => !allowed.includes(item));
    return unknown.length === 0 ? undefined : `unexpected values [${unknown.join(', ')}], allowed: [${allowed.join(', ')}]`;
  };
}
