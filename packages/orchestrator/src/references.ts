import { FieldValue, TypedInstance, ValidationError } from '@netform/contracts';

const REFERENCE = /\$\{([^}]+)\}/g;

/** Stands in for values that only exist once a dependency is applied */
export const KNOWN_AFTER_APPLY = '(known after apply)';

export interface Reference {
  /** `<kind>.<name>` of the referenced resource */
  address: string;
  attribute: string;
}

export type ReferenceLookup = (reference: Reference) => string;

export function parseReference(expression: string): Reference {
  const parts = expression.trim().split('.');
  if (parts.length !== 3 || parts.some((part) => part === '')) throw new ValidationError(`Invalid reference "\${${expression}}": expected kind.name.attribute`);

  return { address: `${parts[0]}.${parts[1]}`, attribute: parts[2] };
}

function stringsOf(value: FieldValue): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value;
  return [];
}

/** Every `${kind.name.attribute}` in string and list values */
export function referencesOf(instance: TypedInstance): Reference[] {
  const references: Reference[] = [];
  for (const value of Object.values(instance))
    for (const text of stringsOf(value)) for (const match of text.matchAll(REFERENCE)) references.push(parseReference(match[1]));

  return references;
}

export function resolveReferences(instance: TypedInstance, lookup: ReferenceLookup): TypedInstance {
  const interpolate = (text: string): string => text.replace(REFERENCE, (_: string, expression: string) => lookup(parseReference(expression)));
  const resolved: TypedInstance = {};

  for (const [name, value] of Object.entries(instance)) {
    if (typeof value === 'string') resolved[name] = interpolate(value);
    else if (Array.isArray(value)) resolved[name] = value.map(interpolate);
    else resolved[name] = value;
  }

  return resolved;
}
