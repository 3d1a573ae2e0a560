/** A language-native field value, checked against a resource schema at the codec boundary */
export type FieldValue = string | number | boolean | string[] | Record<string, string>;

/** Field name -> value, conforming to a resource schema (desired or observed state) */
export type TypedInstance = Record<string, FieldValue>;

/** Flat string-keyed record exactly as sent to or returned by the device */
export type DeviceRecord = Record<string, string>;

/** Wire key of the device-assigned opaque identifier */
export const ID_WIRE_KEY = '.id';

/** Authoritative addressing mode of a resource kind */
export type IdType = 'id' | 'name';

export type Identity = { kind: 'id'; value: string } | { kind: 'key'; field: string; value: string };

export function opaqueId(value: string): Identity {
  return { kind: 'id', value };
}

export function naturalKey(value: string, field: string = 'name'): Identity {
  return { kind: 'key', field, value };
}

export function formatIdentity(identity: Identity): string {
  return identity.kind === 'id' ? identity.value : `${identity.field}=${identity.value}`;
}

export interface Filter {
  field: string;
  value: string;
}

export type FilterSet = Filter[];

export function formatFilter(filter: Filter): string {
  return `${filter.field}=${filter.value}`;
}

/** Resource kind together with the device-side state the engine observed for it */
export interface ObservedResource {
  kind: string;
  identity: Identity;
  instance: TypedInstance;
}

export * from './errors';
export * from './provider';
export * from './schema';
export * from './transport';
