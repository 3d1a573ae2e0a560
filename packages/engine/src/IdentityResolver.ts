import { toWireName } from '@netform/codec';
import {
  DecodeError,
  DeviceRecord,
  Filter,
  formatIdentity,
  ID_WIRE_KEY,
  Identity,
  naturalKey,
  NotFoundError,
  opaqueId,
  ResourceSchema,
} from '@netform/contracts';
import { keyFieldOf } from '@netform/schema';

/**
 * Addresses instances of one resource kind, either by device-assigned id or by natural key.
 */
export class IdentityResolver {
  constructor(private readonly schema: ResourceSchema) {}

  private wireKeyOf(field: string): string {
    return toWireName(field, this.schema.fields[field]);
  }

  matches(record: DeviceRecord, identity: Identity): boolean {
    if (identity.kind === 'id') return record[ID_WIRE_KEY] === identity.value;
    return record[this.wireKeyOf(identity.field)] === identity.value;
  }

  toFilter(identity: Identity): Filter {
    if (identity.kind === 'id') return { field: ID_WIRE_KEY, value: identity.value };
    return { field: this.wireKeyOf(identity.field), value: identity.value };
  }

  carriesIdentity(record: DeviceRecord): boolean {
    const wireKey = this.schema.idType === 'id' ? ID_WIRE_KEY : this.wireKeyOf(keyFieldOf(this.schema));
    return Boolean(record[wireKey]);
  }

  /** The authoritative identity of an observed record, per the kind's id type */
  identityOf(record: DeviceRecord): Identity {
    if (this.schema.idType === 'id') return opaqueId(this.requireId(record));

    const keyField = keyFieldOf(this.schema);
    const key = record[this.wireKeyOf(keyField)];
    if (!key) throw new DecodeError(`device record carries no "${keyField}"`, { kind: this.schema.name });
    return naturalKey(key, keyField);
  }

  /**
   * Finds the observed record addressed by `desired` and returns its opaque id.
   * Rejects with NotFoundError when nothing matches, which callers treat as drift.
   */
  resolve(desired: Identity, observed: DeviceRecord[]): Identity {
    return opaqueId(this.requireId(this.find(desired, observed)));
  }

  find(desired: Identity, observed: DeviceRecord[]): DeviceRecord {
    const record = observed.find((candidate) => this.matches(candidate, desired));
    if (!record) throw new NotFoundError('no such item', { kind: this.schema.name, identity: formatIdentity(desired) });
    return record;
  }

  requireId(record: DeviceRecord): string {
    const id = record[ID_WIRE_KEY];
    if (!id) throw new DecodeError('device record carries no id', { kind: this.schema.name });
    return id;
  }
}
