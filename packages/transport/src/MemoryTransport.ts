import { DeviceRecord, Filter, ID_WIRE_KEY, ITransport, TransportOperation, TransportRequest } from '@netform/contracts';

export interface MemoryPathHooks {
  /** Fills in what the device sets itself on add (counters, next run, ...) */
  onAdd?: (record: DeviceRecord) => DeviceRecord;
  /** Rewrites a stored record the way the device prints it back */
  normalize?: (record: DeviceRecord) => DeviceRecord;
}

interface PendingFailure {
  operation: TransportOperation;
  message: string;
}

function matchesAll(record: DeviceRecord, filters: Filter[]): boolean {
  return filters.every((filter) => (record[filter.field] ?? '') === filter.value);
}

/**
 * An in-process device: ordered item lists per path with `*N` ids.
 * Failures carry the same text a device would send, e.g. `no such item`.
 */
export class MemoryTransport implements ITransport {
  private tables: Map<string, DeviceRecord[]> = new Map();
  private nextId = 1;
  private failures: PendingFailure[] = [];
  /** Every request received, in order */
  readonly requests: TransportRequest[] = [];

  constructor(private readonly hooks: Record<string, MemoryPathHooks> = {}) {}

  private table(path: string): DeviceRecord[] {
    let table = this.tables.get(path);
    if (!table) {
      table = [];
      this.tables.set(path, table);
    }
    return table;
  }

  private allocateId(): string {
    const id = `*${this.nextId.toString(16).toUpperCase()}`;
    this.nextId++;
    return id;
  }

  private indexOf(table: DeviceRecord[], id: string | undefined): number {
    const at = table.findIndex((record) => record[ID_WIRE_KEY] === id);
    if (at === -1) throw new Error('no such item');
    return at;
  }

  private store(path: string, record: DeviceRecord): DeviceRecord {
    const normalize = this.hooks[path]?.normalize;
    return normalize ? normalize(record) : record;
  }

  /** Puts records on the device directly, as if configured by hand. Returns them with ids. */
  seed(path: string, records: DeviceRecord[]): DeviceRecord[] {
    const table = this.table(path);
    const seeded = records.map((record) => this.store(path, { [ID_WIRE_KEY]: this.allocateId(), ...record }));
    table.push(...seeded);
    return seeded.map((record) => ({ ...record }));
  }

  snapshot(path: string): DeviceRecord[] {
    return this.table(path).map((record) => ({ ...record }));
  }

  /** Makes the next command of this kind fail with the given device text */
  failNext(operation: TransportOperation, message: string): void {
    this.failures.push({ operation, message });
  }

  async execute(request: TransportRequest): Promise<DeviceRecord[]> {
    this.requests.push(request);

    const failure = this.failures.findIndex((f) => f.operation === request.operation);
    if (failure !== -1) {
      const [{ message }] = this.failures.splice(failure, 1);
      throw new Error(message);
    }

    const table = this.table(request.path);
    const { params } = request;

    switch (request.operation) {
      case 'read': {
        return table.filter((record) => matchesAll(record, request.filters)).map((record) => ({ ...record }));
      }
      case 'add': {
        const { 'place-before': placeBefore, ...fields } = params;
        if (fields.name !== undefined && table.some((record) => record.name === fields.name))
          throw new Error('failure: item with such name already exists');

        const onAdd = this.hooks[request.path]?.onAdd;
        const created = { [ID_WIRE_KEY]: this.allocateId(), ...fields };
        const record = this.store(request.path, onAdd ? onAdd(created) : created);

        if (placeBefore) table.splice(this.indexOf(table, placeBefore), 0, record);
        else table.push(record);
        return [{ ...record }];
      }
      case 'set': {
        const at = this.indexOf(table, params[ID_WIRE_KEY]);
        const { [ID_WIRE_KEY]: _id, ...changes } = params;
        table[at] = this.store(request.path, { ...table[at], ...changes });
        return [];
      }
      case 'remove': {
        table.splice(this.indexOf(table, params[ID_WIRE_KEY]), 1);
        return [];
      }
      case 'move': {
        const [record] = table.splice(this.indexOf(table, params.numbers), 1);
        if (params.destination) table.splice(this.indexOf(table, params.destination), 0, record);
        else table.push(record);
        return [];
      }
      default: {
        throw new Error(`unknown command: ${request.operation}`);
      }
    }
  }
}
