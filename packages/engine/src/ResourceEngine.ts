import { decode } from '@netform/codec';
import {
  DecodeError,
  DeviceRecord,
  ErrorContext,
  FilterSet,
  formatIdentity,
  ID_WIRE_KEY,
  Identity,
  IResourceHandler,
  isComputedOnly,
  isNotFound,
  ITransport,
  ObservedResource,
  opaqueId,
  ResourceSchema,
  TransportOperation,
  TypedInstance,
} from '@netform/contracts';
import { colorizedDebug, Logger, silentLogger } from '@netform/logger';
import { planResource, PlanAction } from '@netform/planner';
import { applyDefaults, validateInstance } from '@netform/schema';

import { IdentityResolver } from './IdentityResolver';
import { translateTransportError } from './transportErrors';

export type CallPhase = 'planning' | 'executing' | 'verifying' | 'done' | 'failed';

type CallName = 'create' | 'read' | 'update' | 'delete' | 'plan';

export interface ReconcileResult {
  actions: PlanAction[];
  resource: ObservedResource;
}

export interface ResourceEngineOptions {
  logger?: Logger;
}

interface Observation {
  record: DeviceRecord;
  list: DeviceRecord[];
}

/** Phase bookkeeping for one lifecycle call */
class Call {
  phase: CallPhase = 'planning';

  constructor(
    private readonly logger: Logger,
    readonly name: CallName,
    readonly kind: string
  ) {}

  enter(phase: CallPhase, fields: Record<string, unknown> = {}): void {
    this.phase = phase;
    colorizedDebug(this.logger, `${this.name} ${this.kind}: ${phase}`, fields);
  }
}

/**
 * CRUD reconciliation for one resource kind. Holds no state between calls: the device is the only store.
 */
export class ResourceEngine implements IResourceHandler {
  readonly resolver: IdentityResolver;
  private readonly logger: Logger;

  constructor(
    readonly schema: ResourceSchema,
    private readonly transport: ITransport,
    options: ResourceEngineOptions = {}
  ) {
    this.resolver = new IdentityResolver(schema);
    this.logger = options.logger ?? silentLogger();
  }

  private async run<T>(name: CallName, body: (call: Call) => Promise<T>): Promise<T> {
    const call = new Call(this.logger, name, this.schema.name);
    call.enter('planning');
    try {
      const result = await body(call);
      call.enter('done');
      return result;
    } catch (error) {
      call.enter('failed', { error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  private async execute(operation: TransportOperation, params: DeviceRecord, filters: FilterSet = [], context: ErrorContext = {}): Promise<DeviceRecord[]> {
    try {
      return await this.transport.execute({ operation, path: this.schema.path, params, filters });
    } catch (error) {
      throw translateTransportError(error, { ...context, operation, kind: this.schema.name });
    }
  }

  private async readAll(): Promise<DeviceRecord[]> {
    return this.execute('read', {});
  }

  private async findRecord(identity: Identity, filters: FilterSet = []): Promise<DeviceRecord> {
    const records = await this.execute('read', {}, [this.resolver.toFilter(identity), ...filters], { identity: formatIdentity(identity) });
    return this.resolver.find(identity, records);
  }

  /** The record addressed by `identity`, plus the full list when placement has to be checked */
  private async observe(identity: Identity): Promise<Observation> {
    if (!this.schema.ordering) {
      const record = await this.findRecord(identity);
      return { record, list: [record] };
    }

    const list = await this.readAll();
    return { record: this.resolver.find(identity, list), list };
  }

  private toResource(record: DeviceRecord): ObservedResource {
    return {
      kind: this.schema.name,
      identity: this.resolver.identityOf(record),
      instance: decode(record, this.schema, { logger: this.logger }),
    };
  }

  private hasComputedFields(record: DeviceRecord): boolean {
    const decoded = decode(record, this.schema);
    return Object.keys(decoded).some((name) => this.schema.fields[name]?.computed);
  }

  private mergeComputed(desired: TypedInstance, record: DeviceRecord): TypedInstance {
    const observed = decode(record, this.schema, { logger: this.logger });
    const merged: TypedInstance = { ...desired };

    for (const [name, value] of Object.entries(observed)) {
      const field = this.schema.fields[name];
      if (field && (isComputedOnly(field) || (field.computed && merged[name] === undefined))) merged[name] = value;
    }

    return merged;
  }

  /** One `add` command; returns the device-assigned id and the response record */
  private async executeCreate(params: DeviceRecord): Promise<{ id: string; response: DeviceRecord }> {
    const records = await this.execute('add', params);
    const response = records[0] ?? {};
    const id = response[ID_WIRE_KEY] ?? response.ret;
    if (!id) throw new DecodeError('create response carried no id', { kind: this.schema.name, operation: 'add' });

    return { id, response: { ...response, [ID_WIRE_KEY]: id } };
  }

  /** Issues one command per planned action; returns the opaque id the instance ends up with */
  private async executeActions(actions: PlanAction[], currentId: string | undefined): Promise<string | undefined> {
    let id = currentId;

    for (const action of actions) {
      const target = action.identity?.kind === 'id' ? action.identity.value : id;
      const context = target === undefined ? {} : { identity: target };

      switch (action.type) {
        case 'CREATE': {
          ({ id } = await this.executeCreate(action.params ?? {}));
          break;
        }
        case 'UPDATE': {
          await this.execute('set', { [ID_WIRE_KEY]: target ?? '', ...action.params }, [], context);
          break;
        }
        case 'MOVE': {
          await this.execute('move', { numbers: target ?? '', destination: action.destination ?? '' }, [], context);
          break;
        }
        case 'DELETE': {
          await this.execute('remove', { [ID_WIRE_KEY]: target ?? '' }, [], context);
          id = undefined;
          break;
        }
        case 'NO_OP': {
          break;
        }
        default: {
          throw new Error(`Unknown action type: ${action.type}`);
        }
      }
    }

    return id;
  }

  async create(instance: TypedInstance): Promise<ObservedResource> {
    const { resource } = await this.createWithPlan(instance);
    return resource;
  }

  private async createWithPlan(instance: TypedInstance): Promise<ReconcileResult> {
    return this.run('create', async (call) => {
      validateInstance(this.schema, instance);
      const desired = applyDefaults(this.schema, instance);
      const actions = planResource({ schema: this.schema, desired });
      const params = actions[0]?.params ?? {};

      call.enter('executing', { params });
      const { id, response } = await this.executeCreate(params);

      call.enter('verifying', { id });
      const complete = this.hasComputedFields(response) && this.resolver.carriesIdentity(response);
      const record = complete ? response : await this.findRecord(opaqueId(id));

      return {
        actions,
        resource: { kind: this.schema.name, identity: this.resolver.identityOf(record), instance: this.mergeComputed(desired, record) },
      };
    });
  }

  async read(identity: Identity, filters: FilterSet = []): Promise<ObservedResource> {
    return this.run('read', async (call) => {
      call.enter('executing', { identity: formatIdentity(identity) });
      const record = await this.findRecord(identity, filters);

      call.enter('verifying');
      return this.toResource(record);
    });
  }

  async update(identity: Identity, instance: TypedInstance): Promise<ObservedResource> {
    const { resource } = await this.run('update', async (call) => {
      validateInstance(this.schema, instance);
      return this.converge(call, identity, instance, await this.observe(identity));
    });
    return resource;
  }

  private async converge(call: Call, identity: Identity, instance: TypedInstance, observed: Observation): Promise<ReconcileResult> {
    const { record, list } = observed;
    const current = this.toResource(record);
    const actions = planResource({ schema: this.schema, desired: instance, observed: record, observedList: list });

    if (actions.every((action) => action.type === 'NO_OP')) return { actions, resource: current };

    call.enter('executing', { actions: actions.map((a) => a.type) });
    const id = await this.executeActions(actions, this.resolver.resolve(identity, list).value);
    if (id === undefined) throw new DecodeError('instance has no id after update', { kind: this.schema.name, identity: formatIdentity(identity) });

    call.enter('verifying', { id });
    return { actions, resource: this.toResource(await this.findRecord(opaqueId(id))) };
  }

  async delete(identity: Identity): Promise<void> {
    await this.run('delete', async (call) => {
      const records = await this.execute('read', {}, [this.resolver.toFilter(identity)], { identity: formatIdentity(identity) });
      const { value: id } = this.resolver.resolve(identity, records);

      call.enter('executing', { id });
      await this.execute('remove', { [ID_WIRE_KEY]: id }, [], { identity: formatIdentity(identity) });
    });
  }

  /** Reads the addressed instance, or undefined when the device no longer has it */
  private async observeIfPresent(identity: Identity): Promise<Observation | undefined> {
    try {
      return await this.observe(identity);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  /**
   * Planning only: reads the device and reports what `reconcile` would do.
   */
  async plan(instance: TypedInstance, identity?: Identity): Promise<PlanAction[]> {
    return this.run('plan', async () => {
      validateInstance(this.schema, instance);
      const observed = identity ? await this.observeIfPresent(identity) : undefined;
      if (!observed) return planResource({ schema: this.schema, desired: applyDefaults(this.schema, instance) });

      // Surfaces a DecodeError before anything is compared.
      decode(observed.record, this.schema);
      return planResource({ schema: this.schema, desired: instance, observed: observed.record, observedList: observed.list });
    });
  }

  /**
   * Converges the device onto `desired`. Without a prior identity, or when the instance was removed
   * out-of-band, the instance is created. Creating is not idempotent: retrying a failed create may
   * leave a duplicate on the device.
   */
  async reconcile(desired: TypedInstance, identity?: Identity): Promise<ReconcileResult> {
    validateInstance(this.schema, desired);
    const observed = identity ? await this.observeIfPresent(identity) : undefined;
    if (identity && observed) return this.run('update', (call) => this.converge(call, identity, desired, observed));

    if (identity) colorizedDebug(this.logger, `${this.schema.name}: drift detected, recreating`, { identity: formatIdentity(identity) });
    return this.createWithPlan(desired);
  }
}
