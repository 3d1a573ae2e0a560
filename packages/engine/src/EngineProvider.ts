import { FilterSet, Identity, IProvider, ITransport, ObservedResource, ResourceSchema, TypedInstance } from '@netform/contracts';
import { PlanAction } from '@netform/planner';
import { SchemaRegistry, validateInstance } from '@netform/schema';

import { ReconcileResult, ResourceEngine, ResourceEngineOptions } from './ResourceEngine';

/**
 * Serves every kind of a frozen schema registry through one transport.
 */
export class EngineProvider implements IProvider {
  readonly resources: string[];
  private handlers: Map<string, ResourceEngine> = new Map();

  constructor(
    private readonly registry: SchemaRegistry,
    transport: ITransport,
    options: ResourceEngineOptions = {}
  ) {
    if (!registry.isFrozen) throw new Error('Schema registry must be frozen before it is served');

    this.resources = registry.kinds();
    for (const kind of this.resources) this.handlers.set(kind, new ResourceEngine(registry.define(kind), transport, options));
  }

  engine(kind: string): ResourceEngine {
    const handler = this.handlers.get(kind);
    if (!handler) {
      // Throws the ValidationError for unsupported kinds
      this.registry.define(kind);
      throw new Error(`No engine for resource kind: ${kind}`);
    }
    return handler;
  }

  fields(kind: string): ResourceSchema {
    return this.registry.define(kind);
  }

  validate(kind: string, instance: TypedInstance): void {
    validateInstance(this.registry.define(kind), instance);
  }

  async create(kind: string, instance: TypedInstance): Promise<ObservedResource> {
    return this.engine(kind).create(instance);
  }

  async read(kind: string, identity: Identity, filters: FilterSet = []): Promise<ObservedResource> {
    return this.engine(kind).read(identity, filters);
  }

  async update(kind: string, identity: Identity, instance: TypedInstance): Promise<ObservedResource> {
    return this.engine(kind).update(identity, instance);
  }

  async delete(kind: string, identity: Identity): Promise<void> {
    await this.engine(kind).delete(identity);
  }

  async plan(kind: string, instance: TypedInstance, identity?: Identity): Promise<PlanAction[]> {
    return this.engine(kind).plan(instance, identity);
  }

  async reconcile(kind: string, desired: TypedInstance, identity?: Identity): Promise<ReconcileResult> {
    return this.engine(kind).reconcile(desired, identity);
  }
}
