import { Identity, IProvider, isNotFound, TypedInstance, ValidationError } from '@netform/contracts';
import { ReconcileResult } from '@netform/engine';
import { DependencyGraph } from '@netform/graph';
import { Logger, silentLogger } from '@netform/logger';
import { planDelete, PlanAction } from '@netform/planner';
import { IState, IStateEntry, StateManager } from '@netform/state';

import { DesiredResource, parseDocument } from './document';
import { KNOWN_AFTER_APPLY, Reference, ReferenceLookup, referencesOf, resolveReferences } from './references';

/** A provider that can also plan and converge, such as an engine-backed one */
export interface IReconcilingProvider extends IProvider {
  plan(kind: string, instance: TypedInstance, identity?: Identity): Promise<PlanAction[]>;
  reconcile(kind: string, desired: TypedInstance, identity?: Identity): Promise<ReconcileResult>;
}

export interface ResourcePlan {
  address: string;
  actions: PlanAction[];
}

export interface OrchestratorOptions {
  logger?: Logger;
}

interface DesiredNode extends DesiredResource {
  dependsOn: string[];
}

function attributeOf(entry: IStateEntry, attribute: string): string | undefined {
  if (attribute === 'id') return entry.identity.value;

  const value = entry.attributes[attribute];
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

export class Orchestrator {
  private providers: Map<string, IReconcilingProvider> = new Map();
  private logger: Logger;

  constructor(
    private readonly stateManager: StateManager,
    options: OrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Register a provider for the resource kinds it serves
   */
  registerProvider(provider: IReconcilingProvider): void {
    for (const kind of provider.resources) {
      if (this.providers.has(kind)) throw new Error(`Provider for resource kind "${kind}" already registered`);

      this.providers.set(kind, provider);
    }
  }

  get kinds(): string[] {
    return [...this.providers.keys()];
  }

  private provider(kind: string): IReconcilingProvider {
    const provider = this.providers.get(kind);
    if (!provider) throw new ValidationError(`No provider registered for resource kind "${kind}"`);
    return provider;
  }

  /** Desired resources in apply order, dependencies first */
  private load(content: string): DesiredNode[] {
    const nodes: DesiredNode[] = parseDocument(content).map(({ address, instance }) => {
      this.provider(address.kind);
      return { address, instance, dependsOn: [...new Set(referencesOf(instance).map((reference) => reference.address))] };
    });

    const graph = new DependencyGraph<DesiredNode>();
    for (const node of nodes) graph.addNode(node.address.toString(), node);

    for (const node of nodes)
      for (const dependency of node.dependsOn) {
        if (!graph.hasNode(dependency)) throw new ValidationError(`Resource "${node.address.toString()}" references undeclared resource "${dependency}"`);
        graph.addDependency(node.address.toString(), dependency);
      }

    return graph.order().flatMap((key) => graph.getNode(key) ?? []);
  }

  private lookup(state: IState, from: string, strict: boolean): ReferenceLookup {
    return (reference: Reference) => {
      const entry = state.resources[reference.address];
      const value = entry ? attributeOf(entry, reference.attribute) : undefined;
      if (value !== undefined) return value;
      if (!strict) return KNOWN_AFTER_APPLY;

      throw new ValidationError(`Resource "${from}" references "${reference.address}.${reference.attribute}", which has no value in state`);
    };
  }

  /** Addresses in state that the document no longer declares, dependents first */
  private orphans(state: IState, desired: DesiredNode[]): string[] {
    const declared = new Set(desired.map((node) => node.address.toString()));
    return this.teardownOrder(state).filter((address) => !declared.has(address));
  }

  private teardownOrder(state: IState): string[] {
    const graph = new DependencyGraph<IStateEntry>();
    for (const [address, entry] of Object.entries(state.resources)) graph.addNode(address, entry);

    for (const [address, entry] of Object.entries(state.resources))
      for (const dependency of entry.dependsOn ?? []) if (graph.hasNode(dependency)) graph.addDependency(address, dependency);

    return graph.reverseOrder();
  }

  /**
   * Checks the document against the registered schemas without reading state or the device.
   */
  validate(content: string): DesiredResource[] {
    const nodes = this.load(content);
    for (const { address, instance } of nodes)
      this.provider(address.kind).validate(address.kind, resolveReferences(instance, () => KNOWN_AFTER_APPLY));

    return nodes;
  }

  /**
   * Generate an execution plan without applying it. Reads the device, never writes to it.
   */
  async plan(content: string): Promise<ResourcePlan[]> {
    const desired = this.load(content);
    const state = await this.stateManager.read();
    const plans: ResourcePlan[] = [];

    for (const { address, instance } of desired) {
      const key = address.toString();
      const resolved = resolveReferences(instance, this.lookup(state, key, false));
      const actions = await this.provider(address.kind).plan(address.kind, resolved, state.resources[key]?.identity);
      plans.push({ address: key, actions });
    }

    for (const key of this.orphans(state, desired)) {
      const entry = state.resources[key];
      plans.push({ address: key, actions: planDelete(this.provider(entry.kind).fields(entry.kind), entry.identity) });
    }

    return plans;
  }

  async apply(content: string): Promise<ResourcePlan[]> {
    const desired = this.load(content);

    return this.withState(async (state) => {
      const applied: ResourcePlan[] = [];

      for (const { address, instance, dependsOn } of desired) {
        const key = address.toString();
        const resolved = resolveReferences(instance, this.lookup(state, key, true));
        const { actions, resource } = await this.provider(address.kind).reconcile(address.kind, resolved, state.resources[key]?.identity);

        state.resources[key] = { kind: address.kind, name: address.name, identity: resource.identity, attributes: resource.instance, dependsOn };
        this.logger.info({ address: key, actions: actions.map((action) => action.type) }, 'applied');
        applied.push({ address: key, actions });
      }

      for (const key of this.orphans(state, desired)) applied.push(await this.remove(state, key));

      return applied;
    });
  }

  /** What `destroy` would delete, in the order it would delete it */
  async planDestroy(): Promise<ResourcePlan[]> {
    const state = await this.stateManager.read();

    return this.teardownOrder(state).map((key) => {
      const entry = state.resources[key];
      return { address: key, actions: planDelete(this.provider(entry.kind).fields(entry.kind), entry.identity) };
    });
  }

  /**
   * Deletes everything recorded in state, dependents first.
   */
  async destroy(): Promise<ResourcePlan[]> {
    return this.withState(async (state) => {
      const destroyed: ResourcePlan[] = [];
      for (const key of this.teardownOrder(state)) destroyed.push(await this.remove(state, key));
      return destroyed;
    });
  }

  private async remove(state: IState, key: string): Promise<ResourcePlan> {
    const entry = state.resources[key];
    const provider = this.provider(entry.kind);

    try {
      await provider.delete(entry.kind, entry.identity);
    } catch (error) {
      if (!isNotFound(error)) throw error;
      this.logger.warn({ address: key }, 'already removed from the device');
    }

    delete state.resources[key];
    this.logger.info({ address: key }, 'destroyed');
    return { address: key, actions: planDelete(provider.fields(entry.kind), entry.identity) };
  }

  /** Runs `body` under the state lock; whatever was applied is written back even when it fails */
  private async withState<T>(body: (state: IState) => Promise<T>): Promise<T> {
    await this.stateManager.lock();
    try {
      const state = await this.stateManager.read();
      try {
        return await body(state);
      } finally {
        await this.stateManager.write(state);
      }
    } finally {
      await this.stateManager.unlock();
    }
  }
}
