import type { FilterSet, Identity, ObservedResource, TypedInstance } from './index';
import type { ResourceSchema } from './schema';

/** The contract every provider exposes to the hosting framework */
export interface IProvider {
  /** Resource kinds handled by this provider (e.g., ['system_scheduler', 'interface_vlan']) */
  readonly resources: string[];

  /** Schema introspection, used for documentation and input validation */
  fields(kind: string): ResourceSchema;

  /** Validates desired state against the resource schema. Throws ValidationError if invalid. */
  validate(kind: string, instance: TypedInstance): void;

  create(kind: string, instance: TypedInstance): Promise<ObservedResource>;
  read(kind: string, identity: Identity, filters?: FilterSet): Promise<ObservedResource>;
  update(kind: string, identity: Identity, instance: TypedInstance): Promise<ObservedResource>;
  delete(kind: string, identity: Identity): Promise<void>;
}

/**
 * Resource Handler Interface
 * Each resource kind (e.g., system_scheduler, ip_firewall_filter) is served by one handler
 */
export interface IResourceHandler {
  readonly schema: ResourceSchema;

  create(instance: TypedInstance): Promise<ObservedResource>;

  /**
   * Reads one instance; rejects with NotFoundError when the device has no match
   */
  read(identity: Identity, filters?: FilterSet): Promise<ObservedResource>;

  update(identity: Identity, instance: TypedInstance): Promise<ObservedResource>;

  delete(identity: Identity): Promise<void>;
}
