import { FieldSchema, ResourceSchema, ValidationError } from '@netform/contracts';

function freezeSchema(schema: ResourceSchema): ResourceSchema {
  const fields: Record<string, FieldSchema> = {};
  for (const [name, field] of Object.entries(schema.fields)) fields[name] = Object.freeze({ ...field });

  return Object.freeze({
    ...schema,
    ordering: schema.ordering ? Object.freeze({ ...schema.ordering }) : undefined,
    fields: Object.freeze(fields),
  });
}

/**
 * Resource schemas by kind. Filled once at start-up, then frozen and shared read-only.
 */
export class SchemaRegistry {
  private schemas: Map<string, ResourceSchema> = new Map();
  private frozen = false;

  static build(schemas: ResourceSchema[]): SchemaRegistry {
    const registry = new SchemaRegistry();
    for (const schema of schemas) registry.register(schema);
    return registry.freeze();
  }

  register(schema: ResourceSchema): this {
    if (this.frozen) throw new Error(`Registry is frozen, cannot register "${schema.name}"`);
    if (this.schemas.has(schema.name)) throw new Error(`Schema for resource kind "${schema.name}" already registered`);

    const keyField = schema.keyField ?? 'name';
    if (schema.idType === 'name' && !schema.fields[keyField]) throw new Error(`Schema "${schema.name}" is keyed by "${keyField}" but does not declare it`);
    if (schema.ordering && !schema.fields[schema.ordering.field])
      throw new Error(`Schema "${schema.name}" orders by "${schema.ordering.field}" but does not declare it`);

    this.schemas.set(schema.name, freezeSchema(schema));
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(kind: string): boolean {
    return this.schemas.has(kind);
  }

  kinds(): string[] {
    return [...this.schemas.keys()];
  }

  /** Looks up the schema of a resource kind */
  define(name: string): ResourceSchema {
    const schema = this.schemas.get(name);
    if (!schema) throw new ValidationError(`Unsupported resource kind: ${name}`);
    return schema;
  }

  fields(kind: string): Readonly<Record<string, FieldSchema>> {
    return this.define(kind).fields;
  }
}
