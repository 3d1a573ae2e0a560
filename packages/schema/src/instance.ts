import { checkFieldType } from '@netform/codec';
import { isComputedOnly, ResourceSchema, TypedInstance, ValidationError } from '@netform/contracts';

/**
 * Checks desired state against its schema before anything is sent to the device.
 */
export function validateInstance(schema: ResourceSchema, instance: TypedInstance): void {
  for (const [name, value] of Object.entries(instance)) {
    const field = schema.fields[name];
    if (!field) throw new ValidationError('unknown field', { kind: schema.name, field: name });
    if (isComputedOnly(field)) throw new ValidationError('computed field cannot be set', { kind: schema.name, field: name });

    const typeError = checkFieldType(field, value);
    if (typeError) throw new ValidationError(typeError, { kind: schema.name, field: name });

    const invalid = field.validate?.(value);
    if (invalid) throw new ValidationError(invalid, { kind: schema.name, field: name });
  }

  for (const [name, field] of Object.entries(schema.fields))
    if (field.required && instance[name] === undefined) throw new ValidationError('required field is missing', { kind: schema.name, field: name });
}

export function applyDefaults(schema: ResourceSchema, instance: TypedInstance): TypedInstance {
  const result: TypedInstance = { ...instance };
  for (const [name, field] of Object.entries(schema.fields))
    if (result[name] === undefined && field.default !== undefined && !isComputedOnly(field)) result[name] = field.default;

  return result;
}

/** Natural key field of a schema */
export function keyFieldOf(schema: ResourceSchema): string {
  return schema.keyField ?? 'name';
}
