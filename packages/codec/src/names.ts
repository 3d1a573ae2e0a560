import { FieldSchema, ResourceSchema } from '@netform/contracts';

export function toWireName(fieldName: string, field?: FieldSchema): string {
  return field?.wireName ?? fieldName.replaceAll('_', '-');
}

/** Wire key -> field name for every field the schema declares */
export function wireIndex(schema: ResourceSchema): Map<string, string> {
  const index = new Map<string, string>();
  for (const [name, field] of Object.entries(schema.fields)) index.set(toWireName(name, field), name);
  return index;
}
