import type { FieldValue, IdType } from './index';

export type SchemaType = 'string' | 'int' | 'bool' | 'list' | 'map';

/** Returns an error message, or undefined when the value is acceptable */
export type Validator = (value: FieldValue) => string | undefined;

/** Declares two raw wire values semantically equal */
export type DiffSuppressor = (oldRaw: string, newRaw: string) => boolean;

export type FieldFormat = 'duration' | 'hex' | 'int_or_auto';

export interface FieldSchema {
  type: SchemaType;
  required?: boolean;
  optional?: boolean;
  /** Set by the device. Without `optional` the caller may never supply it. */
  computed?: boolean;
  default?: FieldValue;
  description?: string;
  validate?: Validator;
  suppressDiff?: DiffSuppressor;
  forceNew?: boolean; // If true, a change to this field forces replacement (Delete -> Create)
  format?: FieldFormat;
  boolStyle?: 'true_false' | 'yes_no';
  /** Separator for list elements and map fragments, `,` when unset */
  delimiter?: string;
  range?: readonly [number, number];
  /** Device-side key when it is not the kebab-case form of the field name */
  wireName?: string;
}

export type OrderingStrategy = 'move' | 'recreate';

export interface OrderingRule {
  /** Field holding the id of the item this one is placed before */
  field: string;
  strategy: OrderingStrategy;
}

export interface ResourceSchema {
  name: string;
  path: string;
  idType: IdType;
  /** Natural key field, `name` when unset */
  keyField?: string;
  ordering?: OrderingRule;
  description?: string;
  fields: Readonly<Record<string, FieldSchema>>;
}

export function isComputedOnly(field: FieldSchema): boolean {
  return field.computed === true && !field.optional && !field.required;
}
