import { encode, wireIndex } from '@netform/codec';
import {
  DecodeError,
  DeviceRecord,
  ID_WIRE_KEY,
  Identity,
  opaqueId,
  ResourceSchema,
  TypedInstance,
} from '@netform/contracts';

export type ActionType = 'CREATE' | 'UPDATE' | 'DELETE' | 'NO_OP' | 'MOVE';

export interface FieldChange {
  old: string | undefined;
  new: string;
}

export interface PlanAction {
  type: ActionType;
  kind: string;
  identity?: Identity;
  /** Wire parameters: the full record for CREATE, changed fields only for UPDATE */
  params?: DeviceRecord;
  changes?: Record<string, FieldChange>;
  /** MOVE target: id of the item to be placed before */
  destination?: string;
}

export interface PlanInput {
  schema: ResourceSchema;
  /** Desired state, defaults already applied */
  desired: TypedInstance;
  /** Current device record, absent when the instance does not exist */
  observed?: DeviceRecord;
  /** Every record under the schema path in device order, used for placement */
  observedList?: DeviceRecord[];
}

export interface PlanSummary {
  create: number;
  update: number;
  delete: number;
  move: number;
}

/**
 * Compares only the fields present in `desired`. Values go through the field's diff suppressor;
 * a field the device did not report reads as the empty string.
 */
export function calculateDiff(schema: ResourceSchema, desired: DeviceRecord, observed: DeviceRecord): Record<string, FieldChange> | null {
  const index = wireIndex(schema);
  const changes: Record<string, FieldChange> = {};
  let hasChanges = false;

  for (const [wireKey, newValue] of Object.entries(desired)) {
    const name = index.get(wireKey);
    if (name === undefined || name === schema.ordering?.field) continue;

    const field = schema.fields[name];
    const oldValue = observed[wireKey];
    const oldRaw = oldValue ?? '';
    if (oldRaw === newValue || field?.suppressDiff?.(oldRaw, newValue)) continue;

    changes[name] = { old: oldValue, new: newValue };
    hasChanges = true;
  }

  return hasChanges ? changes : null;
}

/** Id of the record that follows `id` in device order, '' when it is last */
export function nextSibling(list: DeviceRecord[], id: string): string {
  const at = list.findIndex((record) => record[ID_WIRE_KEY] === id);
  if (at === -1) return '';
  return list[at + 1]?.[ID_WIRE_KEY] ?? '';
}

function pickChanged(desired: DeviceRecord, schema: ResourceSchema, changes: Record<string, FieldChange>): DeviceRecord {
  const index = wireIndex(schema);
  const params: DeviceRecord = {};
  for (const [wireKey, value] of Object.entries(desired)) {
    const name = index.get(wireKey);
    if (name !== undefined && changes[name]) params[wireKey] = value;
  }
  return params;
}

function placementChanged(input: PlanInput, id: string): string | undefined {
  const { schema, desired, observedList } = input;
  if (!schema.ordering) return undefined;

  const wanted = desired[schema.ordering.field];
  if (wanted === undefined || wanted === '') return undefined;

  const destination = String(wanted);
  if (destination === id) return undefined;

  return nextSibling(observedList ?? [], id) === destination ? undefined : destination;
}

/**
 * Decides the operations that converge one instance: CREATE, UPDATE, MOVE, DELETE + CREATE, or NO_OP.
 */
export function planResource(input: PlanInput): PlanAction[] {
  const { schema, desired, observed } = input;
  const desiredRecord = encode(desired, schema);
  const kind = schema.name;

  if (!observed) return [{ type: 'CREATE', kind, params: desiredRecord }];

  const id = observed[ID_WIRE_KEY];
  if (!id) throw new DecodeError('device record carries no id', { kind });
  const identity = opaqueId(id);

  const changes = calculateDiff(schema, desiredRecord, observed);
  const forcesNew = changes !== null && Object.keys(changes).some((name) => schema.fields[name]?.forceNew);
  const destination = placementChanged(input, id);
  const recreateForPlacement = destination !== undefined && schema.ordering?.strategy === 'recreate';

  if (forcesNew || recreateForPlacement)
    return [
      { type: 'DELETE', kind, identity },
      { type: 'CREATE', kind, params: desiredRecord, changes: changes ?? undefined },
    ];

  const actions: PlanAction[] = [];
  if (changes) actions.push({ type: 'UPDATE', kind, identity, params: pickChanged(desiredRecord, schema, changes), changes });
  if (destination !== undefined) actions.push({ type: 'MOVE', kind, identity, destination });

  return actions.length > 0 ? actions : [{ type: 'NO_OP', kind, identity }];
}

export function planDelete(schema: ResourceSchema, identity: Identity): PlanAction[] {
  return [{ type: 'DELETE', kind: schema.name, identity }];
}

export function isNoOp(actions: PlanAction[]): boolean {
  return actions.every((action) => action.type === 'NO_OP');
}

export function summarizePlan(actions: PlanAction[]): PlanSummary {
  return {
    create: actions.filter((a) => a.type === 'CREATE').length,
    update: actions.filter((a) => a.type === 'UPDATE').length,
    delete: actions.filter((a) => a.type === 'DELETE').length,
    move: actions.filter((a) => a.type === 'MOVE').length,
  };
}
