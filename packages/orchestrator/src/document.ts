import { ensureError, TypedInstance, ValidationError } from '@netform/contracts';
import { z } from 'zod/v4';

import { Address } from './Address';

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string()), z.record(z.string(), z.string())]);

const documentSchema = z.strictObject({
  resources: z.record(z.string(), z.record(z.string(), fieldValueSchema)),
});

export interface DesiredResource {
  address: Address;
  instance: TypedInstance;
}

/**
 * Parses a `netform.json` document:
 *
 * ```json
 * { "resources": { "system_scheduler.nightly": { "name": "nightly", "interval": "1d" } } }
 * ```
 */
export function parseDocument(content: string): DesiredResource[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid configuration: ${ensureError(error).message}`);
  }

  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) throw new ValidationError(`Invalid configuration: ${z.prettifyError(parsed.error)}`);

  return Object.entries(parsed.data.resources).map(([address, instance]) => ({ address: Address.parse(address), instance }));
}
