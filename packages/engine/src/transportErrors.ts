import { ensureError, ErrorContext, NetformError, NotFoundError, TransportError } from '@netform/contracts';

const NOT_FOUND_HINTS = ['no such item', 'not found'];

export function isNotFoundMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return NOT_FOUND_HINTS.some((hint) => lower.includes(hint));
}

/**
 * Maps an adapter failure onto the error taxonomy, keeping the device's text verbatim.
 */
export function translateTransportError(error: unknown, context: ErrorContext): NetformError {
  if (error instanceof NetformError) return error;

  const err = ensureError(error);
  if (isNotFoundMessage(err.message)) return new NotFoundError(err.message, context, { cause: err });
  return new TransportError(err.message, context, { cause: err });
}
