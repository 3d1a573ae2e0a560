import { parseDuration, parseInteger } from '@netform/codec';
import { DiffSuppressor, InvariantError } from '@netform/contracts';

/** Durations compare in seconds: `1h` equals `3600s` */
export const timeEqual: DiffSuppressor = (oldRaw, newRaw) => {
  if (oldRaw === newRaw) return true;
  if (oldRaw === '' || newRaw === '') return false;

  const oldSeconds = parseDuration(oldRaw);
  if (oldSeconds === undefined) throw new InvariantError(`[timeEqual] 'old' value "${oldRaw}" is not a duration`);

  const newSeconds = parseDuration(newRaw);
  if (newSeconds === undefined) throw new InvariantError(`[timeEqual] 'new' value "${newRaw}" is not a duration`);

  return oldSeconds === newSeconds;
};

/** Numbers compare by value: `0x10` equals `16` */
export const hexEqual: DiffSuppressor = (oldRaw, newRaw) => {
  if (oldRaw === newRaw) return true;
  if (oldRaw === '' || newRaw === '') return false;

  const oldNumber = parseInteger(oldRaw);
  if (oldNumber === undefined) throw new InvariantError(`[hexEqual] 'old' value "${oldRaw}" is not a number`);

  const newNumber = parseInteger(newRaw);
  if (newNumber === undefined) throw new InvariantError(`[hexEqual] 'new' value "${newRaw}" is not a number`);

  return oldNumber === newNumber;
};

/** Service fields the device never reports */
export const alwaysEqual: DiffSuppressor = () => true;
