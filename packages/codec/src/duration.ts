const UNIT_MS = new Map<string, number>([
  ['ms', 1],
  ['s', 1000],
  ['m', 60_000],
  ['M', 60_000],
  ['h', 3_600_000],
  ['d', 86_400_000],
  ['w', 604_800_000],
]);

const FORMAT_UNITS: [string, number][] = [
  ['w', 604_800_000],
  ['d', 86_400_000],
  ['h', 3_600_000],
  ['m', 60_000],
  ['s', 1000],
  ['ms', 1],
];

function parseMilliseconds(text: string): number | undefined {
  if (text === '') return undefined;

  const token = /(\d+)(ms|s|m|M|h|d|w)?/y;
  let total = 0;
  let pos = 0;

  while (pos < text.length) {
    token.lastIndex = pos;
    const match = token.exec(text);
    if (!match) return undefined;

    // No unit means seconds
    const factor = UNIT_MS.get(match[2] ?? 's');
    if (factor === undefined) return undefined;

    total += Number(match[1]) * factor;
    pos = token.lastIndex;
  }

  return total;
}

/**
 * Parses a sequence of `<integer><unit>` tokens (`1h30m`, `3600s`, `500ms`, `90`) into seconds.
 * Returns undefined when the text is not a duration.
 */
export function parseDuration(text: string): number | undefined {
  const ms = parseMilliseconds(text);
  return ms === undefined ? undefined : ms / 1000;
}

/** Formats seconds as the compact form the device prints, e.g. `1d2h3m` */
export function formatDuration(seconds: number): string {
  let remaining = Math.round(seconds * 1000);
  if (remaining === 0) return '0s';

  let out = '';
  for (const [unit, size] of FORMAT_UNITS) {
    const count = Math.floor(remaining / size);
    if (count > 0) {
      out += `${count}${unit}`;
      remaining -= count * size;
    }
  }
  return out;
}

export function isDuration(text: string): boolean {
  return parseMilliseconds(text) !== undefined;
}
