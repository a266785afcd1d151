/**
 * Go-style duration strings, as used by Flux `interval` and `timeout` fields
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

/**
 * Parse a duration such as `10m`, `1h30m` or `1.5s` into milliseconds.
 * Returns null when the string is not a valid duration.
 */
export function parseDuration(input: string): number | null {
  let text = input;
  let sign = 1;

  if (text.startsWith('-') || text.startsWith('+')) {
    sign = text.startsWith('-') ? -1 : 1;
    text = text.slice(1);
  }

  if (text === '0') return 0;
  if (text === '') return null;

  let total = 0;
  SEGMENT.lastIndex = 0;

  while (SEGMENT.lastIndex < text.length) {
    const match = SEGMENT.exec(text);
    if (!match) return null;
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }

  return sign * total;
}

export function isPositiveDuration(input: string): boolean {
  const ms = parseDuration(input);
  return ms !== null && ms > 0;
}
