/**
 * Kubernetes resource quantities (`1500m`, `3.5G`, `12Gi`, `1e3`)
 */

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  n: 1e-9,
  u: 1e-6,
  m: 1e-3,
  '': 1,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
  Ei: 2 ** 60,
};

const QUANTITY_PATTERN =
  /^([+-]?(?:\d+(?:\.\d*)?|\.\d+))(?:([eE][+-]?\d+)|(Ki|Mi|Gi|Ti|Pi|Ei|n|u|m|k|M|G|T|P|E))?$/;

/**
 * Parse a quantity into its value in base units (cores, bytes).
 * Numbers are accepted as-is; anything unparsable returns null.
 */
export function parseQuantity(input: string | number): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }

  const match = QUANTITY_PATTERN.exec(input.trim());
  if (!match) return null;

  const [, digits, exponent, suffix] = match;
  const base = parseFloat(digits);

  if (exponent) {
    return base * 10 ** parseInt(exponent.slice(1), 10);
  }

  return base * SUFFIX_MULTIPLIERS[suffix ?? ''];
}

/**
 * Compare two quantities: negative when a < b, zero when equal, positive when a > b.
 * Returns null if either side does not parse.
 */
export function compareQuantities(a: string | number, b: string | number): number | null {
  const left = parseQuantity(a);
  const right = parseQuantity(b);
  if (left === null || right === null) return null;

  // Tolerate float noise from suffix arithmetic (e.g. 0.1 + 0.2 style)
  const epsilon = Math.max(Math.abs(left), Math.abs(right)) * 1e-12;
  if (Math.abs(left - right) <= epsilon) return 0;
  return left - right;
}
