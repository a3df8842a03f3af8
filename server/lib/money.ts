// Fixed-point helpers. Monetary values leave the engine at 2 places,
// rounded half-up; averages are carried at 6.

/** Round half-up (away from zero) to `places`, tolerant of binary float noise. */
export function roundHalfUp(n: number, places = 0): number {
  const factor = 10 ** places;
  const shifted = Math.abs(n) * factor;
  const rounded = Math.floor(shifted + 0.5 + 1e-9);
  return (Math.sign(n) * rounded) / factor || 0;
}

export function round2(n: number): number {
  return roundHalfUp(n, 2);
}

export function round4(n: number): number {
  return roundHalfUp(n, 4);
}

export function round6(n: number): number {
  return roundHalfUp(n, 6);
}

export function toCents(n: number): number {
  return roundHalfUp(n * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** Parses numeric driver output (number, numeric string or null) to a number. */
export function parseNum(val: unknown): number {
  if (typeof val === 'number') return Number.isFinite(val) ? val : 0;
  if (typeof val === 'string') {
    const n = parseFloat(val);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

/** True when `n` has no more than `places` decimals. */
export function hasAtMostDecimals(n: number, places: number): boolean {
  return Math.abs(roundHalfUp(n, places) - n) < 1e-9;
}
