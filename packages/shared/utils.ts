export const clamp = (value: number, min: number, max: number) =>
  Math.max(min, Math.min(max, value));
export const round = (value: number, decimals = 0) => {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
};
export const mean = (values: readonly number[]) =>
  values.reduce((acc, v) => acc + v, 0) / values.length;
export const range = (n: number) => Array.from({ length: n }, (_, i) => i);

/** Expand a 32-bit seed into well-mixed words (splitmix32) */
const splitmix32 = (seed: number) => () => {
  seed = (seed + 0x9e3779b9) | 0;
  let z = seed;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
  return (z ^ (z >>> 16)) >>> 0;
};
/**
 * Seeded uniform generator in `[0, 1)`
 *
 * @example
 *
 * ```ts
 * const rand = xorshift128(42);
 * rand(); // same value on every run
 * ```
 */
export function xorshift128(seed: number): () => number {
  const next = splitmix32(seed);
  let x = next(),
    y = next(),
    z = next(),
    w = next();
  return () => {
    const t = x ^ (x << 11);
    x = y;
    y = z;
    z = w;
    w = (w ^ (w >>> 19) ^ (t ^ (t >>> 8))) >>> 0;
    return w / 0x100000000;
  };
}

let source: () => number = Math.random;
/** Process-wide random source, `Math.random` unless {@link seed} was called */
export const random = () => source();
/**
 * Make every later shuffle reproducible
 *
 * @param value Seed, omit it to go back to `Math.random`
 */
export function seed(value?: number) {
  source = typeof value === 'number' ? xorshift128(value) : Math.random;
}

/** Fisher–Yates shuffle, returns a new array */
export function shuffle<T>(items: readonly T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
