/** A source of uniform numbers in [0, 1). `Math.random` is one. */
export type Random = () => number

/** Small seeded generator (mulberry32) for repeatable runs. */
export function seededRandom(seed: number): Random {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Integer in [min, max], both inclusive. */
export const randInt = (random: Random, min: number, max: number) =>
  min + Math.floor(random() * (max - min + 1))

export function pickWeighted<T extends string>(
  random: Random,
  options: readonly T[],
  weights: Readonly<Record<T, number>>,
  fallback: T,
): T {
  const total = options.reduce((sum, k) => sum + weights[k], 0)
  if (total <= 0) return fallback
  let roll = random() * total
  for (const k of options) {
    roll -= weights[k]
    if (roll < 0) return k
  }
  return fallback
}
