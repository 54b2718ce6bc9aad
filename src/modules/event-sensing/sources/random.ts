import type { RandomSource } from "../types.js";

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.min(max - min, Math.floor(random() * (max - min + 1)));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[randomInt(random, 0, items.length - 1)];
}

/** Picks `count` distinct items (partial Fisher-Yates over a copy). */
export function sample<T>(random: RandomSource, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  const limit = Math.min(count, pool.length);

  for (let index = 0; index < limit; index += 1) {
    const swapIndex = randomInt(random, index, pool.length - 1);
    const current = pool[index];
    const chosen = pool[swapIndex];
    if (current === undefined || chosen === undefined) {
      break;
    }
    pool[index] = chosen;
    pool[swapIndex] = current;
    picked.push(chosen);
  }
  return picked;
}
