export type Rng = () => number;

export const mulberry32 = (seed: number): Rng => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let result = Math.imul(t ^ (t >>> 15), 1 | t);
    result ^= result + Math.imul(result ^ (result >>> 7), 61 | result);
    return ((result ^ (result >>> 14)) >>> 0) / 4294967296;
  };
};

export const hashStringToSeed = (value: string) => {
  let hash = 0;
  for (let i = 0; i < value.length; i += 1) {
    hash = (hash * 31 + value.charCodeAt(i)) >>> 0;
  }
  return hash || 1;
};

export const createRng = (seed?: number | string): Rng => {
  if (seed === undefined) {
    return Math.random;
  }
  return mulberry32(typeof seed === "number" ? seed : hashStringToSeed(seed));
};

export const parseSeed = (value: string): number | string =>
  /^\d+$/.test(value) ? Number(value) : value;

export const pickIndex = (rng: Rng, size: number) =>
  Math.min(size - 1, Math.floor(rng() * size));

export const sampleWithoutReplacement = <T,>(
  items: readonly T[],
  count: number,
  rng: Rng,
): T[] => {
  if (!Number.isInteger(count) || count < 0 || count > items.length) {
    throw new RangeError(
      `Cannot draw ${count} items from a pool of ${items.length}.`,
    );
  }
  const pool = [...items];
  const drawn: T[] = [];
  for (let i = 0; i < count; i += 1) {
    const j = i + pickIndex(rng, pool.length - i);
    [pool[i], pool[j]] = [pool[j], pool[i]];
    drawn.push(pool[i]);
  }
  return drawn;
};
