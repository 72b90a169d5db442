import type { QuestionPool } from "./questionPool.ts";
import type { QuestionFragment } from "./questionFile.ts";
import { sampleWithoutReplacement, type Rng } from "./random.ts";

export type SampledQuestion = QuestionFragment;

export type SampledPool = {
  pool: QuestionPool;
  questions: SampledQuestion[];
};

export const samplePool = (pool: QuestionPool, rng: Rng): SampledQuestion[] => {
  const tagged = pool.files.flatMap((file) => file.fragments);
  const chosen = sampleWithoutReplacement(tagged, pool.drawCount, rng);
  // Array.prototype.sort is stable.
  return chosen.sort((a, b) => a.originFileIndex - b.originFileIndex);
};

export const samplePools = (pools: QuestionPool[], rng: Rng): SampledPool[] =>
  pools.map((pool) => ({ pool, questions: samplePool(pool, rng) }));
