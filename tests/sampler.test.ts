import test from "node:test";
import assert from "node:assert/strict";
import { parseQuestionFragments } from "../src/lib/questionFile.ts";
import type { QuestionPool } from "../src/lib/questionPool.ts";
import { mulberry32 } from "../src/lib/random.ts";
import { samplePool, samplePools } from "../src/lib/sampler.ts";

const makePool = (drawCount: number): QuestionPool => ({
  name: "Mixed",
  drawCount,
  files: [
    { path: "a.tex", instructions: "A", fragments: parseQuestionFragments("A1\nA2\nA3\nA4", 0) },
    { path: "b.tex", instructions: "B", fragments: parseQuestionFragments("B1\nB2", 1) },
    { path: "c.tex", instructions: "C", fragments: parseQuestionFragments("C1\nC2\nC3", 2) },
  ],
});

test("draws exactly the configured number of distinct fragments", () => {
  const pool = makePool(6);
  const candidates = new Set(pool.files.flatMap((file) => file.fragments));
  for (let seed = 1; seed <= 20; seed += 1) {
    const sampled = samplePool(pool, mulberry32(seed));
    assert.equal(sampled.length, 6);
    assert.equal(new Set(sampled).size, 6);
    sampled.forEach((fragment) => assert.ok(candidates.has(fragment)));
  }
});

test("groups the draw by file in configured order", () => {
  const pool = makePool(5);
  for (let seed = 1; seed <= 20; seed += 1) {
    const indices = samplePool(pool, mulberry32(seed)).map(
      (fragment) => fragment.originFileIndex,
    );
    assert.deepEqual(indices, [...indices].sort((a, b) => a - b));
  }
});

const sequence = (...values: number[]) => {
  let index = 0;
  return () => values[index++ % values.length];
};

test("a generator stuck at zero draws in flattened order", () => {
  const identity = samplePool(makePool(9), () => 0).map((fragment) => fragment.text);
  assert.deepEqual(identity, ["A1", "A2", "A3", "A4", "B1", "B2", "C1", "C2", "C3"]);
});

test("groups by file but keeps the draw order within a file", () => {
  // Draws C3, then C1, then A3.
  const sampled = samplePool(makePool(3), sequence(0.9999, 0.65, 0));
  assert.deepEqual(
    sampled.map((fragment) => fragment.text),
    ["A3", "C3", "C1"],
  );
});

test("every file can contribute", () => {
  const pool = makePool(2);
  const seen = new Set<number>();
  for (let seed = 1; seed <= 200; seed += 1) {
    samplePool(pool, mulberry32(seed)).forEach((fragment) =>
      seen.add(fragment.originFileIndex),
    );
  }
  assert.deepEqual([...seen].sort(), [0, 1, 2]);
});

test("a zero draw yields nothing", () => {
  assert.deepEqual(samplePool(makePool(0), mulberry32(1)), []);
});

test("samples each pool in order", () => {
  const first = makePool(1);
  const second = makePool(2);
  const samples = samplePools([first, second], mulberry32(5));
  assert.equal(samples[0].pool, first);
  assert.equal(samples[0].questions.length, 1);
  assert.equal(samples[1].pool, second);
  assert.equal(samples[1].questions.length, 2);
});
