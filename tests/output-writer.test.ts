import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  ensureOutputDir,
  findNextTestNumber,
  testFileNames,
  writeExamFiles,
} from "../src/lib/outputWriter.ts";
import { OutputWriteFailureError } from "../src/lib/errors.ts";

const withTempDir = (fn: (dir: string) => void) => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "exam-forge-"));
  try {
    fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
};

test("file names derive from the test number", () => {
  assert.deepEqual(testFileNames(4), {
    test: "test_4.tex",
    answerKey: "test_4_answers.tex",
  });
});

test("an empty directory starts at 1", () => {
  withTempDir((dir) => {
    assert.equal(findNextTestNumber(dir), 1);
  });
});

test("existing tests 1 and 2 lead to 3", () => {
  withTempDir((dir) => {
    for (const n of [1, 2]) {
      fs.writeFileSync(path.join(dir, `test_${n}.tex`), "");
      fs.writeFileSync(path.join(dir, `test_${n}_answers.tex`), "");
    }
    assert.equal(findNextTestNumber(dir), 3);
  });
});

test("either file of a pair marks its number as used", () => {
  withTempDir((dir) => {
    fs.writeFileSync(path.join(dir, "test_1.tex"), "");
    fs.writeFileSync(path.join(dir, "test_2_answers.tex"), "");
    assert.equal(findNextTestNumber(dir), 3);
  });
});

test("gaps are reused", () => {
  withTempDir((dir) => {
    fs.writeFileSync(path.join(dir, "test_2.tex"), "");
    assert.equal(findNextTestNumber(dir), 1);
  });
});

test("writes both documents rendered for the chosen number", () => {
  withTempDir((dir) => {
    const outputDir = path.join(dir, "out");
    fs.mkdirSync(outputDir);
    fs.writeFileSync(path.join(outputDir, "test_1.tex"), "old");
    const written = writeExamFiles(outputDir, (variant, n) => `${variant} ${n}`);
    assert.deepEqual(written, {
      testNumber: 2,
      testPath: path.join(outputDir, "test_2.tex"),
      answerKeyPath: path.join(outputDir, "test_2_answers.tex"),
    });
    assert.equal(fs.readFileSync(written.testPath, "utf8"), "test 2");
    assert.equal(fs.readFileSync(written.answerKeyPath, "utf8"), "answer-key 2");
    assert.equal(fs.readFileSync(path.join(outputDir, "test_1.tex"), "utf8"), "old");
  });
});

test("creates a missing output directory", () => {
  withTempDir((dir) => {
    const outputDir = path.join(dir, "nested", "tests");
    const written = writeExamFiles(outputDir, () => "");
    assert.equal(written.testNumber, 1);
    assert.ok(fs.statSync(outputDir).isDirectory());
  });
});

test("an existing directory is not an error", () => {
  withTempDir((dir) => {
    assert.doesNotThrow(() => ensureOutputDir(dir));
    assert.doesNotThrow(() => ensureOutputDir(dir));
  });
});

test("a file in place of the output directory is fatal", () => {
  withTempDir((dir) => {
    const blocked = path.join(dir, "tests");
    fs.writeFileSync(blocked, "not a directory");
    assert.throws(
      () => writeExamFiles(blocked, () => ""),
      (err: unknown) =>
        err instanceof OutputWriteFailureError &&
        err.outputPath === blocked &&
        err.code === "OUTPUT_WRITE_FAILURE",
    );
  });
});

test("a failed answer key write leaves no test file behind", () => {
  withTempDir((dir) => {
    // Something claims the answer key name after the number is chosen and before the write.
    const render = (variant: string, n: number) => {
      if (variant === "answer-key") {
        fs.mkdirSync(path.join(dir, testFileNames(n).answerKey));
      }
      return "x";
    };
    assert.throws(() => writeExamFiles(dir, render), OutputWriteFailureError);
    assert.ok(!fs.existsSync(path.join(dir, "test_1.tex")));
    assert.ok(fs.statSync(path.join(dir, "test_1_answers.tex")).isDirectory());
  });
});
