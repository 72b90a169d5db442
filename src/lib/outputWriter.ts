import fs from "node:fs";
import path from "node:path";
import type { DocumentVariant } from "./assembler.ts";
import { OutputWriteFailureError } from "./errors.ts";

export type WrittenExam = {
  testNumber: number;
  testPath: string;
  answerKeyPath: string;
};

export type RenderForNumber = (variant: DocumentVariant, testNumber: number) => string;

export const testFileNames = (testNumber: number) => ({
  test: `test_${testNumber}.tex`,
  answerKey: `test_${testNumber}_answers.tex`,
});

export const ensureOutputDir = (outputDir: string) => {
  let isDirectory = false;
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    isDirectory = fs.statSync(outputDir).isDirectory();
  } catch (err) {
    throw new OutputWriteFailureError(outputDir, { cause: err });
  }
  if (!isDirectory) {
    throw new OutputWriteFailureError(outputDir);
  }
};

export const findNextTestNumber = (outputDir: string) => {
  let testNumber = 1;
  for (;;) {
    const names = testFileNames(testNumber);
    if (
      !fs.existsSync(path.join(outputDir, names.test)) &&
      !fs.existsSync(path.join(outputDir, names.answerKey))
    ) {
      return testNumber;
    }
    testNumber += 1;
  }
};

const writeExclusive = (filePath: string, contents: string) => {
  try {
    fs.writeFileSync(filePath, contents, { flag: "wx" });
  } catch (err) {
    throw new OutputWriteFailureError(filePath, { cause: err });
  }
};

export const writeExamFiles = (
  outputDir: string,
  render: RenderForNumber,
): WrittenExam => {
  ensureOutputDir(outputDir);
  const testNumber = findNextTestNumber(outputDir);
  const names = testFileNames(testNumber);
  const testPath = path.join(outputDir, names.test);
  const answerKeyPath = path.join(outputDir, names.answerKey);
  const testText = render("test", testNumber);
  const answerKeyText = render("answer-key", testNumber);

  writeExclusive(testPath, testText);
  try {
    writeExclusive(answerKeyPath, answerKeyText);
  } catch (err) {
    fs.rmSync(testPath, { force: true });
    throw err;
  }
  return { testNumber, testPath, answerKeyPath };
};
