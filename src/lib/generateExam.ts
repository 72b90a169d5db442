import fs from "node:fs";
import {
  applyVersionLabel,
  assembleExam,
  findUnusedPageBreaks,
  renderExamDocument,
} from "./assembler.ts";
import type { ExamConfig } from "./examConfig.ts";
import { getOutputDir, resolveConfigPath } from "./examConfig.ts";
import { TemplateUnreadableError } from "./errors.ts";
import { writeExamFiles, type WrittenExam } from "./outputWriter.ts";
import { countAvailable, loadQuestionPools, validatePools, type ReadSource } from "./questionPool.ts";
import { readQuestionFile } from "./questionFile.ts";
import { samplePools } from "./sampler.ts";
import type { Rng } from "./random.ts";

export type Log = Pick<Console, "log" | "warn">;

export type HeaderTemplates = {
  test: string;
  answerKey: string;
};

export type GenerateExamOptions = {
  config: ExamConfig;
  baseDir: string;
  rng: Rng;
  outputDir?: string;
  readSource?: ReadSource;
  log?: Log;
};

export type GeneratedExam = WrittenExam & {
  questionCount: number;
};

const readTemplate = (templatePath: string) => {
  try {
    return fs.readFileSync(templatePath, "utf8");
  } catch (err) {
    throw new TemplateUnreadableError(templatePath, { cause: err });
  }
};

export const readTemplates = (config: ExamConfig, baseDir: string): HeaderTemplates => {
  const test = readTemplate(resolveConfigPath(baseDir, config.test_header));
  const answerKey = config.answer_key_header
    ? readTemplate(resolveConfigPath(baseDir, config.answer_key_header))
    : test;
  return { test, answerKey };
};

export const generateExam = ({
  config,
  baseDir,
  rng,
  outputDir = getOutputDir(config, baseDir),
  readSource = readQuestionFile,
  log = console,
}: GenerateExamOptions): GeneratedExam => {
  const templates = readTemplates(config, baseDir);
  const pools = loadQuestionPools(config, baseDir, readSource);
  pools.forEach((pool) =>
    pool.files
      .filter((file) => file.fragments.length === 0)
      .forEach((file) => log.warn(`No questions found in ${file.path}.`)),
  );
  validatePools(pools);
  pools.forEach((pool) =>
    log.log(`${pool.name}: drawing ${pool.drawCount} of ${countAvailable(pool)} questions.`),
  );

  const exam = assembleExam(samplePools(pools, rng), config.page_breaks_after);
  const unused = findUnusedPageBreaks(exam, config.page_breaks_after);
  if (unused.length > 0) {
    log.warn(
      `Page breaks after ${unused.join(", ")} are past the last question (${exam.questionCount}).`,
    );
  }

  const written = writeExamFiles(outputDir, (variant, testNumber) =>
    renderExamDocument(
      exam,
      variant,
      applyVersionLabel(
        variant === "test" ? templates.test : templates.answerKey,
        variant,
        testNumber,
      ),
    ),
  );
  return { ...written, questionCount: exam.questionCount };
};

/** Each pass re-reads the question files, so edits between passes are picked up. */
export const generateExams = (options: GenerateExamOptions, count: number) => {
  const results: GeneratedExam[] = [];
  for (let i = 0; i < count; i += 1) {
    results.push(generateExam(options));
  }
  return results;
};
