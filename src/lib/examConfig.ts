import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  ConfigurationUnreadableError,
  InvalidConfigurationError,
  OutputWriteFailureError,
} from "./errors.ts";

export const DEFAULT_CONFIG_PATH = path.join("configuration", "configuration.json");
export const DEFAULT_OUTPUT_DIR = "tests";

const QuestionFileSchema = z
  .object({
    path: z.string().min(1),
    instructions: z.string(),
  })
  .strict();

const QuestionSetSchema = z
  .object({
    name: z.string().min(1).optional(),
    draw_count: z.number().int().nonnegative(),
    question_files: z.array(QuestionFileSchema),
  })
  .strict();

const ExamConfigSchema = z
  .object({
    test_header: z.string().min(1),
    answer_key_header: z.string().min(1).optional(),
    output_dir: z.string().min(1).optional(),
    page_breaks_after: z.array(z.number().int().positive()),
    question_sets: z.array(QuestionSetSchema),
  })
  .strict();

export type QuestionFileConfig = z.infer<typeof QuestionFileSchema>;
export type QuestionSetConfig = z.infer<typeof QuestionSetSchema>;
export type ExamConfig = z.infer<typeof ExamConfigSchema>;

export const stripJsonComments = (raw: string) =>
  raw.replace(/\/\*[\s\S]*?\*\//g, "").trim();

const firstIssue = (error: z.ZodError) => {
  const issue = error.issues[0];
  return {
    where: issue.path.length ? issue.path.join(".") : "root",
    message: issue.message,
  };
};

const validateEdit = <T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  prefix: string,
): z.infer<T> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    const { where, message } = firstIssue(result.error);
    throw new InvalidConfigurationError(
      where === "root" ? prefix : `${prefix}.${where}`,
      message,
    );
  }
  return result.data;
};

export const parseExamConfig = (raw: string, source = "configuration"): ExamConfig => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(raw));
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unable to parse JSON";
    throw new ConfigurationUnreadableError(source, `Invalid JSON: ${message}`, {
      cause: err,
    });
  }

  const result = ExamConfigSchema.safeParse(parsed);
  if (!result.success) {
    const { where, message } = firstIssue(result.error);
    throw new ConfigurationUnreadableError(
      source,
      `validation failed at ${where}: ${message}`,
    );
  }
  return result.data;
};

export const loadExamConfig = (configPath: string): ExamConfig => {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigurationUnreadableError(configPath, "file not readable", {
      cause: err,
    });
  }
  return parseExamConfig(raw, configPath);
};

export const serializeExamConfig = (config: ExamConfig) =>
  `${JSON.stringify(config, null, 2)}\n`;

export const saveExamConfig = (configPath: string, config: ExamConfig) => {
  const valid = validateEdit(ExamConfigSchema, config, "configuration");
  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, serializeExamConfig(valid));
  } catch (err) {
    throw new OutputWriteFailureError(configPath, { cause: err });
  }
};

export const questionSetName = (set: QuestionSetConfig, index: number) =>
  set.name ?? `Set ${index + 1}`;

export const resolveConfigPath = (baseDir: string, target: string) =>
  path.resolve(baseDir, target);

export const getOutputDir = (config: ExamConfig, baseDir: string) =>
  resolveConfigPath(baseDir, config.output_dir ?? DEFAULT_OUTPUT_DIR);

const assertSetIndex = (config: ExamConfig, setIndex: number) => {
  if (!Number.isInteger(setIndex) || setIndex < 0 || setIndex >= config.question_sets.length) {
    throw new RangeError(
      `Unknown question set ${setIndex + 1}; there are ${config.question_sets.length}.`,
    );
  }
};

export const addQuestionSet = (
  config: ExamConfig,
  drawCount: number,
  name?: string,
): ExamConfig => {
  const set = validateEdit(
    QuestionSetSchema,
    { ...(name ? { name } : {}), draw_count: drawCount, question_files: [] },
    `question_sets.${config.question_sets.length}`,
  );
  return { ...config, question_sets: [...config.question_sets, set] };
};

export const removeQuestionSet = (config: ExamConfig, setIndex: number): ExamConfig => {
  assertSetIndex(config, setIndex);
  return {
    ...config,
    question_sets: config.question_sets.filter((_, index) => index !== setIndex),
  };
};

export const addQuestionFile = (
  config: ExamConfig,
  setIndex: number,
  file: QuestionFileConfig,
): ExamConfig => {
  assertSetIndex(config, setIndex);
  const entry = validateEdit(
    QuestionFileSchema,
    file,
    `question_sets.${setIndex}.question_files.${config.question_sets[setIndex].question_files.length}`,
  );
  return {
    ...config,
    question_sets: config.question_sets.map((set, index) =>
      index === setIndex
        ? { ...set, question_files: [...set.question_files, entry] }
        : set,
    ),
  };
};

export const setPageBreaks = (config: ExamConfig, breaks: number[]): ExamConfig => {
  const page_breaks_after = validateEdit(
    ExamConfigSchema.shape.page_breaks_after,
    Array.from(new Set(breaks)).sort((a, b) => a - b),
    "page_breaks_after",
  );
  return { ...config, page_breaks_after };
};
