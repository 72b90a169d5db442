import type { ExamConfig } from "./examConfig.ts";
import { questionSetName, resolveConfigPath } from "./examConfig.ts";
import { InsufficientQuestionsError } from "./errors.ts";
import {
  parseQuestionFragments,
  readQuestionFile,
  type QuestionFragment,
} from "./questionFile.ts";

export type SourceFileSpec = {
  path: string;
  instructions: string;
  fragments: QuestionFragment[];
};

export type QuestionPool = {
  name: string;
  drawCount: number;
  files: SourceFileSpec[];
};

export type PoolSummary = {
  name: string;
  drawCount: number;
  available: number;
  files: Array<{ path: string; questions: number }>;
};

export type ReadSource = (filePath: string) => string;

export const loadQuestionPools = (
  config: ExamConfig,
  baseDir: string,
  readSource: ReadSource = readQuestionFile,
): QuestionPool[] =>
  config.question_sets.map((set, setIndex) => ({
    name: questionSetName(set, setIndex),
    drawCount: set.draw_count,
    files: set.question_files.map((file, fileIndex) => {
      const filePath = resolveConfigPath(baseDir, file.path);
      return {
        path: filePath,
        instructions: file.instructions,
        fragments: parseQuestionFragments(readSource(filePath), fileIndex),
      };
    }),
  }));

export const countAvailable = (pool: QuestionPool) =>
  pool.files.reduce((total, file) => total + file.fragments.length, 0);

export const validatePool = (pool: QuestionPool) => {
  const available = countAvailable(pool);
  if (pool.drawCount > available) {
    throw new InsufficientQuestionsError(
      pool.name,
      pool.files.map((file) => file.path),
      pool.drawCount,
      available,
    );
  }
};

export const validatePools = (pools: QuestionPool[]) => {
  pools.forEach(validatePool);
};

export const summarizePool = (pool: QuestionPool): PoolSummary => ({
  name: pool.name,
  drawCount: pool.drawCount,
  available: countAvailable(pool),
  files: pool.files.map((file) => ({
    path: file.path,
    questions: file.fragments.length,
  })),
});
