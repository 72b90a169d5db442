import fs from "node:fs";
import { SourceFileUnreadableError } from "./errors.ts";

export const COMMENT_MARKER = "%";
export const ANSWER_MARKER = "%%";

export type QuestionFragment = {
  readonly text: string;
  readonly answer: string;
  readonly originFileIndex: number;
};

export type ParsedQuestionFile = {
  questions: string[];
  answers: string[];
};

const isSkippable = (line: string) =>
  line === "" || line.startsWith(COMMENT_MARKER);

// An answer belongs to the question directly above it and is consumed with it.
const readAnswer = (line: string | undefined): string | null => {
  if (line === undefined) {
    return null;
  }
  const clean = line.trim();
  if (clean === "" || !clean.startsWith(ANSWER_MARKER)) {
    return null;
  }
  return clean.slice(ANSWER_MARKER.length);
};

function* walkQuestionLines(
  lines: string[],
): Generator<{ question: string; answer: string }> {
  let index = 0;
  while (index < lines.length) {
    const clean = lines[index].trim();
    if (isSkippable(clean)) {
      index += 1;
      continue;
    }
    const answer = readAnswer(lines[index + 1]);
    yield { question: clean, answer: answer ?? "" };
    index += answer === null ? 1 : 2;
  }
}

export const splitLines = (raw: string) => raw.split(/\r\n|\r|\n/);

export const parseQuestionFile = (raw: string): ParsedQuestionFile => {
  const questions: string[] = [];
  const answers: string[] = [];
  for (const entry of walkQuestionLines(splitLines(raw))) {
    questions.push(entry.question);
    answers.push(entry.answer);
  }
  return { questions, answers };
};

export const parseQuestionFragments = (
  raw: string,
  originFileIndex: number,
): QuestionFragment[] =>
  Array.from(walkQuestionLines(splitLines(raw)), ({ question, answer }) =>
    Object.freeze({ text: question, answer, originFileIndex }),
  );

export const readQuestionFile = (filePath: string): string => {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new SourceFileUnreadableError(filePath, { cause: err });
  }
};
