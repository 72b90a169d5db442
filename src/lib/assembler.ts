import type { SampledPool } from "./sampler.ts";
import {
  ANSWER_BOX_FULL_END,
  ANSWER_BOX_FULL_START,
  ANSWER_KEY_SUFFIX,
  BEGIN_QUESTIONS,
  END_DOCUMENT,
  END_QUESTIONS,
  ITEM,
  NEWPAGE,
  VERSION_PLACEHOLDER,
  emptyAnswerBox,
  filledAnswerBox,
  pageBreak,
  questionItem,
  sectionClose,
  sectionOpen,
} from "./texMarkup.ts";

export type DocumentVariant = "test" | "answer-key";

export type DocumentBlock =
  | { kind: "section-open"; instructions: string }
  | { kind: "item"; sequence: number; question: string; answer: string }
  | { kind: "page-break"; afterQuestion: number }
  | { kind: "section-close" }
  | { kind: "document-end" };

export type StructuralMarker = DocumentBlock["kind"];

export type AssembledExam = {
  blocks: DocumentBlock[];
  questionCount: number;
};

type FileRun = {
  instructions: string;
  items: SampledPool["questions"];
};

const groupByFile = ({ pool, questions }: SampledPool): FileRun[] => {
  const runs: Array<FileRun & { fileIndex: number }> = [];
  for (const question of questions) {
    const last = runs[runs.length - 1];
    if (last && last.fileIndex === question.originFileIndex) {
      last.items.push(question);
      continue;
    }
    const file = pool.files[question.originFileIndex];
    if (!file) {
      throw new RangeError(
        `Question "${question.text}" refers to file ${question.originFileIndex} outside ${pool.name}.`,
      );
    }
    runs.push({
      fileIndex: question.originFileIndex,
      instructions: file.instructions,
      items: [question],
    });
  }
  return runs;
};

/**
 * Lays out the sampled sets as one block sequence shared by the test and its
 * answer key. The question counter runs across all sets so page breaks refer
 * to the whole document.
 */
export const assembleExam = (
  samples: SampledPool[],
  pageBreaks: Iterable<number>,
): AssembledExam => {
  const breaks = new Set(pageBreaks);
  const blocks: DocumentBlock[] = [];
  let questionCount = 0;

  for (const sample of samples) {
    for (const run of groupByFile(sample)) {
      blocks.push({ kind: "section-open", instructions: run.instructions });
      for (const item of run.items) {
        questionCount += 1;
        blocks.push({
          kind: "item",
          sequence: questionCount,
          question: item.text,
          answer: item.answer,
        });
        if (breaks.has(questionCount)) {
          blocks.push({ kind: "page-break", afterQuestion: questionCount });
        }
      }
      blocks.push({ kind: "section-close" });
    }
  }

  blocks.push({ kind: "document-end" });
  return { blocks, questionCount };
};

const renderBlock = (block: DocumentBlock, variant: DocumentVariant): string => {
  switch (block.kind) {
    case "section-open":
      return sectionOpen(block.instructions);
    case "item":
      return (
        questionItem(block.question) +
        (variant === "test" ? emptyAnswerBox() : filledAnswerBox(block.answer))
      );
    case "page-break":
      return pageBreak();
    case "section-close":
      return sectionClose();
    case "document-end":
      return END_DOCUMENT;
  }
};

export const renderExamDocument = (
  exam: AssembledExam,
  variant: DocumentVariant,
  header: string,
): string =>
  `${header}\n` + exam.blocks.map((block) => renderBlock(block, variant)).join("");

export const versionLabel = (variant: DocumentVariant, testNumber: number) =>
  variant === "test" ? String(testNumber) : `${testNumber}${ANSWER_KEY_SUFFIX}`;

export const applyVersionLabel = (
  text: string,
  variant: DocumentVariant,
  testNumber: number,
) => text.split(VERSION_PLACEHOLDER).join(versionLabel(variant, testNumber));

export const findUnusedPageBreaks = (
  exam: AssembledExam,
  pageBreaks: Iterable<number>,
) =>
  Array.from(new Set(pageBreaks))
    .filter((after) => after > exam.questionCount)
    .sort((a, b) => a - b);

const BEGIN_CENTER = "\\begin{center}";

const OUTLINE_MARKERS: Array<[string, StructuralMarker]> = [
  [BEGIN_QUESTIONS, "section-open"],
  [END_QUESTIONS, "section-close"],
  [ITEM.trimEnd(), "item"],
  [NEWPAGE, "page-break"],
  [END_DOCUMENT, "document-end"],
];

// Lines inside a filled answer box are answer text, never markers.
export const structuralOutline = (text: string): StructuralMarker[] => {
  const markers: StructuralMarker[] = [];
  let inAnswerBox = false;
  for (const line of text.split("\n")) {
    const clean = line.trim();
    if (inAnswerBox) {
      inAnswerBox = clean !== ANSWER_BOX_FULL_END;
      continue;
    }
    if (ANSWER_BOX_FULL_START.endsWith(clean) && clean.endsWith(BEGIN_CENTER)) {
      inAnswerBox = true;
      continue;
    }
    const match = OUTLINE_MARKERS.find(([command]) =>
      command === ITEM.trimEnd() ? clean.startsWith(ITEM) : clean === command,
    );
    if (match) {
      markers.push(match[1]);
    }
  }
  return markers;
};
