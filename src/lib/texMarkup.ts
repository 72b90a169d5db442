export const VERSION_PLACEHOLDER = "%%VERSION_NUMBER%%";
export const ANSWER_KEY_SUFFIX = "ANSWER KEY";

export const ANSWER_BOX_HEIGHT = "1.6cm";
export const ANSWER_BOX_WIDTH = "3cm";
export const SPACING = "    ";

export const BEGIN_QUESTIONS = "\\begin{questions}";
export const END_QUESTIONS = "\\end{questions}";
export const ITEM = "\\item ";
export const NEWPAGE = "\\newpage";
export const END_DOCUMENT = "\\end{document}";
export const INSTRUCTION_START = "\\noindent \\bf{";
export const INSTRUCTION_END = "}";

const BOX_LEAD = "%\\\\[.3in] \\vspace*{-10ex} \n";

export const ANSWER_BOX_EMPTY =
  `${BOX_LEAD}${SPACING}\\begin{flushright} \\fbox{\\rule[0cm]{0cm}{${ANSWER_BOX_HEIGHT}} ` +
  `\\hspace{${ANSWER_BOX_WIDTH}} } \\end{flushright} `;

export const ANSWER_BOX_FULL_START =
  `${BOX_LEAD}${SPACING}\\begin{flushright} \\fbox{\\rule[0cm]{0cm}{0cm} ` +
  `\\begin{minipage}[0pt][${ANSWER_BOX_HEIGHT}][c]{${ANSWER_BOX_WIDTH}} \\begin{center}`;

export const ANSWER_BOX_FULL_END =
  "\\end{center} \\end{minipage}} \\end{flushright}";

export const sectionOpen = (instructions: string) =>
  `${INSTRUCTION_START}${instructions}${INSTRUCTION_END}\n${BEGIN_QUESTIONS}\n`;

export const sectionClose = () => `${END_QUESTIONS}\n\n`;

export const pageBreak = () => `${SPACING}${NEWPAGE}\n`;

export const questionItem = (question: string) => `${SPACING}${ITEM}${question}\n`;

export const emptyAnswerBox = () => `${SPACING}${ANSWER_BOX_EMPTY}\n`;

export const filledAnswerBox = (answer: string) =>
  `${SPACING}${ANSWER_BOX_FULL_START}\n` +
  `${SPACING}${SPACING}${answer}\n` +
  `${SPACING}${ANSWER_BOX_FULL_END}\n`;
