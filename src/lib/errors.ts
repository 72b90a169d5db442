export type ExamForgeErrorCode =
  | "CONFIGURATION_UNREADABLE"
  | "CONFIGURATION_INVALID"
  | "SOURCE_FILE_UNREADABLE"
  | "TEMPLATE_UNREADABLE"
  | "INSUFFICIENT_QUESTIONS"
  | "OUTPUT_WRITE_FAILURE";

export abstract class ExamForgeError extends Error {
  abstract readonly code: ExamForgeErrorCode;
}

export class ConfigurationUnreadableError extends ExamForgeError {
  readonly code = "CONFIGURATION_UNREADABLE";

  constructor(
    readonly configPath: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`The configuration file at ${configPath} could not be read: ${detail}`, options);
    this.name = "ConfigurationUnreadableError";
  }
}

export class InvalidConfigurationError extends ExamForgeError {
  readonly code = "CONFIGURATION_INVALID";

  constructor(
    readonly where: string,
    detail: string,
  ) {
    super(`Invalid configuration at ${where}: ${detail}`);
    this.name = "InvalidConfigurationError";
  }
}

export class SourceFileUnreadableError extends ExamForgeError {
  readonly code = "SOURCE_FILE_UNREADABLE";

  constructor(
    readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Problem reading question file at ${filePath}.`, options);
    this.name = "SourceFileUnreadableError";
  }
}

export class TemplateUnreadableError extends ExamForgeError {
  readonly code = "TEMPLATE_UNREADABLE";

  constructor(
    readonly templatePath: string,
    options?: ErrorOptions,
  ) {
    super(`Couldn't read the header template at ${templatePath}.`, options);
    this.name = "TemplateUnreadableError";
  }
}

export class InsufficientQuestionsError extends ExamForgeError {
  readonly code = "INSUFFICIENT_QUESTIONS";

  constructor(
    readonly poolName: string,
    readonly filePaths: string[],
    readonly required: number,
    readonly available: number,
  ) {
    const files = filePaths.map((filePath) => `\t${filePath}`).join("\n");
    super(
      [
        `Insufficient number of questions in ${poolName}:`,
        files || "\t(no question files)",
        `Expected at least ${required} questions total, found ${available} (short by ${required - available}).`,
      ].join("\n"),
    );
    this.name = "InsufficientQuestionsError";
  }

  get shortfall() {
    return this.required - this.available;
  }
}

export class OutputWriteFailureError extends ExamForgeError {
  readonly code = "OUTPUT_WRITE_FAILURE";

  constructor(
    readonly outputPath: string,
    options?: ErrorOptions,
  ) {
    super(
      `Could not write to ${outputPath}. Check permissions or that there isn't a file with the same name.`,
      options,
    );
    this.name = "OutputWriteFailureError";
  }
}

export const isExamForgeError = (err: unknown): err is ExamForgeError =>
  err instanceof ExamForgeError;
