#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { Command, InvalidArgumentError } from "commander";

import {
  DEFAULT_CONFIG_PATH,
  addQuestionFile,
  addQuestionSet,
  loadExamConfig,
  questionSetName,
  removeQuestionSet,
  saveExamConfig,
  setPageBreaks,
  type ExamConfig,
} from "./lib/examConfig.ts";
import { isExamForgeError } from "./lib/errors.ts";
import { generateExams } from "./lib/generateExam.ts";
import { loadQuestionPools, summarizePool, validatePools } from "./lib/questionPool.ts";
import { createRng, parseSeed } from "./lib/random.ts";

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const defaultConfigPath = path.join(projectRoot, DEFAULT_CONFIG_PATH);

type ConfigOption = { config: string };
type GenerateCliOptions = ConfigOption & { output?: string; count: number; seed?: number | string };

const parseInteger = (min: number) => (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
  }
  return parsed;
};

const openConfig = (configPath: string) => {
  const resolved = path.resolve(configPath);
  return { configPath: resolved, baseDir: path.dirname(resolved), config: loadExamConfig(resolved) };
};

const editConfig = (configPath: string, edit: (config: ExamConfig) => ExamConfig) => {
  const opened = openConfig(configPath);
  saveExamConfig(opened.configPath, edit(opened.config));
  console.log(`Saved ${opened.configPath}`);
};

const program = new Command();

program
  .name("exam-forge")
  .description("Generate randomized LaTeX tests and answer keys from question sets")
  .version("1.0.0");

program
  .command("generate", { isDefault: true })
  .description("Draw questions and write a new test with its answer key")
  .option("-c, --config <file>", "Configuration file", defaultConfigPath)
  .option("-o, --output <dir>", "Output directory (overrides the configuration)")
  .option("-n, --count <n>", "Number of tests to generate", parseInteger(1), 1)
  .option("-s, --seed <seed>", "Seed for a reproducible draw (number or word)", parseSeed)
  .action((options: GenerateCliOptions) => {
    const { config, baseDir } = openConfig(options.config);
    const results = generateExams(
      {
        config,
        baseDir,
        rng: createRng(options.seed),
        outputDir: options.output ? path.resolve(options.output) : undefined,
      },
      options.count,
    );
    for (const result of results) {
      console.log(`Test ${result.testNumber} (${result.questionCount} questions)`);
      console.log(`  ${result.testPath}`);
      console.log(`  ${result.answerKeyPath}`);
    }
  });

program
  .command("check")
  .description("Parse every question file and check each set has enough questions")
  .option("-c, --config <file>", "Configuration file", defaultConfigPath)
  .action((options: ConfigOption) => {
    const { config, baseDir } = openConfig(options.config);
    const pools = loadQuestionPools(config, baseDir);
    for (const summary of pools.map(summarizePool)) {
      console.log(`${summary.name}: ${summary.drawCount} of ${summary.available}`);
      for (const file of summary.files) {
        console.log(`  ${file.path} (${file.questions})`);
      }
    }
    validatePools(pools);
    console.log("All question sets can be drawn.");
  });

program
  .command("sets")
  .description("List the configured question sets and page breaks")
  .option("-c, --config <file>", "Configuration file", defaultConfigPath)
  .action((options: ConfigOption) => {
    const { config } = openConfig(options.config);
    config.question_sets.forEach((set, index) => {
      console.log(`${index + 1}. ${questionSetName(set, index)}: draw ${set.draw_count}`);
      for (const file of set.question_files) {
        console.log(`   ${file.path}: ${file.instructions}`);
      }
    });
    console.log(`Page breaks after: ${config.page_breaks_after.join(", ") || "none"}`);
  });

program
  .command("add-set")
  .description("Append a question set")
  .argument("<drawCount>", "Questions to draw from the set", parseInteger(0))
  .option("--name <name>", "Set name")
  .option("-c, --config <file>", "Configuration file", defaultConfigPath)
  .action((drawCount: number, options: ConfigOption & { name?: string }) => {
    editConfig(options.config, (config) => addQuestionSet(config, drawCount, options.name));
  });

program
  .command("remove-set")
  .description("Remove a question set by its number")
  .argument("<set>", "Set number as listed by `sets`", parseInteger(1))
  .option("-c, --config <file>", "Configuration file", defaultConfigPath)
  .action((set: number, options: ConfigOption) => {
    editConfig(options.config, (config) => removeQuestionSet(config, set - 1));
  });

program
  .command("add-file")
  .description("Add a question file with its instructions to a set")
  .argument("<set>", "Set number as listed by `sets`", parseInteger(1))
  .argument("<path>", "Question file, relative to the configuration file")
  .argument("<instructions>", "Instructions printed before its questions")
  .option("-c, --config <file>", "Configuration file", defaultConfigPath)
  .action((set: number, filePath: string, instructions: string, options: ConfigOption) => {
    editConfig(options.config, (config) =>
      addQuestionFile(config, set - 1, { path: filePath, instructions }),
    );
  });

program
  .command("page-breaks")
  .description("Replace the page breaks (question numbers to break after)")
  .argument("[numbers...]", "Question numbers")
  .option("-c, --config <file>", "Configuration file", defaultConfigPath)
  .action((numbers: string[], options: ConfigOption) => {
    const breaks = numbers.map(parseInteger(1));
    editConfig(options.config, (config) => setPageBreaks(config, breaks));
  });

try {
  program.parse();
} catch (err) {
  if (isExamForgeError(err) || err instanceof RangeError || err instanceof InvalidArgumentError) {
    console.error(`ERROR: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
