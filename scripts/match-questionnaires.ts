import "dotenv/config";
import { readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { Command, Option } from "commander";
import { parseThresholdEnv } from "@/lib/config";
import { ConfigurationError, QuestionMatchError, getErrorMessage } from "@/lib/errors";
import { buildMatchResultsCsv } from "@/lib/matchExport";
import { formatMatchSummary, summarizeMatchRun } from "@/lib/matchSummary";
import { writeMatchResultsWorkbook } from "@/lib/matchWorkbook";
import {
  SIMILARITY_PROVIDER_KINDS,
  createSimilarityProvider,
  parseProviderKind,
  parseQuestionOverrides
} from "@/lib/providers";
import type { QuestionOverrides } from "@/lib/questionMatcher";
import { DEFAULT_ANSWER_COLUMN, DEFAULT_QUESTION_COLUMN, loadQuestionnaireFile } from "@/lib/questionnaireLoader";
import { runQuestionnaireMatch } from "@/server/matchEngine";

type CliOptions = {
  refQuestionCol: string;
  refAnswerCol: string;
  unansQuestionCol: string;
  unansAnswerCol: string;
  output: string;
  provider: string;
  questionThreshold?: string;
  answerThreshold?: string;
  concurrency?: string;
  overrides?: string;
};

function parseOptionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function readOverrides(filePath: string | undefined): QuestionOverrides | undefined {
  if (!filePath) {
    return undefined;
  }

  const resolvedPath = path.resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolvedPath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Could not read question overrides from ${resolvedPath}: ${getErrorMessage(error)}`);
  }

  return parseQuestionOverrides(raw);
}

async function run(referenceFile: string, unansweredFile: string, options: CliOptions) {
  const provider = createSimilarityProvider(parseProviderKind(options.provider));

  const reference = await loadQuestionnaireFile(referenceFile, {
    questionColumn: options.refQuestionCol,
    answerColumn: options.refAnswerCol,
    label: "Reference questionnaire"
  });
  const unanswered = await loadQuestionnaireFile(unansweredFile, {
    questionColumn: options.unansQuestionCol,
    answerColumn: options.unansAnswerCol,
    label: "Unanswered questionnaire"
  });

  console.log(`Reference file: ${referenceFile} (${reference.length} questions)`);
  console.log(`Unanswered file: ${unansweredFile} (${unanswered.length} questions)`);
  console.log(`Similarity provider: ${provider.name}`);

  const matchRun = await runQuestionnaireMatch({
    reference,
    unanswered,
    provider,
    questionThreshold: parseOptionalNumber(options.questionThreshold) ?? parseThresholdEnv("QUESTION_MATCH_THRESHOLD"),
    answerThreshold: parseOptionalNumber(options.answerThreshold) ?? parseThresholdEnv("ANSWER_MATCH_THRESHOLD"),
    concurrency: parseOptionalNumber(options.concurrency),
    questionOverrides: readOverrides(options.overrides)
  });

  const outputPath = path.resolve(process.cwd(), options.output);
  if (path.extname(outputPath).toLowerCase() === ".xlsx") {
    await writeMatchResultsWorkbook(matchRun.results, outputPath);
  } else {
    writeFileSync(outputPath, buildMatchResultsCsv(matchRun.results), "utf8");
  }

  console.log("");
  console.log(formatMatchSummary(summarizeMatchRun(matchRun)).join("\n"));
  console.log("");
  console.log(`Results saved to: ${outputPath}`);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("match-questionnaires")
    .description("Match an unanswered questionnaire against a previously answered reference questionnaire")
    .argument("<reference>", "Path to the reference questionnaire (.csv or .xlsx)")
    .argument("<unanswered>", "Path to the unanswered questionnaire (.csv or .xlsx)")
    .option("--ref-question-col <name>", "Reference questionnaire question column", DEFAULT_QUESTION_COLUMN)
    .option("--ref-answer-col <name>", "Reference questionnaire answer column", DEFAULT_ANSWER_COLUMN)
    .option("--unans-question-col <name>", "Unanswered questionnaire question column", DEFAULT_QUESTION_COLUMN)
    .option("--unans-answer-col <name>", "Unanswered questionnaire answer column", DEFAULT_ANSWER_COLUMN)
    .option("--output <file>", "Output file; .xlsx writes a formatted workbook, anything else CSV", "combined_questionnaire.csv")
    .addOption(
      new Option("--provider <kind>", "Similarity provider").choices([...SIMILARITY_PROVIDER_KINDS]).default("semantic")
    )
    .option("--question-threshold <score>", "Minimum question score to accept a match (default 0.85)")
    .option("--answer-threshold <score>", "Minimum answer score to flag the answer as reliable (default 0.85)")
    .option("--concurrency <count>", "Comparisons in flight at once (default 5)")
    .option("--overrides <file>", "JSON file pinning question text to reference question text");

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = createProgram().action(
    async (referenceFile: string, unansweredFile: string, options: CliOptions) => {
      try {
        await run(referenceFile, unansweredFile, options);
      } catch (error) {
        if (error instanceof QuestionMatchError) {
          console.error(`${error.name}: ${error.message}`);
        } else {
          console.error("Failed to match questionnaires", error);
        }

        exitCode = 1;
      }
    }
  );

  await program.parseAsync(argv);
  return exitCode;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      console.error(getErrorMessage(error));
      process.exitCode = 1;
    }
  );
}
