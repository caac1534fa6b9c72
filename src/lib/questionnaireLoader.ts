import { existsSync, readFileSync, statSync } from "node:fs";
import path from "node:path";
import { parseCsvText, type ParsedTable } from "@/lib/csv";
import { InputError } from "@/lib/errors";
import type { QuestionRecord } from "@/lib/matchTypes";
import { readWorkbookTable } from "@/lib/spreadsheet";
import { cleanCellText } from "@/lib/textNormalization";

export const MAX_QUESTIONNAIRE_BYTES = 8 * 1024 * 1024;
export const DEFAULT_QUESTION_COLUMN = "Question";
export const DEFAULT_ANSWER_COLUMN = "Answer";

const QUESTION_HEADER_HINTS = ["question", "prompt", "req", "requirement"];
const ANSWER_HEADER_HINTS = ["answer", "response", "reply", "comment"];

export type QuestionnaireColumns = {
  questionColumn?: string;
  answerColumn?: string;
  /** Used in error messages, e.g. "Reference questionnaire". */
  label?: string;
};

/** Header sharing the most hint characters, if any header mentions a hint at all. */
export function suggestColumn(headers: string[], hints: string[]): string | null {
  let best: { header: string; weight: number } | null = null;

  for (const header of headers) {
    const lowerHeader = header.toLowerCase();
    const weight = hints.reduce((total, hint) => (lowerHeader.includes(hint) ? total + hint.length : total), 0);
    if (weight > 0 && (!best || weight > best.weight)) {
      best = { header, weight };
    }
  }

  return best?.header ?? null;
}

function requireColumn(headers: string[], column: string, hints: string[], label: string): void {
  if (headers.includes(column)) {
    return;
  }

  const suggestion = suggestColumn(headers, hints);
  const hint = suggestion ? ` Did you mean "${suggestion}"?` : "";
  throw new InputError(
    `${label}: column "${column}" not found. Available columns: ${headers.join(", ")}.${hint}`,
    { column, headers }
  );
}

export function buildQuestionRecords(parsed: ParsedTable, columns: QuestionnaireColumns = {}): QuestionRecord[] {
  const questionColumn = columns.questionColumn ?? DEFAULT_QUESTION_COLUMN;
  const answerColumn = columns.answerColumn ?? DEFAULT_ANSWER_COLUMN;
  const label = columns.label ?? "Questionnaire";

  requireColumn(parsed.headers, questionColumn, QUESTION_HEADER_HINTS, label);
  requireColumn(parsed.headers, answerColumn, ANSWER_HEADER_HINTS, label);

  return parsed.rows.map((row, index) =>
    Object.freeze({
      rowId: index + 1,
      questionText: cleanCellText(row[questionColumn]),
      answerText: cleanCellText(row[answerColumn])
    })
  );
}

export async function loadQuestionnaireFile(
  filePath: string,
  columns: QuestionnaireColumns = {}
): Promise<QuestionRecord[]> {
  const label = columns.label ?? "Questionnaire";
  const resolvedPath = path.resolve(process.cwd(), filePath);
  const extension = path.extname(resolvedPath).toLowerCase();

  if (extension !== ".csv" && extension !== ".xlsx") {
    throw new InputError(
      `${label}: only .csv and .xlsx files are supported (received ${path.basename(resolvedPath)})`
    );
  }

  if (!existsSync(resolvedPath)) {
    throw new InputError(`${label}: file not found: ${resolvedPath}`);
  }

  if (statSync(resolvedPath).size > MAX_QUESTIONNAIRE_BYTES) {
    throw new InputError(
      `${label}: file exceeds size limit of ${Math.floor(MAX_QUESTIONNAIRE_BYTES / (1024 * 1024))}MB`
    );
  }

  const parsed =
    extension === ".xlsx"
      ? await readWorkbookTable(resolvedPath)
      : parseCsvText(readFileSync(resolvedPath, "utf8"));

  return buildQuestionRecords(parsed, { ...columns, label });
}
