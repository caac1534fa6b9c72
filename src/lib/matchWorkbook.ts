import ExcelJS from "exceljs";
import type { Alignment, Fill, Workbook } from "exceljs";
import { MATCH_EXPORT_HEADERS } from "@/lib/matchExport";
import type { MatchResult } from "@/lib/matchTypes";

export const MATCH_WORKSHEET_NAME = "Combined Questionnaire";

const TEXT_COLUMN_WIDTH = 30;
const NUMBER_COLUMN_WIDTH = 12;

// 1-based positions within MATCH_EXPORT_HEADERS.
const TEXT_COLUMNS = new Set([1, 2, 6, 7]);
const QUESTION_SCORE_COLUMN = 4;
const ANSWER_SCORE_COLUMN = 8;

const WRAP_ALIGNMENT: Partial<Alignment> = { wrapText: true, vertical: "top" };

export const BELOW_THRESHOLD_FILL: Fill = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FFFFC0CB" }
};

function roundScore(score: number | null): number | null {
  return score === null ? null : Number(score.toFixed(4));
}

function resultRow(result: MatchResult): Array<string | number | boolean | null> {
  const reference = result.matchedReference;
  return [
    result.unanswered.questionText,
    reference?.questionText ?? null,
    reference?.rowId ?? null,
    roundScore(result.questionScore),
    result.questionReliable,
    result.unanswered.answerText,
    reference?.answerText ?? null,
    roundScore(result.answerScore),
    result.answerReliable
  ];
}

/**
 * Builds the review workbook: wrapped text columns, fixed widths, and a pink
 * score cell wherever the question match or answer was not reliable.
 */
export function buildMatchResultsWorkbook(results: readonly MatchResult[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(MATCH_WORKSHEET_NAME);

  const header = worksheet.addRow(MATCH_EXPORT_HEADERS);
  header.font = { bold: true };

  MATCH_EXPORT_HEADERS.forEach((_, index) => {
    const columnNumber = index + 1;
    worksheet.getColumn(columnNumber).width = TEXT_COLUMNS.has(columnNumber) ? TEXT_COLUMN_WIDTH : NUMBER_COLUMN_WIDTH;
  });

  for (const result of results) {
    const row = worksheet.addRow(resultRow(result));
    MATCH_EXPORT_HEADERS.forEach((_, index) => {
      row.getCell(index + 1).alignment = WRAP_ALIGNMENT;
    });

    if (!result.questionReliable) {
      row.getCell(QUESTION_SCORE_COLUMN).fill = BELOW_THRESHOLD_FILL;
    }

    if (result.answerReliable === false) {
      row.getCell(ANSWER_SCORE_COLUMN).fill = BELOW_THRESHOLD_FILL;
    }
  }

  return workbook;
}

export async function writeMatchResultsWorkbook(results: readonly MatchResult[], filePath: string): Promise<void> {
  await buildMatchResultsWorkbook(results).xlsx.writeFile(filePath);
}
