import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import ExcelJS from "exceljs";
import type { Cell } from "exceljs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MATCH_EXPORT_HEADERS } from "./matchExport";
import type { MatchResult } from "./matchTypes";
import { MATCH_WORKSHEET_NAME, writeMatchResultsWorkbook } from "./matchWorkbook";

function fillColor(cell: Cell): string | undefined {
  const fill = cell.fill;
  return fill && fill.type === "pattern" ? fill.fgColor?.argb : undefined;
}

const RESULTS: MatchResult[] = [
  {
    unanswered: { rowId: 1, questionText: "Is TLS enabled?", answerText: "Not yet" },
    matchedReference: { rowId: 12, questionText: "Is TLS enabled for all endpoints?", answerText: "Yes" },
    questionScore: 0.912345,
    questionReliable: true,
    answerScore: 0.3,
    answerReliable: false
  },
  {
    unanswered: { rowId: 2, questionText: "How long are logs retained?", answerText: "" },
    matchedReference: null,
    questionScore: 0.42,
    questionReliable: false,
    answerScore: null,
    answerReliable: null
  }
];

describe("match results workbook", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "questionnaire-workbook-"));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it("writes the review columns and shades unreliable scores", async () => {
    const filePath = join(outputDir, "combined.xlsx");
    await writeMatchResultsWorkbook(RESULTS, filePath);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const worksheet = workbook.getWorksheet(MATCH_WORKSHEET_NAME);
    if (!worksheet) {
      throw new Error("worksheet missing");
    }

    const header = worksheet.getRow(1);
    expect(MATCH_EXPORT_HEADERS.map((_, index) => header.getCell(index + 1).value)).toEqual(MATCH_EXPORT_HEADERS);

    const matched = worksheet.getRow(2);
    expect(matched.getCell(2).value).toBe("Is TLS enabled for all endpoints?");
    expect(matched.getCell(3).value).toBe(12);
    expect(matched.getCell(4).value).toBe(0.9123);
    expect(matched.getCell(5).value).toBe(true);
    expect(matched.getCell(8).value).toBe(0.3);
    expect(fillColor(matched.getCell(4))).toBeUndefined();
    expect(fillColor(matched.getCell(8))).toBe("FFFFC0CB");
    expect(matched.getCell(1).alignment).toMatchObject({ wrapText: true, vertical: "top" });

    const unmatched = worksheet.getRow(3);
    expect(unmatched.getCell(2).value).toBeNull();
    expect(unmatched.getCell(4).value).toBe(0.42);
    expect(unmatched.getCell(5).value).toBe(false);
    expect(fillColor(unmatched.getCell(4))).toBe("FFFFC0CB");
    expect(fillColor(unmatched.getCell(8))).toBeUndefined();

    expect(worksheet.getColumn(1).width).toBe(30);
    expect(worksheet.getColumn(4).width).toBe(12);
  });
});
