import ExcelJS from "exceljs";
import { toParsedTable, type ParsedTable } from "@/lib/csv";
import { InputError, getErrorMessage } from "@/lib/errors";

/** Reads the first worksheet of an .xlsx workbook as display text, skipping blank rows. */
export async function readWorkbookTable(filePath: string): Promise<ParsedTable> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new InputError(`Spreadsheet could not be read: ${getErrorMessage(error)}`);
  }

  const [worksheet] = workbook.worksheets;
  if (!worksheet) {
    throw new InputError("Spreadsheet must include at least one worksheet");
  }

  const grid: string[][] = [];
  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    const cells: string[] = [];
    for (let columnNumber = 1; columnNumber <= worksheet.columnCount; columnNumber += 1) {
      cells.push(row.getCell(columnNumber).text);
    }

    if (cells.some((cell) => cell.trim())) {
      grid.push(cells);
    }
  }

  return toParsedTable(grid, "Spreadsheet");
}
