import Papa from "papaparse";
import { InputError } from "@/lib/errors";

/** Header-keyed rows read from a questionnaire file, whatever its format. */
export type ParsedTable = {
  headers: string[];
  rows: Array<Record<string, string>>;
};

function headerLabels(rawHeaders: string[]): string[] {
  const seen = new Map<string, number>();

  return rawHeaders.map((rawHeader, index) => {
    const label = rawHeader.replace(/^\uFEFF/, "").trim() || `Column ${index + 1}`;
    const occurrence = (seen.get(label) ?? 0) + 1;
    seen.set(label, occurrence);

    return occurrence === 1 ? label : `${label} (${occurrence})`;
  });
}

/**
 * Turns a grid of cell strings into a table keyed by the first row. Blank and
 * repeated headers get stable labels ("Column 3", "Question (2)"); short rows
 * are padded with empty cells.
 */
export function toParsedTable(grid: string[][], source: string): ParsedTable {
  const [headerRow, ...dataRows] = grid;
  if (!headerRow) {
    throw new InputError(`${source} must include a header row`);
  }

  const headers = headerLabels(headerRow);
  const rows = dataRows.map((cells) =>
    Object.fromEntries(headers.map((header, index) => [header, cells[index] ?? ""]))
  );

  return { headers, rows };
}

export function parseCsvText(text: string): ParsedTable {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
    header: false,
    delimiter: ",",
    skipEmptyLines: "greedy"
  });

  const [firstError] = parsed.errors;
  if (firstError) {
    throw new InputError(`CSV parse error: ${firstError.message}`, { row: firstError.row });
  }

  return toParsedTable(
    parsed.data.map((cells) => cells.map((cell) => String(cell ?? ""))),
    "CSV"
  );
}
