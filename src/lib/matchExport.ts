import type { MatchResult } from "@/lib/matchTypes";

export const MATCH_EXPORT_HEADERS = [
  "Current Question",
  "Matched Question",
  "Matched Question Row",
  "Question Match Score",
  "Question Reliable",
  "Current Answer",
  "Matched Answer",
  "Answer Match Score",
  "Answer Reliable"
];

export function escapeCsvValue(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatScore(score: number | null): string {
  if (score === null) {
    return "";
  }

  return String(Number(score.toFixed(4)));
}

function formatFlag(flag: boolean | null): string {
  return flag === null ? "" : String(flag);
}

export function buildMatchResultsCsv(results: readonly MatchResult[]): string {
  const headerLine = MATCH_EXPORT_HEADERS.map((header) => escapeCsvValue(header)).join(",");

  const dataLines = results.map((result) => {
    const reference = result.matchedReference;
    const columns = [
      result.unanswered.questionText,
      reference?.questionText ?? "",
      reference ? String(reference.rowId) : "",
      formatScore(result.questionScore),
      formatFlag(result.questionReliable),
      result.unanswered.answerText,
      reference?.answerText ?? "",
      formatScore(result.answerScore),
      formatFlag(result.answerReliable)
    ];

    return columns.map((column) => escapeCsvValue(column)).join(",");
  });

  return [headerLine, ...dataLines].join("\n");
}
