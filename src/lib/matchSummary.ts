import type { MatchRun } from "@/lib/matchTypes";

export type MatchRunSummary = {
  total: number;
  matched: number;
  unmatched: number;
  matchRatePercent: number;
  answerReliable: number;
  degradedComparisons: number;
};

export function summarizeMatchRun(run: MatchRun): MatchRunSummary {
  const total = run.results.length;
  const matched = run.results.filter((result) => result.matchedReference !== null).length;
  const answerReliable = run.results.filter((result) => result.answerReliable === true).length;

  return {
    total,
    matched,
    unmatched: total - matched,
    matchRatePercent: total > 0 ? (matched / total) * 100 : 0,
    answerReliable,
    degradedComparisons: run.degradedComparisons
  };
}

export function formatMatchSummary(summary: MatchRunSummary): string[] {
  const lines = [
    "Match Summary",
    `Total questions processed: ${summary.total}`,
    `Matched: ${summary.matched}`,
    `No match found: ${summary.unmatched}`,
    `Match rate: ${summary.matchRatePercent.toFixed(1)}%`,
    `Answers likely still valid: ${summary.answerReliable}`
  ];

  if (summary.degradedComparisons > 0) {
    lines.push(`Warning: ${summary.degradedComparisons} comparison(s) scored 0 because the similarity provider failed`);
  }

  return lines;
}
