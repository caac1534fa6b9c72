import type { AnswerComparator } from "@/lib/answerComparator";
import { mapInBatches } from "@/lib/batching";
import { DEFAULT_MATCH_CONCURRENCY, assertPositiveInteger } from "@/lib/config";
import { InputError } from "@/lib/errors";
import type { MatchResult, QuestionRecord } from "@/lib/matchTypes";
import type { QuestionMatcher } from "@/lib/questionMatcher";

export function validateQuestionRecords(records: readonly QuestionRecord[], label: string): void {
  const seen = new Set<number>();

  records.forEach((record, index) => {
    if (!Number.isInteger(record.rowId) || record.rowId < 1) {
      throw new InputError(`${label} record at position ${index + 1} has an invalid row id: ${record.rowId}`, {
        label,
        position: index + 1
      });
    }

    if (seen.has(record.rowId)) {
      throw new InputError(`${label} row id ${record.rowId} appears more than once`, {
        label,
        rowId: record.rowId
      });
    }
    seen.add(record.rowId);

    if (typeof record.questionText !== "string" || typeof record.answerText !== "string") {
      throw new InputError(`${label} row ${record.rowId} must carry string question and answer text`, {
        label,
        rowId: record.rowId
      });
    }
  });
}

/**
 * Produces exactly one result per unanswered record, in input order. Unmatched
 * records are kept with a null reference so reviewers see every question.
 */
export async function aggregateMatchResults(params: {
  unanswered: readonly QuestionRecord[];
  reference: readonly QuestionRecord[];
  matcher: QuestionMatcher;
  comparator: AnswerComparator;
  concurrency?: number;
}): Promise<MatchResult[]> {
  if (params.unanswered.length === 0) {
    throw new InputError("Unanswered questionnaire must contain at least one question");
  }

  validateQuestionRecords(params.unanswered, "Unanswered questionnaire");
  validateQuestionRecords(params.reference, "Reference questionnaire");

  const concurrency = assertPositiveInteger("concurrency", params.concurrency ?? DEFAULT_MATCH_CONCURRENCY);

  return mapInBatches(params.unanswered, concurrency, async (unanswered): Promise<MatchResult> => {
    const questionMatch = await params.matcher.match(unanswered, params.reference);

    if (!questionMatch.bestReference) {
      return Object.freeze({
        unanswered,
        matchedReference: null,
        questionScore: questionMatch.score,
        questionReliable: questionMatch.reliable,
        answerScore: null,
        answerReliable: null
      });
    }

    const answers = await params.comparator.compare(unanswered, questionMatch.bestReference);

    return Object.freeze({
      unanswered,
      matchedReference: questionMatch.bestReference,
      questionScore: questionMatch.score,
      questionReliable: questionMatch.reliable,
      answerScore: answers.score,
      answerReliable: answers.reliable
    });
  });
}
