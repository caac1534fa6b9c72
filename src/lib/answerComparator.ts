import { DEFAULT_ANSWER_THRESHOLD, assertThreshold } from "@/lib/config";
import type { AnswerComparison, ComparisonDegradation, QuestionRecord } from "@/lib/matchTypes";
import { scoreTextPair, type SimilarityProvider } from "@/lib/similarity";

export type AnswerComparator = {
  readonly answerThreshold: number;
  compare(unanswered: QuestionRecord, matched: QuestionRecord): Promise<AnswerComparison>;
};

// Advisory only: the score never changes whether the question match is accepted.
export function createAnswerComparator(options: {
  provider: SimilarityProvider;
  answerThreshold?: number;
  onDegraded?: (degradation: ComparisonDegradation) => void;
}): AnswerComparator {
  const answerThreshold = assertThreshold("answerThreshold", options.answerThreshold ?? DEFAULT_ANSWER_THRESHOLD);

  const compare = async (unanswered: QuestionRecord, matched: QuestionRecord): Promise<AnswerComparison> => {
    const score = await scoreTextPair({
      provider: options.provider,
      left: unanswered.answerText,
      right: matched.answerText,
      onDegraded: (error) =>
        options.onDegraded?.({
          stage: "answer",
          unansweredRowId: unanswered.rowId,
          referenceRowId: matched.rowId,
          code: error.code,
          message: error.message
        })
    });

    return {
      score,
      reliable: score >= answerThreshold
    };
  };

  return {
    answerThreshold,
    compare
  };
}
