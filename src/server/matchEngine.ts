import { createAnswerComparator } from "@/lib/answerComparator";
import { resolveMatchConfig } from "@/lib/config";
import type { ComparisonDegradation, MatchRun, QuestionRecord } from "@/lib/matchTypes";
import { createQuestionMatcher, type QuestionOverrides } from "@/lib/questionMatcher";
import { aggregateMatchResults } from "@/lib/resultAggregator";
import type { SimilarityProvider } from "@/lib/similarity";

export type RunQuestionnaireMatchInput = {
  reference: readonly QuestionRecord[];
  unanswered: readonly QuestionRecord[];
  provider: SimilarityProvider;
  questionThreshold?: number;
  answerThreshold?: number;
  concurrency?: number;
  questionOverrides?: QuestionOverrides;
};

export async function runQuestionnaireMatch(input: RunQuestionnaireMatchInput): Promise<MatchRun> {
  const config = resolveMatchConfig({
    questionThreshold: input.questionThreshold,
    answerThreshold: input.answerThreshold,
    concurrency: input.concurrency
  });

  const degradations: ComparisonDegradation[] = [];
  const recordDegradation = (degradation: ComparisonDegradation) => {
    degradations.push(degradation);
  };

  const matcher = createQuestionMatcher({
    provider: input.provider,
    questionThreshold: config.questionThreshold,
    concurrency: config.concurrency,
    questionOverrides: input.questionOverrides,
    onDegraded: recordDegradation
  });
  const comparator = createAnswerComparator({
    provider: input.provider,
    answerThreshold: config.answerThreshold,
    onDegraded: recordDegradation
  });

  const results = await aggregateMatchResults({
    unanswered: input.unanswered,
    reference: input.reference,
    matcher,
    comparator,
    concurrency: config.concurrency
  });

  // Completion order depends on the provider; report degradations in row order.
  degradations.sort(
    (left, right) =>
      left.unansweredRowId - right.unansweredRowId ||
      (left.stage === right.stage ? 0 : left.stage === "question" ? -1 : 1) ||
      left.referenceRowId - right.referenceRowId
  );

  if (degradations.length > 0) {
    console.warn(
      `Similarity provider "${input.provider.name}" degraded ${degradations.length} comparison(s) to a score of 0`
    );
  }

  return {
    results,
    degradedComparisons: degradations.length,
    degradations
  };
}
