import { mapInBatches } from "@/lib/batching";
import { DEFAULT_MATCH_CONCURRENCY, DEFAULT_QUESTION_THRESHOLD, assertPositiveInteger, assertThreshold } from "@/lib/config";
import type { ComparisonDegradation, MatchCandidate, QuestionMatch, QuestionRecord } from "@/lib/matchTypes";
import { scoreTextPair, type SimilarityProvider } from "@/lib/similarity";
import { normalizeText } from "@/lib/textNormalization";

export type QuestionOverrides = Readonly<Record<string, string>>;

export type QuestionMatcher = {
  readonly questionThreshold: number;
  match(unanswered: QuestionRecord, referenceSet: readonly QuestionRecord[]): Promise<QuestionMatch>;
};

export type QuestionMatcherOptions = {
  provider: SimilarityProvider;
  questionThreshold?: number;
  concurrency?: number;
  /** Pins a question (by text) to a reference question (by text). */
  questionOverrides?: QuestionOverrides;
  onDegraded?: (degradation: ComparisonDegradation) => void;
};

function compareCandidates(left: MatchCandidate, right: MatchCandidate): number {
  if (left.similarityScore !== right.similarityScore) {
    return right.similarityScore - left.similarityScore;
  }

  return left.referenceRowId - right.referenceRowId;
}

function lowestRowId(records: readonly QuestionRecord[]): QuestionRecord | null {
  let best: QuestionRecord | null = null;
  for (const record of records) {
    if (!best || record.rowId < best.rowId) {
      best = record;
    }
  }

  return best;
}

function normalizeOverrides(overrides: QuestionOverrides | undefined): Map<string, string> {
  const normalized = new Map<string, string>();
  for (const [question, reference] of Object.entries(overrides ?? {})) {
    const key = normalizeText(question);
    const target = normalizeText(reference);
    if (key && target) {
      normalized.set(key, target);
    }
  }

  return normalized;
}

export function createQuestionMatcher(options: QuestionMatcherOptions): QuestionMatcher {
  const questionThreshold = assertThreshold(
    "questionThreshold",
    options.questionThreshold ?? DEFAULT_QUESTION_THRESHOLD
  );
  const concurrency = assertPositiveInteger("concurrency", options.concurrency ?? DEFAULT_MATCH_CONCURRENCY);
  const overrides = normalizeOverrides(options.questionOverrides);

  const accept = (reference: QuestionRecord | null, score: number): QuestionMatch => {
    const reliable = reference !== null && score >= questionThreshold;
    return {
      bestReference: reliable ? reference : null,
      score,
      reliable
    };
  };

  const findPinned = (
    normalizedQuestion: string,
    referenceSet: readonly QuestionRecord[]
  ): QuestionRecord | null => {
    const target = overrides.get(normalizedQuestion);
    if (!target) {
      return null;
    }

    return lowestRowId(referenceSet.filter((reference) => normalizeText(reference.questionText) === target));
  };

  const match = async (
    unanswered: QuestionRecord,
    referenceSet: readonly QuestionRecord[]
  ): Promise<QuestionMatch> => {
    if (referenceSet.length === 0) {
      return accept(null, 0);
    }

    const normalizedQuestion = normalizeText(unanswered.questionText);
    if (normalizedQuestion) {
      const exact = lowestRowId(
        referenceSet.filter((reference) => normalizeText(reference.questionText) === normalizedQuestion)
      );
      if (exact) {
        return accept(exact, 1);
      }

      const pinned = findPinned(normalizedQuestion, referenceSet);
      if (pinned) {
        return accept(pinned, 1);
      }
    }

    const candidates = await mapInBatches(referenceSet, concurrency, async (reference): Promise<MatchCandidate> => {
      const score = await scoreTextPair({
        provider: options.provider,
        left: unanswered.questionText,
        right: reference.questionText,
        onDegraded: (error) =>
          options.onDegraded?.({
            stage: "question",
            unansweredRowId: unanswered.rowId,
            referenceRowId: reference.rowId,
            code: error.code,
            message: error.message
          })
      });

      return { referenceRowId: reference.rowId, similarityScore: score };
    });

    const [best] = [...candidates].sort(compareCandidates);
    const bestReference = referenceSet.find((reference) => reference.rowId === best.referenceRowId) ?? null;

    return accept(bestReference, best.similarityScore);
  };

  return {
    questionThreshold,
    match
  };
}
