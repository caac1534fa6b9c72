export type QuestionRecord = {
  readonly rowId: number;
  readonly questionText: string;
  readonly answerText: string;
};

export type MatchCandidate = {
  referenceRowId: number;
  similarityScore: number;
};

/**
 * Outcome of matching one unanswered question. `score` is the best score seen
 * across the reference set even when it fell below the threshold, so rejected
 * near-misses stay visible to reviewers.
 */
export type QuestionMatch = {
  bestReference: QuestionRecord | null;
  score: number;
  reliable: boolean;
};

export type AnswerComparison = {
  score: number;
  reliable: boolean;
};

export type MatchResult = {
  readonly unanswered: QuestionRecord;
  readonly matchedReference: QuestionRecord | null;
  readonly questionScore: number;
  readonly questionReliable: boolean;
  readonly answerScore: number | null;
  readonly answerReliable: boolean | null;
};

export type ComparisonStage = "question" | "answer";

export type ComparisonDegradation = {
  stage: ComparisonStage;
  unansweredRowId: number;
  referenceRowId: number;
  code: "PROVIDER_TIMEOUT" | "PROVIDER_UNAVAILABLE";
  message: string;
};

export type MatchRun = {
  results: MatchResult[];
  degradedComparisons: number;
  degradations: ComparisonDegradation[];
};
