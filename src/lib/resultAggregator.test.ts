import { describe, expect, it, vi } from "vitest";
import { createTableProvider } from "../../test/fakeSimilarityProvider";
import { createAnswerComparator } from "./answerComparator";
import { InputError } from "./errors";
import type { QuestionRecord } from "./matchTypes";
import { createQuestionMatcher } from "./questionMatcher";
import { aggregateMatchResults, validateQuestionRecords } from "./resultAggregator";

function record(rowId: number, questionText: string, answerText = ""): QuestionRecord {
  return { rowId, questionText, answerText };
}

function buildPipeline(table: Parameters<typeof createTableProvider>[0] = {}) {
  const { provider, similarity } = createTableProvider(table);
  const matcher = createQuestionMatcher({ provider });
  const comparator = createAnswerComparator({ provider });
  return { matcher, comparator, similarity };
}

describe("aggregateMatchResults", () => {
  it("refuses to run without unanswered questions", async () => {
    const { matcher, comparator } = buildPipeline();

    await expect(
      aggregateMatchResults({ unanswered: [], reference: [record(1, "Q")], matcher, comparator })
    ).rejects.toBeInstanceOf(InputError);
  });

  it("returns every unanswered record unmatched when the reference set is empty", async () => {
    const { matcher, comparator, similarity } = buildPipeline();
    const unanswered = [record(1, "First?", "a"), record(2, "Second?", "b"), record(3, "Third?", "c")];

    const results = await aggregateMatchResults({ unanswered, reference: [], matcher, comparator });

    expect(results).toHaveLength(3);
    expect(results.map((result) => result.unanswered)).toEqual(unanswered);
    for (const result of results) {
      expect(result.matchedReference).toBeNull();
      expect(result.questionScore).toBe(0);
      expect(result.questionReliable).toBe(false);
      expect(result.answerScore).toBeNull();
      expect(result.answerReliable).toBeNull();
    }
    expect(similarity).not.toHaveBeenCalled();
  });

  it("preserves input order when comparisons finish out of order", async () => {
    const { matcher, comparator } = buildPipeline({
      "slow question|reference one": { score: 0.9, delayMs: 20 },
      "fast question|reference one": { score: 0.2, delayMs: 0 }
    });
    const unanswered = [record(1, "Slow question", "x"), record(2, "Fast question", "y")];

    const results = await aggregateMatchResults({
      unanswered,
      reference: [record(1, "Reference one", "x")],
      matcher,
      comparator
    });

    expect(results.map((result) => result.unanswered.rowId)).toEqual([1, 2]);
    expect(results[0].questionScore).toBe(0.9);
    expect(results[0].answerScore).toBe(1);
    expect(results[1].questionScore).toBe(0.2);
    expect(results[1].matchedReference).toBeNull();
  });

  it("only compares answers for accepted matches and freezes results", async () => {
    const { matcher, comparator } = buildPipeline({ "unrelated|reference": 0.3 });
    const compareSpy = vi.spyOn(comparator, "compare");

    const results = await aggregateMatchResults({
      unanswered: [record(1, "Reference", "Yes"), record(2, "Unrelated", "No")],
      reference: [record(1, "Reference", "Yes")],
      matcher,
      comparator
    });

    expect(compareSpy).toHaveBeenCalledTimes(1);
    expect(results[0]).toEqual({
      unanswered: record(1, "Reference", "Yes"),
      matchedReference: record(1, "Reference", "Yes"),
      questionScore: 1,
      questionReliable: true,
      answerScore: 1,
      answerReliable: true
    });
    expect(results[1].answerScore).toBeNull();
    expect(Object.isFrozen(results[0])).toBe(true);
  });
});

describe("validateQuestionRecords", () => {
  it("rejects invalid and duplicate row ids", () => {
    expect(() => validateQuestionRecords([record(0, "Q")], "Reference questionnaire")).toThrow(
      "Reference questionnaire record at position 1 has an invalid row id: 0"
    );
    expect(() => validateQuestionRecords([record(1, "Q"), record(1, "R")], "Unanswered questionnaire")).toThrow(
      "Unanswered questionnaire row id 1 appears more than once"
    );
    expect(() => validateQuestionRecords([record(1.5, "Q")], "Reference questionnaire")).toThrow(InputError);
  });

  it("accepts an empty list", () => {
    expect(() => validateQuestionRecords([], "Reference questionnaire")).not.toThrow();
  });
});
