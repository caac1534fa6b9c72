import { describe, expect, it, vi } from "vitest";
import { ProviderTimeoutError, ProviderUnavailableError } from "./errors";
import {
  exactSimilarity,
  exactSimilarityProvider,
  lexicalSimilarity,
  scoreTextPair,
  type SimilarityProvider
} from "./similarity";

function providerReturning(implementation: (left: string, right: string) => Promise<number>) {
  const similarity = vi.fn(implementation);
  const provider: SimilarityProvider = { name: "fake", similarity };
  return { provider, similarity };
}

describe("exact similarity", () => {
  it("scores normalized-identical text as 1 and anything else as 0", () => {
    expect(exactSimilarity("Yes", " yes. ")).toBe(1);
    expect(exactSimilarity("Do you use C++?", "Do you use C?")).toBe(0);
    expect(exactSimilarity("\u0915\u093F", "\u0915\u093E")).toBe(0);
    expect(exactSimilarity("yes", "no")).toBe(0);
    expect(exactSimilarity("", "")).toBe(0);
    expect(exactSimilarity("?", "!")).toBe(0);
  });

  it("exposes the same rule as a provider", async () => {
    await expect(exactSimilarityProvider.similarity("Do you log access?", "do you log access")).resolves.toBe(1);
  });
});

describe("lexical similarity", () => {
  it("computes the bigram dice coefficient", () => {
    expect(lexicalSimilarity("night", "nacht")).toBe(0.25);
    expect(lexicalSimilarity("Night!", "night")).toBe(1);
    expect(lexicalSimilarity("", "night")).toBe(0);
  });
});

describe("scoreTextPair", () => {
  it("short-circuits identical text without calling the provider", async () => {
    const { provider, similarity } = providerReturning(async () => 0.1);

    const result = await scoreTextPair({
      provider,
      left: "Do you have a privacy policy?",
      right: "do you have a PRIVACY policy"
    });

    expect(result).toBe(1);
    expect(similarity).not.toHaveBeenCalled();
  });

  it("scores empty text as 0 without calling the provider", async () => {
    const { provider, similarity } = providerReturning(async () => 0.9);

    await expect(scoreTextPair({ provider, left: "   ", right: "Yes" })).resolves.toBe(0);
    expect(similarity).not.toHaveBeenCalled();
  });

  it("passes normalized text to the provider and clamps its score", async () => {
    const { provider, similarity } = providerReturning(async () => 1.7);

    const result = await scoreTextPair({ provider, left: "Do you encrypt data?", right: "Is data encrypted?" });

    expect(similarity).toHaveBeenCalledWith("do you encrypt data", "is data encrypted");
    expect(result).toBe(1);
  });

  it("treats a non-finite provider score as 0", async () => {
    const { provider } = providerReturning(async () => Number.NaN);

    await expect(scoreTextPair({ provider, left: "a b", right: "c d" })).resolves.toBe(0);
  });

  it("degrades provider timeouts and outages to 0 and reports them", async () => {
    const timeout = new ProviderTimeoutError("Embeddings request timed out after 10ms", 10);
    const outage = new ProviderUnavailableError("Embeddings request failed (503): busy", { status: 503 });
    const onDegraded = vi.fn();

    const timedOut = await scoreTextPair({
      provider: providerReturning(async () => Promise.reject(timeout)).provider,
      left: "first question",
      right: "second question",
      onDegraded
    });
    const unavailable = await scoreTextPair({
      provider: providerReturning(async () => Promise.reject(outage)).provider,
      left: "first question",
      right: "second question",
      onDegraded
    });

    expect(timedOut).toBe(0);
    expect(unavailable).toBe(0);
    expect(onDegraded).toHaveBeenNthCalledWith(1, timeout);
    expect(onDegraded).toHaveBeenNthCalledWith(2, outage);
  });

  it("propagates errors that are not provider failures", async () => {
    const { provider } = providerReturning(async () => {
      throw new Error("boom");
    });

    await expect(scoreTextPair({ provider, left: "first", right: "second" })).rejects.toThrow(
      'Similarity provider "fake" failed: boom'
    );
  });
});
