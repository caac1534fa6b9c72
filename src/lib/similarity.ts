import { getErrorMessage, isProviderError, type ProviderError } from "@/lib/errors";
import { normalizeText } from "@/lib/textNormalization";

/**
 * Capability consumed by the matcher and comparator. Implementations return a
 * score in [0,1] where 1 means the two texts say the same thing.
 */
export type SimilarityProvider = {
  readonly name: string;
  similarity(left: string, right: string): Promise<number>;
};

export function exactSimilarity(left: string, right: string): number {
  const normalizedLeft = normalizeText(left);
  if (!normalizedLeft) {
    return 0;
  }

  return normalizedLeft === normalizeText(right) ? 1 : 0;
}

export const exactSimilarityProvider: SimilarityProvider = {
  name: "exact",
  similarity: async (left, right) => exactSimilarity(left, right)
};

function toBigrams(value: string): Set<string> {
  if (value.length < 2) {
    return new Set(value ? [value] : []);
  }

  const bag = new Set<string>();
  for (let index = 0; index < value.length - 1; index += 1) {
    bag.add(value.slice(index, index + 2));
  }

  return bag;
}

/** Sørensen–Dice coefficient over character bigrams of the normalized texts. */
export function lexicalSimilarity(left: string, right: string): number {
  const normalizedLeft = normalizeText(left);
  const normalizedRight = normalizeText(right);
  if (!normalizedLeft || !normalizedRight) {
    return 0;
  }

  if (normalizedLeft === normalizedRight) {
    return 1;
  }

  const leftBigrams = toBigrams(normalizedLeft);
  const rightBigrams = toBigrams(normalizedRight);

  let overlap = 0;
  for (const gram of leftBigrams) {
    if (rightBigrams.has(gram)) {
      overlap += 1;
    }
  }

  return (2 * overlap) / (leftBigrams.size + rightBigrams.size);
}

export const lexicalSimilarityProvider: SimilarityProvider = {
  name: "lexical",
  similarity: async (left, right) => lexicalSimilarity(left, right)
};

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.min(1, Math.max(0, value));
}

/**
 * Scores one text pair. Identical text (after normalization) is always 1 and
 * never reaches the provider; empty text is always 0. Provider timeouts and
 * outages degrade the pair to 0 and are reported through `onDegraded`.
 */
export async function scoreTextPair(params: {
  provider: SimilarityProvider;
  left: string;
  right: string;
  onDegraded?: (error: ProviderError) => void;
}): Promise<number> {
  const normalizedLeft = normalizeText(params.left);
  const normalizedRight = normalizeText(params.right);
  if (!normalizedLeft || !normalizedRight) {
    return 0;
  }

  if (normalizedLeft === normalizedRight) {
    return 1;
  }

  try {
    return clampScore(await params.provider.similarity(normalizedLeft, normalizedRight));
  } catch (error) {
    if (!isProviderError(error)) {
      throw new Error(`Similarity provider "${params.provider.name}" failed: ${getErrorMessage(error)}`, {
        cause: error
      });
    }

    params.onDegraded?.(error);
    return 0;
  }
}
