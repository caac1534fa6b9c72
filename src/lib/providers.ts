import { loadEmbeddingsConfig } from "@/lib/config";
import { createSemanticSimilarityProvider, type FetchLike } from "@/lib/embeddings";
import { ConfigurationError } from "@/lib/errors";
import type { QuestionOverrides } from "@/lib/questionMatcher";
import { exactSimilarityProvider, lexicalSimilarityProvider, type SimilarityProvider } from "@/lib/similarity";

export const SIMILARITY_PROVIDER_KINDS = ["semantic", "lexical", "exact"] as const;

export type SimilarityProviderKind = (typeof SIMILARITY_PROVIDER_KINDS)[number];

export function parseProviderKind(value: string): SimilarityProviderKind {
  const normalized = value.trim().toLowerCase();
  const kind = SIMILARITY_PROVIDER_KINDS.find((candidate) => candidate === normalized);
  if (!kind) {
    throw new ConfigurationError(
      `Unknown similarity provider "${value}". Expected one of: ${SIMILARITY_PROVIDER_KINDS.join(", ")}`
    );
  }

  return kind;
}

export function createSimilarityProvider(
  kind: SimilarityProviderKind,
  params: { env?: Record<string, string | undefined>; fetchImpl?: FetchLike } = {}
): SimilarityProvider {
  switch (kind) {
    case "exact":
      return exactSimilarityProvider;
    case "lexical":
      return lexicalSimilarityProvider;
    case "semantic":
      return createSemanticSimilarityProvider({
        ...loadEmbeddingsConfig(params.env),
        fetchImpl: params.fetchImpl
      });
  }
}

export function parseQuestionOverrides(raw: unknown): QuestionOverrides {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError("Question overrides must be a JSON object mapping question text to reference question text");
  }

  const overrides: Record<string, string> = {};
  for (const [question, reference] of Object.entries(raw)) {
    if (typeof reference !== "string" || !reference.trim()) {
      throw new ConfigurationError(`Question override for "${question}" must be a non-empty string`);
    }

    overrides[question] = reference;
  }

  return overrides;
}
