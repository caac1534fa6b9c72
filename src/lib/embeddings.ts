import type { EmbeddingsConfig } from "@/lib/config";
import { ProviderTimeoutError, ProviderUnavailableError, getErrorMessage } from "@/lib/errors";
import { clampScore, type SimilarityProvider } from "@/lib/similarity";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type EmbeddingsClientOptions = EmbeddingsConfig & {
  fetchImpl?: FetchLike;
};

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((entry) => typeof entry === "number");
}

async function requestEmbeddings(
  options: EmbeddingsClientOptions,
  payload: Record<string, unknown>
): Promise<unknown> {
  const fetchImpl = options.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(`${options.apiBase}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new ProviderTimeoutError(`Embeddings request timed out after ${options.timeoutMs}ms`, options.timeoutMs);
    }

    throw new ProviderUnavailableError(`Embeddings request failed: ${getErrorMessage(error)}`, {
      details: { cause: getErrorMessage(error) }
    });
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    throw new ProviderUnavailableError(`Embeddings request failed (${response.status}): ${errorText}`, {
      status: response.status
    });
  }

  try {
    return await response.json();
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new ProviderTimeoutError(`Embeddings response timed out after ${options.timeoutMs}ms`, options.timeoutMs);
    }

    throw new ProviderUnavailableError(`Embeddings response was not valid JSON: ${getErrorMessage(error)}`);
  }
}

export async function createEmbedding(input: string, options: EmbeddingsClientOptions): Promise<number[]> {
  const payload = await requestEmbeddings(options, {
    model: options.model,
    input
  });

  const data = isRecord(payload) ? payload.data : undefined;
  const first: unknown = Array.isArray(data) ? data[0] : undefined;
  const embedding = isRecord(first) ? first.embedding : undefined;
  if (!isNumberArray(embedding)) {
    throw new ProviderUnavailableError("Embedding response is missing or malformed");
  }

  return embedding;
}

export function cosineSimilarity(left: number[], right: number[]): number {
  if (left.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] * left[index];
    rightNorm += right[index] * right[index];
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

export function createSemanticSimilarityProvider(options: EmbeddingsClientOptions): SimilarityProvider {
  const cache = new Map<string, Promise<number[]>>();

  const embed = (text: string): Promise<number[]> => {
    const cached = cache.get(text);
    if (cached) {
      return cached;
    }

    const pending = createEmbedding(text, options);
    cache.set(text, pending);
    // Failed lookups are evicted so the next pair asks again.
    void pending.catch(() => {
      if (cache.get(text) === pending) {
        cache.delete(text);
      }
    });

    return pending;
  };

  return {
    name: "semantic",
    async similarity(left, right) {
      const [leftEmbedding, rightEmbedding] = await Promise.all([embed(left), embed(right)]);
      return clampScore(cosineSimilarity(leftEmbedding, rightEmbedding));
    }
  };
}
