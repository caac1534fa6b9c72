import { ConfigurationError } from "@/lib/errors";

export const DEFAULT_QUESTION_THRESHOLD = 0.85;
export const DEFAULT_ANSWER_THRESHOLD = 0.85;
export const DEFAULT_MATCH_CONCURRENCY = 5;

export const DEFAULT_OPENAI_API_BASE = "https://api.openai.com/v1";
export const DEFAULT_OPENAI_EMBEDDINGS_MODEL = "text-embedding-3-small";
export const DEFAULT_OPENAI_TIMEOUT_MS = 60_000;

export type MatchConfig = {
  questionThreshold: number;
  answerThreshold: number;
  concurrency: number;
};

export type EmbeddingsConfig = {
  apiKey: string;
  apiBase: string;
  model: string;
  timeoutMs: number;
};

type Env = Record<string, string | undefined>;

export function assertThreshold(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${name} must be a number between 0 and 1 (received ${value})`, {
      name,
      value
    });
  }

  return value;
}

export function assertPositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer (received ${value})`, {
      name,
      value
    });
  }

  return value;
}

export function resolveMatchConfig(input: Partial<MatchConfig> = {}): MatchConfig {
  return {
    questionThreshold: assertThreshold(
      "questionThreshold",
      input.questionThreshold ?? DEFAULT_QUESTION_THRESHOLD
    ),
    answerThreshold: assertThreshold("answerThreshold", input.answerThreshold ?? DEFAULT_ANSWER_THRESHOLD),
    concurrency: assertPositiveInteger("concurrency", input.concurrency ?? DEFAULT_MATCH_CONCURRENCY)
  };
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be numeric (received "${raw}")`, { name, value: raw });
  }

  return value;
}

export function parseThresholdEnv(name: string, env: Env = process.env): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  return assertThreshold(name, parseNumber(name, raw));
}

export function loadEmbeddingsConfig(env: Env = process.env): EmbeddingsConfig {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required for the semantic similarity provider");
  }

  const rawTimeout = env.OPENAI_TIMEOUT_MS?.trim();
  const timeoutMs = rawTimeout
    ? assertPositiveInteger("OPENAI_TIMEOUT_MS", parseNumber("OPENAI_TIMEOUT_MS", rawTimeout))
    : DEFAULT_OPENAI_TIMEOUT_MS;

  return {
    apiKey,
    apiBase: (env.OPENAI_API_BASE?.trim() || DEFAULT_OPENAI_API_BASE).replace(/\/+$/, ""),
    model: env.OPENAI_EMBEDDINGS_MODEL?.trim() || DEFAULT_OPENAI_EMBEDDINGS_MODEL,
    timeoutMs
  };
}
