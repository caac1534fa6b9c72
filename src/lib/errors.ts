export type QuestionMatchErrorCode =
  | "INPUT_ERROR"
  | "CONFIGURATION_ERROR"
  | "PROVIDER_UNAVAILABLE"
  | "PROVIDER_TIMEOUT";

export class QuestionMatchError extends Error {
  readonly code: QuestionMatchErrorCode;
  readonly details?: unknown;

  constructor(params: { code: QuestionMatchErrorCode; message: string; details?: unknown }) {
    super(params.message);
    this.name = new.target.name;
    this.code = params.code;
    this.details = params.details;
  }
}

export class InputError extends QuestionMatchError {
  constructor(message: string, details?: unknown) {
    super({ code: "INPUT_ERROR", message, details });
  }
}

export class ConfigurationError extends QuestionMatchError {
  constructor(message: string, details?: unknown) {
    super({ code: "CONFIGURATION_ERROR", message, details });
  }
}

export class ProviderUnavailableError extends QuestionMatchError {
  override readonly code = "PROVIDER_UNAVAILABLE";
  readonly status: number | null;

  constructor(message: string, params: { status?: number; details?: unknown } = {}) {
    super({ code: "PROVIDER_UNAVAILABLE", message, details: params.details });
    this.status = params.status ?? null;
  }
}

export class ProviderTimeoutError extends QuestionMatchError {
  override readonly code = "PROVIDER_TIMEOUT";
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super({ code: "PROVIDER_TIMEOUT", message });
    this.timeoutMs = timeoutMs;
  }
}

export type ProviderError = ProviderUnavailableError | ProviderTimeoutError;

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderUnavailableError || error instanceof ProviderTimeoutError;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
