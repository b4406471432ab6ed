export class DataFormatError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[], options?: { cause?: unknown }) {
    super(`Invalid data in ${source}:\n${issues.map((issue) => `- ${issue}`).join("\n")}`, options);
    this.name = "DataFormatError";
    this.source = source;
    this.issues = issues;
  }
}

/**
 * Raised when the language model could not produce (or finish) a reply.
 * The original failure is kept as `cause`.
 */
export class GenerationError extends Error {
  readonly sessionId: string | null;

  constructor(message: string, options: { cause?: unknown; sessionId?: string | null } = {}) {
    super(message, { cause: options.cause });
    this.name = "GenerationError";
    this.sessionId = options.sessionId ?? null;
  }
}

export class JudgeResponseError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = "JudgeResponseError";
    this.operation = operation;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return String(error ?? "unknown error");
};

export const SAFE_USER_ERROR = "The answer could not be completed right now. Please try again.";
export const INFRASTRUCTURE_SAFE_USER_ERROR =
  "The language model service is currently unavailable. Please try again later.";

const collectErrorText = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error ?? "");
  }

  const parts = [error.name, error.message];
  let cause = error.cause;
  while (cause !== undefined && parts.length < 12) {
    if (cause instanceof Error) {
      parts.push(cause.name, cause.message);
      cause = cause.cause;
    } else {
      parts.push(String(cause));
      cause = undefined;
    }
  }
  return parts.filter(Boolean).join(" | ");
};

const isInfrastructureFailure = (error: unknown): boolean =>
  /openai|apiconnection|connection error|fetch failed|timeout|timed out|rate limit|econn/i.test(
    collectErrorText(error)
  );

export const toSafeUserErrorMessage = (error: unknown): string =>
  isInfrastructureFailure(error) ? INFRASTRUCTURE_SAFE_USER_ERROR : SAFE_USER_ERROR;
