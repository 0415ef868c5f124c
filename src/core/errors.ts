/**
 * Error kinds surfaced to the user.
 *
 *   InputError   – rejected before any provider call (blank code, bad file, unknown model)
 *   ServiceError – the AI service failed (network, auth, rate limit, empty answer)
 */
export type ServiceErrorReason =
  | "auth"
  | "rate-limit"
  | "network"
  | "empty-response"
  | "upstream";

export class ServiceError extends Error {
  readonly reason: ServiceErrorReason;
  readonly status: number | undefined;

  constructor(
    message: string,
    options: { reason: ServiceErrorReason; status?: number; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "ServiceError";
    this.reason = options.reason;
    this.status = options.status;
  }
}

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

const CONNECTION_ERROR_NAMES = new Set(["APIConnectionError", "APIConnectionTimeoutError"]);

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

/**
 * Map anything thrown by a provider or SDK onto a ServiceError.
 * Classification reads the HTTP status the OpenAI-compatible SDK attaches.
 */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  let reason: ServiceErrorReason = "upstream";
  if (status === 401 || status === 403) {
    reason = "auth";
  } else if (status === 429) {
    reason = "rate-limit";
  } else if (
    error instanceof Error &&
    (CONNECTION_ERROR_NAMES.has(error.name) || CONNECTION_ERROR_NAMES.has(error.constructor.name))
  ) {
    reason = "network";
  }

  return new ServiceError(`Groq API error: ${message}`, { reason, status, cause: error });
}
