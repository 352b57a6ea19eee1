/**
 * Error types for the external services and the user-facing apologies they map to
 */

export class CompletionError extends Error {
  readonly status: string | number | undefined;

  constructor(message: string, options?: { cause?: unknown; status?: string | number }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CompletionError";
    this.status = options?.status;
  }
}

export class QueryError extends Error {
  readonly query: string;

  constructor(message: string, query: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "QueryError";
    this.query = query;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export const APOLOGIES = {
  OVERLOADED: "Estamos com muita procura agora. Pode tentar de novo em alguns instantes?",
  RATE_LIMITED: "Recebi muitas mensagens seguidas. Aguarde um pouquinho e tente novamente, por favor.",
  UNREACHABLE: "Desculpe, não consegui me conectar agora. Pode repetir sua mensagem daqui a pouco?",
  GENERIC: "Desculpe, não consegui gerar uma resposta no momento. Pode tentar novamente?",
} as const;

/**
 * Read a `status` or `code` field from an unknown error (Genkit and gRPC style)
 */
export function errorStatus(error: unknown): string | number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const status = "status" in error ? error.status : undefined;
  const code = "code" in error ? error.code : undefined;
  for (const value of [status, code]) {
    if (typeof value === "string" || typeof value === "number") {
      return value;
    }
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Convert technical errors to an apology in the customer's language
 */
export function getUserFriendlyErrorMessage(error: unknown): string {
  const message = errorMessage(error);
  const status = errorStatus(error);

  if (
    status === 503 ||
    status === "UNAVAILABLE" ||
    message.includes("overloaded") ||
    message.includes("503") ||
    message.includes("Service Unavailable")
  ) {
    return APOLOGIES.OVERLOADED;
  }

  if (status === 429 || status === "RESOURCE_EXHAUSTED" || message.includes("429") || message.includes("rate limit")) {
    return APOLOGIES.RATE_LIMITED;
  }

  if (
    error instanceof TimeoutError ||
    message.includes("fetch") ||
    message.includes("network") ||
    message.includes("ECONNREFUSED") ||
    message.includes("timeout")
  ) {
    return APOLOGIES.UNREACHABLE;
  }

  return APOLOGIES.GENERIC;
}
