import type { Logger } from "./logger.js";
import { errorMessage, errorStatus } from "./errors.js";

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  logger?: Logger;
}

/**
 * Model overload and rate limiting are worth retrying; anything else is not
 */
export function isRetryableError(error: unknown): boolean {
  const status = errorStatus(error);
  const message = errorMessage(error);
  return (
    status === 503 ||
    status === 429 ||
    status === "UNAVAILABLE" ||
    status === "RESOURCE_EXHAUSTED" ||
    message.includes("overloaded") ||
    message.includes("503")
  );
}

export const retryWithBackoff = async <T>(
  fn: () => Promise<T>,
  { maxRetries = 3, initialDelay = 1000, logger }: RetryOptions = {}
): Promise<T> => {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error) || attempt === maxRetries) {
        throw error;
      }

      const delay = initialDelay * Math.pow(2, attempt);
      const message = errorMessage(error);
      const shortMessage = message.length > 100 ? message.substring(0, 100) + "..." : message;

      logger?.warn(`API temporarily unavailable. Retry attempt ${attempt + 1}/${maxRetries} after ${delay}ms`, {
        reason: shortMessage,
      });

      await sleep(delay);
    }
  }

  throw lastError;
};
