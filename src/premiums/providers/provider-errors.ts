import { Logger } from "@nestjs/common";
import axios from "axios";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log a failed provider call. Timeouts and rate limits are expected in
 * normal operation and go out as warnings.
 */
export function logProviderError(
  logger: Logger,
  context: string,
  error: unknown
): void {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      logger.warn(`Timeout fetching ${context}`);
    } else if (error.response?.status === 429) {
      logger.warn(`Received 429 rate limit while fetching ${context}`);
    } else {
      logger.error(`HTTP error fetching ${context}: ${error.message}`);
    }
    return;
  }

  logger.error(`Unexpected error fetching ${context}: ${errorMessage(error)}`);
}
