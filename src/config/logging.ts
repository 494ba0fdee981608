import { LogLevel } from "@nestjs/common";

const LEVELS: LogLevel[] = ["error", "warn", "log", "debug", "verbose"];

/**
 * Map a threshold name to the list of NestJS levels that should print.
 * Unknown names fall back to `fallback`.
 */
export function resolveLogLevels(
  level: string | undefined,
  fallback: LogLevel = "log"
): LogLevel[] {
  const normalized = (level ?? "").trim().toLowerCase();
  const index = LEVELS.findIndex((l) => l === normalized);
  const threshold = index >= 0 ? index : LEVELS.indexOf(fallback);
  return LEVELS.slice(0, threshold + 1);
}
