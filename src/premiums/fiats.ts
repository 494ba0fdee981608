export const FALLBACK_FIAT = "MXN";

/**
 * Split comma-separated and/or repeated code arguments into upper-case codes.
 */
export function splitCodes(value: unknown): string[] {
  const entries = Array.isArray(value) ? value : [value];
  return entries
    .filter((entry): entry is string => typeof entry === "string")
    .flatMap((entry) => entry.split(","))
    .map((code) => code.trim().toUpperCase())
    .filter(Boolean);
}

/**
 * Requested fiats, else the configured defaults, else MXN; de-duplicated
 * in first-seen order.
 */
export function resolveFiats(
  requested: readonly string[] | undefined,
  defaults: readonly string[] = []
): string[] {
  let fiats = splitCodes(requested ?? []);
  if (fiats.length === 0) fiats = splitCodes(defaults);
  if (fiats.length === 0) fiats = [FALLBACK_FIAT];
  return [...new Set(fiats)];
}
