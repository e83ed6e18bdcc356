/**
 * Ticker symbol normalization helpers.
 */

/** Upper bound for a plausible ticker; longer entries are treated as garbage. */
export const MAX_SYMBOL_LENGTH = 15;

export function normalizeSymbol(raw: unknown): string {
  if (typeof raw !== "string") return "";
  return raw.trim().toUpperCase();
}

/**
 * Normalizes and de-duplicates symbols, keeping first-seen order and
 * dropping empty entries.
 */
export function normalizeSymbols(symbols: readonly unknown[]): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const raw of symbols) {
    const norm = normalizeSymbol(raw);
    if (!norm) continue;
    if (seen.has(norm)) continue;
    seen.add(norm);
    ordered.push(norm);
  }
  return ordered;
}

/** Parses a comma-separated list such as "nvda, AAPL,,msft". */
export function parseSymbolList(text: string | undefined): string[] {
  if (!text) return [];
  return normalizeSymbols(text.split(","));
}
