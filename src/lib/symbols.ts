/**
 * Trading pair symbol parsing.
 *
 * Symbols use the unified `BASE/QUOTE` form, optionally followed by `:SETTLE`
 * for derivatives (e.g. `BTC/USDC:USDC`).
 */

export interface ParsedSymbol {
  base: string;
  quote: string;
  settle: string | null;
}

const SYMBOL_PATTERN = /^([^/:\s]+)\/([^/:\s]+)(?::([^/:\s]+))?$/;

/**
 * Split a unified symbol into its assets.
 *
 * @throws {Error} When the symbol is not in `BASE/QUOTE[:SETTLE]` form
 */
export const parseSymbol = (symbol: string): ParsedSymbol => {
  const match = SYMBOL_PATTERN.exec(symbol.trim());
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid symbol: "${symbol}"`);
  }
  return {
    base: match[1],
    quote: match[2],
    settle: match[3] ?? null,
  };
};

/** Quote asset of a symbol, or null when it does not parse. */
export const getQuoteAsset = (symbol: string): string | null => {
  try {
    return parseSymbol(symbol).quote;
  } catch {
    return null;
  }
};
