export interface TradingPair {
  base: string;
  quote: string;
}

/** Accepts both 'ETH-USDT' and 'ETH/USDT'. */
export const parseTradingPair = (symbol: string): TradingPair => {
  const [base, quote, ...rest] = symbol.split(/[-/]/).map((s) => s.trim().toUpperCase());
  if (!base || !quote || rest.length > 0) {
    throw new Error(`invalid trading pair: ${symbol}`);
  }
  return { base, quote };
};

/** ccxt addresses spot markets as BASE/QUOTE. */
export const toUnifiedSymbol = (symbol: string): string => {
  const { base, quote } = parseTradingPair(symbol);
  return `${base}/${quote}`;
};
