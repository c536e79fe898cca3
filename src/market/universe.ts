/**
 * Instrument universe rules
 *
 * Filters 24h tickers down to liquid, non-wrapped, non-stable,
 * non-leveraged perpetuals and ranks them by range width per unit of
 * log volume.
 */

import type { TickerSnapshot, UniverseFilterConfig } from './types.js';

export const WRAPPED_ASSETS: ReadonlySet<string> = new Set(['WBTC', 'WETH', 'WSOL', 'WBNB']);
export const STABLE_ASSETS: ReadonlySet<string> = new Set(['USDT', 'USDC', 'BUSD', 'DAI', 'FDUSD', 'TUSD']);
export const BLACKLISTED_ASSETS: ReadonlySet<string> = new Set(['LUNA', 'LUNC', 'USTC']);
export const LEVERAGED_SUFFIXES: readonly string[] = ['UP', 'DOWN', '3L', '3S', '5L', '5S'];

const MIN_UNDERLYING_LENGTH = 3;

/**
 * Base asset of a symbol quoted in `quoteAsset`, or null for other quotes
 */
export function getBaseAsset(symbol: string, quoteAsset: string): string | null {
  const upper = symbol.toUpperCase();
  if (!upper.endsWith(quoteAsset) || upper.length <= quoteAsset.length) {
    return null;
  }
  return upper.slice(0, -quoteAsset.length);
}

/**
 * Check the symbol-level exclusion rules
 */
export function isEligibleSymbol(
  symbol: string,
  quoteAsset: string,
  excludeSymbols: readonly string[] = []
): boolean {
  const base = getBaseAsset(symbol, quoteAsset);
  if (base === null) {
    return false;
  }

  if (WRAPPED_ASSETS.has(base) || STABLE_ASSETS.has(base) || BLACKLISTED_ASSETS.has(base)) {
    return false;
  }
  if (excludeSymbols.includes(base) || excludeSymbols.includes(symbol.toUpperCase())) {
    return false;
  }
  return !isLeveragedToken(base);
}

/**
 * Leveraged tokens carry a suffix after a full ticker (BTCUP, ETH3L), so
 * short names such as JUP are not matched
 */
export function isLeveragedToken(base: string): boolean {
  return LEVERAGED_SUFFIXES.some(
    (suffix) => base.endsWith(suffix) && base.length - suffix.length >= MIN_UNDERLYING_LENGTH
  );
}

/**
 * Range width per unit of log10 notional; wider ranges on thinner books rank higher
 */
export function scoreCandidate(ticker: TickerSnapshot): number {
  const widthPct = ((ticker.highPrice - ticker.lowPrice) / ticker.lastPrice) * 100;
  return widthPct / Math.max(1, Math.log10(ticker.quoteVolume));
}

/**
 * Filter and rank tickers into the scan universe
 */
export function selectUniverse(tickers: readonly TickerSnapshot[], config: UniverseFilterConfig): string[] {
  return tickers
    .filter(
      (ticker) =>
        isEligibleSymbol(ticker.symbol, config.quoteAsset, config.excludeSymbols) &&
        ticker.lastPrice >= config.minPrice &&
        ticker.quoteVolume >= config.minNotional &&
        Math.abs(ticker.priceChangePercent) >= config.minPriceChangePct
    )
    .map((ticker) => ({ symbol: ticker.symbol, score: scoreCandidate(ticker) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, config.topCandidates)
    .map((candidate) => candidate.symbol);
}
