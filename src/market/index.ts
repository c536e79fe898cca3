export { BinanceMarketClient } from './BinanceMarketClient.js';
export { selectUniverse, isEligibleSymbol, scoreCandidate } from './universe.js';
export { KLINE_INTERVALS, parseKlineInterval } from './types.js';
export type {
  PriceDataProvider,
  InstrumentUniverseProvider,
  TickerSnapshot,
  UniverseFilterConfig,
  BinanceMarketClientConfig,
} from './types.js';
