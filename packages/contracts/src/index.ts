/**
 * @fileoverview Main entry point for @etfpulse/contracts.
 *
 * Shared data model, provider contract, error taxonomy and clock.
 *
 * @module @etfpulse/contracts
 */

// Market data types
export type {
  InstrumentSnapshot,
  PriceBar,
  HistoricalSeries,
  InstrumentInfo,
  InstrumentQuote,
  BarInterval,
  BarsRequest,
  MarketDataProvider,
} from './market.js';

// Series construction and derived views
export { createSeries, meanClose, closeStdDev } from './series.js';

// Error classes and guards
export {
  EtfPulseError,
  InvalidSymbolError,
  ProviderError,
  ProviderRateLimitError,
  ProviderParseError,
  EmptyResponseError,
  RetryExhaustedError,
  ConfigurationError,
  isEtfPulseError,
  isInvalidSymbolError,
  isProviderError,
  isProviderRateLimitError,
  isRetryExhaustedError,
  isConfigurationError,
  describeError,
} from './errors.js';

// Time source
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
