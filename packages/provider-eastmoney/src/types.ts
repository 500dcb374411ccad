/**
 * @fileoverview Eastmoney provider-specific types.
 *
 * @module @etfpulse/provider-eastmoney/types
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from '@etfpulse/logger';

/**
 * Options for EastmoneyProvider configuration.
 */
export interface EastmoneyProviderOptions {
  /**
   * Preconfigured axios instance. Tests inject one with a custom adapter.
   */
  httpClient?: AxiosInstance;

  /**
   * Per-request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /**
   * Host serving list and single-quote requests.
   * @default 'https://push2.eastmoney.com'
   */
  quoteBaseUrl?: string;

  /**
   * Host serving k-line requests.
   * @default 'https://push2his.eastmoney.com'
   */
  historyBaseUrl?: string;

  /**
   * Rows requested per bulk list call; the whole fund universe fits in one page.
   * @default 5000
   */
  pageSize?: number;

  logger?: Logger;

  /** Time source for `asOf` stamps */
  now?: () => number;
}

/**
 * A row that could not be normalized, kept for the caller's diagnostics.
 */
export interface RowError {
  row: unknown;
  error: Error;
}
