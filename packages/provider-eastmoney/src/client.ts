/**
 * @fileoverview HTTP client for the Eastmoney push endpoints.
 *
 * Thin wrapper over axios that maps transport failures into the provider
 * error taxonomy. Retrying is the caller's concern.
 *
 * @module @etfpulse/provider-eastmoney/client
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { ProviderError, ProviderRateLimitError, describeError } from '@etfpulse/contracts';
import type { Logger } from '@etfpulse/logger';

export const PROVIDER_ID = 'eastmoney';

export type QueryParams = Record<string, string | number>;

/**
 * Parses a Retry-After header given in seconds.
 */
function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * HTTP client for Eastmoney.
 *
 * @internal
 */
export class EastmoneyClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly logger: Logger
  ) {}

  /**
   * GETs `url` and returns the decoded body.
   *
   * @throws {ProviderRateLimitError} On HTTP 429
   * @throws {ProviderError} On any other HTTP or network failure
   */
  async getJson(url: string, params: QueryParams, operation: string): Promise<unknown> {
    this.logger.debug('Eastmoney request', { url, operation, params });

    try {
      const response = await this.http.get<unknown>(url, { params, responseType: 'json' });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const statusCode = error.response?.status;
        if (statusCode === 429) {
          throw new ProviderRateLimitError('Eastmoney rate limit exceeded', {
            provider: PROVIDER_ID,
            operation,
            retryAfter: parseRetryAfter(error.response?.headers['retry-after']),
          });
        }
        throw new ProviderError(`Eastmoney ${operation} failed: ${error.message}`, {
          provider: PROVIDER_ID,
          operation,
          statusCode,
          errorCode: error.code,
        });
      }
      throw new ProviderError(`Eastmoney ${operation} failed: ${describeError(error)}`, {
        provider: PROVIDER_ID,
        operation,
      });
    }
  }
}
