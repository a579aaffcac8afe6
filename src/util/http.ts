/**
 * HTTP Utility Module
 *
 * Performs JSON GET requests against the data provider and maps every
 * transport or HTTP failure onto the typed upstream errors:
 * - timeout → UpstreamTimeoutError
 * - connection failures → UpstreamUnreachableError
 * - non-2xx → UpstreamBadStatusError
 * - body that is not a JSON object → MalformedResponseError
 */

import { AxiosError, isAxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import {
  MalformedResponseError,
  UpstreamBadStatusError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
  toError,
  type UpstreamError
} from '../errors/index.js';
import { logger } from '../core/logger.js';
import { isJsonObject } from './validation.js';
import type { JsonObject } from '../types/api.js';

export interface GetJsonOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

/**
 * Maps an exception thrown by axios onto a typed upstream error
 */
function mapTransportError(err: unknown, url: string, timeoutMs: number): UpstreamError {
  if (isAxiosError(err)) {
    if (err.code === AxiosError.ECONNABORTED || err.code === AxiosError.ETIMEDOUT) {
      return new UpstreamTimeoutError(url, timeoutMs, err);
    }
    return new UpstreamUnreachableError(`Upstream unreachable: ${err.message}`, url, err);
  }
  const error = toError(err);
  return new UpstreamUnreachableError(`HTTP request failed: ${error.message}`, url, error);
}

/**
 * Performs an HTTP GET and returns the parsed JSON object body
 *
 * Exactly one request is made; retries are the caller's decision.
 * Status codes never throw inside axios (validateStatus: () => true) so
 * that they can be mapped here.
 *
 * @example
 * const body = await httpGetJson(http, 'https://api-web.nhle.com/v1/standings/now', { timeoutMs: 10000 });
 */
export async function httpGetJson(http: AxiosInstance, url: string, options: GetJsonOptions): Promise<JsonObject> {
  // axios' timeout only bounds socket idle time; the signal bounds the whole call
  const deadline = AbortSignal.timeout(options.timeoutMs);
  let res: AxiosResponse<unknown>;
  try {
    res = await http.get<unknown>(url, {
      headers: options.headers,
      timeout: options.timeoutMs,
      signal: deadline,
      responseType: 'json',
      validateStatus: () => true
    });
  } catch (err) {
    const mapped = deadline.aborted
      ? new UpstreamTimeoutError(url, options.timeoutMs, toError(err))
      : mapTransportError(err, url, options.timeoutMs);
    logger.warn({ url, code: mapped.code }, 'HTTP request failed');
    throw mapped;
  }

  if (res.status < 200 || res.status >= 300) {
    logger.warn({ url, status: res.status }, 'HTTP request returned error status');
    throw new UpstreamBadStatusError(url, res.status);
  }

  // axios hands back the raw string when the body is not valid JSON
  if (!isJsonObject(res.data)) {
    const kind = Array.isArray(res.data) ? 'array' : typeof res.data;
    throw new MalformedResponseError(`Expected a JSON object body, got ${kind}`, url);
  }

  return res.data;
}
