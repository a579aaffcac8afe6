/**
 * NHL API Client Module
 *
 * Constructs URLs for the NHL web API and performs one outbound call per
 * fetch. Responses are returned raw; shaping them is the normalizers' job.
 */

import axios, { type AxiosInstance } from 'axios';
import { logger } from '../core/logger.js';
import { httpGetJson } from '../util/http.js';
import { isValidDateISO, isValidTeamCode, isValidUrl, ValidationError } from '../util/validation.js';
import type { RawPayload, Scope, UpstreamKind } from '../types/api.js';

/**
 * Outbound contract the cache loaders depend on
 */
export interface Upstream {
  fetch(kind: UpstreamKind, scope: Scope): Promise<RawPayload>;
}

export interface NhlApiClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

/**
 * Constructs URL for a team's season schedule relative to today
 *
 * @example
 * scheduleUrl('https://api-web.nhle.com', 'MIN')
 * // Returns: https://api-web.nhle.com/v1/club-schedule-season/MIN/now
 */
export function scheduleUrl(baseUrl: string, team: string): string {
  if (!isValidTeamCode(team)) {
    throw new ValidationError(`Invalid team code: ${team}`, 'team');
  }
  return `${baseUrl}/v1/club-schedule-season/${team}/now`;
}

/**
 * Constructs URL for the league-wide standings as of today
 *
 * The provider redirects /now to /v1/standings/{YYYY-MM-DD}.
 */
export function standingsUrl(baseUrl: string): string {
  return `${baseUrl}/v1/standings/now`;
}

/**
 * Constructs URL for the TV schedule of one date
 *
 * @example
 * tvScheduleUrl('https://api-web.nhle.com', '2025-01-15')
 * // Returns: https://api-web.nhle.com/v1/network/tv-schedule/2025-01-15
 */
export function tvScheduleUrl(baseUrl: string, dateISO: string): string {
  if (!isValidDateISO(dateISO)) {
    throw new ValidationError(`Invalid date format: ${dateISO}`, 'date');
  }
  return `${baseUrl}/v1/network/tv-schedule/${dateISO}`;
}

/**
 * HTTP client for the NHL web API
 *
 * The axios instance can be injected; tests pass one with an in-process adapter.
 */
export class NhlApiClient implements Upstream {
  private readonly http: AxiosInstance;

  constructor(private readonly options: NhlApiClientOptions, http?: AxiosInstance) {
    if (!isValidUrl(options.baseUrl)) {
      throw new ValidationError(`Invalid API base URL: ${options.baseUrl}`, 'baseUrl');
    }
    this.http = http ?? axios.create();
  }

  /**
   * Resolves the endpoint for a dataset kind and scope
   *
   * @throws ValidationError if the scope is missing or malformed
   */
  urlFor(kind: UpstreamKind, scope: Scope): string {
    const base = this.options.baseUrl;
    switch (kind) {
      case 'recent':
      case 'upcoming':
        return scheduleUrl(base, scope.team ?? '');
      case 'standings':
        return standingsUrl(base);
      case 'broadcasts':
        return tvScheduleUrl(base, scope.date ?? '');
    }
  }

  async fetch(kind: UpstreamKind, scope: Scope): Promise<RawPayload> {
    const url = this.urlFor(kind, scope);
    logger.debug({ kind, scope, url }, 'fetching from upstream');

    return httpGetJson(this.http, url, {
      timeoutMs: this.options.timeoutMs,
      headers: { 'User-Agent': this.options.userAgent }
    });
  }
}
