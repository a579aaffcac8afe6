import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import {
  NhlApiClient,
  scheduleUrl,
  standingsUrl,
  tvScheduleUrl
} from '../../src/http/nhlApiClient.js';
import {
  MalformedResponseError,
  UpstreamBadStatusError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
  ValidationError
} from '../../src/errors/index.js';

const BASE = 'https://api.test';

type Respond = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

/**
 * Client wired to an in-process axios adapter that records each request
 */
function clientWith(respond: Respond) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async config => {
      requests.push(config);
      return respond(config);
    }
  });
  const client = new NhlApiClient({ baseUrl: BASE, timeoutMs: 100, userAgent: 'test-agent' }, http);
  return { client, requests };
}

function reply(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (err: unknown) => err
  );
}

describe('URL builders', () => {
  it('should build the team schedule URL', () => {
    expect(scheduleUrl(BASE, 'MIN')).toBe('https://api.test/v1/club-schedule-season/MIN/now');
  });

  it('should build the standings URL', () => {
    expect(standingsUrl(BASE)).toBe('https://api.test/v1/standings/now');
  });

  it('should build the TV schedule URL', () => {
    expect(tvScheduleUrl(BASE, '2025-01-15')).toBe('https://api.test/v1/network/tv-schedule/2025-01-15');
  });

  it('should reject malformed scope values', () => {
    expect(() => scheduleUrl(BASE, 'min')).toThrow(ValidationError);
    expect(() => tvScheduleUrl(BASE, '2025-02-30')).toThrow(ValidationError);
  });
});

describe('NhlApiClient', () => {
  it('should reject an invalid base URL', () => {
    expect(() => new NhlApiClient({ baseUrl: 'not a url', timeoutMs: 100, userAgent: 'x' })).toThrow(ValidationError);
  });

  it('should return the JSON body and send the configured headers and timeout', async () => {
    const { client, requests } = clientWith(async config => reply(config, 200, { standings: [] }));

    const body = await client.fetch('standings', {});

    expect(body).toEqual({ standings: [] });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://api.test/v1/standings/now');
    expect(requests[0].timeout).toBe(100);
    expect(requests[0].headers.get('User-Agent')).toBe('test-agent');
  });

  it('should use the schedule endpoint for both recent and upcoming', async () => {
    const { client, requests } = clientWith(async config => reply(config, 200, { games: [] }));

    await client.fetch('recent', { team: 'MIN' });
    await client.fetch('upcoming', { team: 'MIN' });

    expect(requests.map(r => r.url)).toEqual([
      'https://api.test/v1/club-schedule-season/MIN/now',
      'https://api.test/v1/club-schedule-season/MIN/now'
    ]);
  });

  it('should map a timeout to UpstreamTimeoutError', async () => {
    const { client } = clientWith(async config => {
      throw new AxiosError('timeout of 100ms exceeded', AxiosError.ECONNABORTED, config);
    });

    const err = await failureOf(client.fetch('standings', {}));

    expect(err).toBeInstanceOf(UpstreamTimeoutError);
    if (!(err instanceof UpstreamTimeoutError)) return;
    expect(err.code).toBe('UPSTREAM_TIMEOUT');
    expect(err.timeoutMs).toBe(100);
    expect(err.url).toBe('https://api.test/v1/standings/now');
  });

  it('should time out a response that outlasts the deadline', async () => {
    const { client, requests } = clientWith(async config => {
      await new Promise(resolve => setTimeout(resolve, 250));
      return reply(config, 200, { standings: [] });
    });

    const err = await failureOf(client.fetch('standings', {}));

    expect(requests[0].signal).toBeDefined();
    expect(err).toBeInstanceOf(UpstreamTimeoutError);
    if (!(err instanceof UpstreamTimeoutError)) return;
    expect(err.timeoutMs).toBe(100);
  });

  it('should map a refused connection to UpstreamUnreachableError', async () => {
    const { client } = clientWith(async config => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
    });

    const err = await failureOf(client.fetch('standings', {}));

    expect(err).toBeInstanceOf(UpstreamUnreachableError);
    if (!(err instanceof UpstreamUnreachableError)) return;
    expect(err.message).toBe('Upstream unreachable: connect ECONNREFUSED 127.0.0.1:443');
  });

  it('should map a non-2xx status to UpstreamBadStatusError', async () => {
    const { client } = clientWith(async config => reply(config, 503, 'Service Unavailable'));

    const err = await failureOf(client.fetch('standings', {}));

    expect(err).toBeInstanceOf(UpstreamBadStatusError);
    if (!(err instanceof UpstreamBadStatusError)) return;
    expect(err.status).toBe(503);
    expect(err.message).toBe('Upstream responded with status 503');
  });

  it('should map a body that is not JSON to MalformedResponseError', async () => {
    const { client } = clientWith(async config => reply(config, 200, '<html>maintenance</html>'));

    const err = await failureOf(client.fetch('standings', {}));

    expect(err).toBeInstanceOf(MalformedResponseError);
    if (!(err instanceof MalformedResponseError)) return;
    expect(err.message).toBe('Expected a JSON object body, got string');
  });

  it('should map a JSON array body to MalformedResponseError', async () => {
    const { client } = clientWith(async config => reply(config, 200, []));

    const err = await failureOf(client.fetch('standings', {}));

    expect(err).toBeInstanceOf(MalformedResponseError);
    if (!(err instanceof MalformedResponseError)) return;
    expect(err.message).toBe('Expected a JSON object body, got array');
  });

  it('should reject an invalid scope without making a request', async () => {
    const { client, requests } = clientWith(async config => reply(config, 200, {}));

    await expect(client.fetch('recent', { team: 'minnesota' })).rejects.toBeInstanceOf(ValidationError);
    await expect(client.fetch('broadcasts', {})).rejects.toBeInstanceOf(ValidationError);
    expect(requests).toHaveLength(0);
  });
});
