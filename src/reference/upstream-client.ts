/**
 * SRD API client.
 *
 * Every call carries a fixed timeout, follows at most one redirect and
 * resolves to a structured result: transport failures, timeouts and non-2xx
 * statuses never escape as exceptions.
 */

import { DependencyHealthManager } from '../resilience/dependency-health';
import { logger } from '../observability/logger';
import { upstreamRequestDuration } from '../observability/metrics';
import { FetchError, FetchErrorKind } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface UpstreamClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;
  health?: DependencyHealthManager;
}

export type UpstreamResult =
  | { ok: true; body: unknown; status: number; url: string }
  | { ok: false; error: FetchError };

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export class UpstreamClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly health?: DependencyHealthManager;
  private readonly log = logger.child({ component: 'upstream' });

  constructor(options: UpstreamClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.health = options.health;
  }

  urlFor(path: string): string {
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  async getJson(path: string): Promise<UpstreamResult> {
    const url = this.urlFor(path);

    if (this.health && !this.health.isAvailable('upstream')) {
      this.log.debug({ url }, 'Upstream circuit open; failing fast');
      return failure('unavailable', 'The reference API is temporarily unavailable. Please try again shortly.');
    }

    const start = Date.now();
    const result = await this.request(url);
    upstreamRequestDuration.observe(
      { outcome: result.ok ? 'success' : result.error.kind },
      (Date.now() - start) / 1000,
    );

    if (this.health) {
      // A 404 or an odd payload still means the API answered
      if (result.ok || result.error.kind !== 'unavailable') {
        this.health.recordSuccess('upstream');
      } else {
        this.health.recordFailure('upstream', result.error.message);
      }
    }
    return result;
  }

  private async request(url: string): Promise<UpstreamResult> {
    try {
      let finalUrl = url;
      let response = await this.send(url);

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        if (!location) {
          this.log.warn({ url, status: response.status }, 'Upstream redirect without Location header');
          return failure('unavailable', 'Upstream redirect without a location', response.status);
        }
        finalUrl = new URL(location, url).toString();
        this.log.debug({ from: url, to: finalUrl }, 'Following upstream redirect');
        response = await this.send(finalUrl);
        if (REDIRECT_STATUSES.has(response.status)) {
          this.log.warn({ url, status: response.status }, 'Upstream redirected more than once');
          return failure('unavailable', 'Upstream redirected more than once', response.status);
        }
      }

      if (response.status === 404) {
        this.log.debug({ url: finalUrl }, 'Upstream resource not found');
        return failure('not_found', 'Resource not found', 404);
      }

      if (!response.ok) {
        this.log.warn({ url: finalUrl, status: response.status }, 'Upstream API error');
        return failure('unavailable', `Upstream API responded with status ${response.status}`, response.status);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        if (isTimeout(err)) throw err;
        this.log.warn({ err, url: finalUrl }, 'Upstream returned invalid JSON');
        return failure('malformed', 'Upstream returned invalid JSON', response.status);
      }

      return { ok: true, body, status: response.status, url: finalUrl };
    } catch (err) {
      if (isTimeout(err)) {
        this.log.warn({ url, timeoutMs: this.timeoutMs }, 'Upstream request timed out');
        return failure('unavailable', `Upstream request timed out after ${this.timeoutMs}ms`);
      }
      this.log.warn({ err, url }, 'Upstream request failed');
      return failure('unavailable', 'Unable to reach the reference API');
    }
  }

  private send(url: string): Promise<Response> {
    return this.fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      redirect: 'manual',
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}

function failure(kind: FetchErrorKind, message: string, status?: number): UpstreamResult {
  return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } };
}

function isTimeout(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'TimeoutError' || err.name === 'AbortError';
}
