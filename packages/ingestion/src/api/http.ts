import http from 'http';
import https from 'https';
import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { createLogger } from '../logger';
import { sleep as defaultSleep, type RateLimiter, type Sleep } from './rateLimiter';

const logger = createLogger('http');

const httpAgent = new http.Agent({ keepAlive: true, maxSockets: 4 });
const httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 4 });

const MAX_RETRY_AFTER_MS = 120_000;

export class RetriesExhaustedError extends Error {
  constructor(
    readonly service: string,
    readonly attempts: number,
    readonly lastStatus: number | null,
    readonly rateLimited: boolean,
  ) {
    super(`${service}: gave up after ${attempts} attempts (last status ${lastStatus ?? 'none'})`);
    this.name = 'RetriesExhaustedError';
  }
}

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  sleep?: Sleep;
}

export interface HttpClientConfig {
  baseUrl?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export function createHttpClient(config: HttpClientConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: config.headers,
    httpAgent,
    httpsAgent,
  });
}

/** HTTP status of an axios error, or null for anything else. */
export function responseStatus(err: unknown): number | null {
  return axios.isAxiosError(err) ? err.response?.status ?? null : null;
}

function retryAfterMs(value: unknown): number | null {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return Math.min(seconds * 1000 + 500, MAX_RETRY_AFTER_MS);
}

/**
 * GET with bounded retries. 429 honours Retry-After, 5xx and network errors
 * back off exponentially, any other error status is thrown to the caller.
 */
export async function getWithRetry<T = unknown>(
  client: AxiosInstance,
  url: string,
  config: AxiosRequestConfig,
  options: { service: string; policy: RetryPolicy; rateLimiter?: RateLimiter },
): Promise<AxiosResponse<T>> {
  const { service, policy, rateLimiter } = options;
  const sleep = policy.sleep ?? defaultSleep;
  let lastStatus: number | null = null;
  let rateLimited = false;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    await rateLimiter?.waitIfNeeded();
    try {
      const response = await client.get<T>(url, config);
      rateLimiter?.updateFromHeaders(response.headers);
      return response;
    } catch (err) {
      if (!axios.isAxiosError(err)) throw err;
      if (err.response) rateLimiter?.updateFromHeaders(err.response.headers);

      const status = err.response?.status ?? null;
      lastStatus = status;
      const isLast = attempt === policy.maxAttempts;

      if (status === 429) {
        rateLimited = true;
        const waitMs = retryAfterMs(err.response?.headers['retry-after']) ?? policy.backoffMs * 2 ** (attempt - 1);
        logger.warn({ service, url, waitMs, attempt }, 'Rate limited (429)');
        if (!isLast) await sleep(waitMs);
        continue;
      }
      if (status === null || status >= 500) {
        const backoffMs = policy.backoffMs * 2 ** (attempt - 1);
        logger.warn({ service, url, status, code: err.code, attempt, backoffMs }, 'Transient error, retrying');
        if (!isLast) await sleep(backoffMs);
        continue;
      }
      throw err;
    }
  }

  throw new RetriesExhaustedError(service, policy.maxAttempts, lastStatus, rateLimited);
}
