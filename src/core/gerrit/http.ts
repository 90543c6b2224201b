/**
 * HTTP transport for the review client
 */

import * as http from 'http';
import * as https from 'https';
import { Logger, logger } from '../../utils/logger';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Sends one request. Rejects on socket errors and timeouts only;
 * every HTTP status resolves.
 */
export type Transport = (request: HttpRequest) => Promise<HttpResponse>;

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Make HTTP(S) request (Promise-based)
 */
export function httpRequest(request: HttpRequest, timeoutMs: number = DEFAULT_TIMEOUT_MS): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const urlObj = new URL(request.url);
    const client = urlObj.protocol === 'http:' ? http : https;

    const headers: Record<string, string> = { ...request.headers };
    if (request.body !== undefined) {
      headers['Content-Length'] = Buffer.byteLength(request.body).toString();
    }

    const req = client.request(
      {
        method: request.method,
        hostname: urlObj.hostname,
        port: urlObj.port || (client === http ? 80 : 443),
        path: urlObj.pathname + urlObj.search,
        headers,
      },
      res => {
        let data = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          data += chunk;
        });
        res.on('end', () => {
          resolve({ status: res.statusCode || 0, body: data });
        });
        res.on('error', reject);
      }
    );

    req.setTimeout(timeoutMs, () => {
      req.destroy(new Error(`request timed out after ${timeoutMs}ms`));
    });
    req.on('error', reject);

    if (request.body !== undefined) {
      req.write(request.body);
    }

    req.end();
  });
}

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts?: number;
  /** Delay before retry n is n * backoffMs */
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

const RETRYABLE_STATUS = new Set([502, 503, 504]);

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Retry reads on socket errors and gateway failures. Writes go through once.
 */
export function withRetry(transport: Transport, options: RetryOptions = {}): Transport {
  const attempts = options.attempts ?? 3;
  const backoffMs = options.backoffMs ?? 500;
  const sleep = options.sleep ?? defaultSleep;
  const log = options.log ?? logger.child({ component: 'http' });

  return async request => {
    if (request.method !== 'GET') {
      return transport(request);
    }

    for (let attempt = 1; ; attempt++) {
      const last = attempt >= attempts;
      try {
        const response = await transport(request);
        if (last || !RETRYABLE_STATUS.has(response.status)) {
          return response;
        }
        log.debug('retrying', { url: request.url, status: response.status, attempt });
      } catch (error) {
        if (last) {
          throw error;
        }
        log.debug('retrying', {
          url: request.url,
          error: error instanceof Error ? error.message : String(error),
          attempt,
        });
      }
      await sleep(backoffMs * attempt);
    }
  };
}
