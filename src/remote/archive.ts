import { RequestFailedError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from '../shared/config.js';
import { requestJson } from './http.js';
import type { ArchiveApi, QueryParams } from './types.js';

const BROWSER_UA =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/110.0.0.0 Safari/537.36';

/**
 * Client for the third-party archive. The service sits behind bot protection, so
 * requests carry the header set a desktop browser would send. Calls go through a small
 * bounded pool.
 */
export class ArchiveClient implements ArchiveApi {
  private readonly baseUrl: string;
  private readonly origin: string;
  private readonly timeoutMs: number;
  private readonly maxConcurrent: number;
  private activeRequests = 0;
  private closed = false;

  constructor(config: Config['archive']) {
    this.baseUrl = config.base_url.replace(/\/+$/, '');
    this.origin = config.origin.replace(/\/+$/, '');
    this.timeoutMs = config.timeout_ms;
    this.maxConcurrent = config.max_concurrent;
  }

  get inFlight(): number {
    return this.activeRequests;
  }

  async getJson(path: string, params: QueryParams): Promise<unknown> {
    if (this.closed) {
      throw new RequestFailedError('Archive session is closed');
    }

    while (this.activeRequests >= this.maxConcurrent) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    this.activeRequests++;
    try {
      const url = new URL(`${this.baseUrl}${path}`);
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, String(value));
      }
      return await requestJson({ url: url.toString(), headers: this.headers(), timeoutMs: this.timeoutMs });
    } finally {
      this.activeRequests--;
    }
  }

  private headers(): Record<string, string> {
    return {
      'User-Agent': BROWSER_UA,
      Accept: 'application/json, text/plain, */*',
      'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
      Origin: this.origin,
      Referer: `${this.origin}/`,
      'Sec-Fetch-Dest': 'empty',
      'Sec-Fetch-Mode': 'cors',
      'Sec-Fetch-Site': 'same-site',
      'sec-ch-ua': '"Chromium";v="110", "Not A(Brand";v="24", "Google Chrome";v="110"',
      'sec-ch-ua-mobile': '?0',
      'sec-ch-ua-platform': '"Windows"',
    };
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      logger.debug('Archive session closed');
    }
  }
}
