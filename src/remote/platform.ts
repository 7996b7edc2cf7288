import { z } from 'zod';
import { CredentialsError, DecodeError, RemoteApiError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from '../shared/config.js';
import { requestJson } from './http.js';
import type { PlatformApi } from './types.js';

export interface Credentials {
  cookie: string;
  csrf: string;
}

/** The CSRF token is the `bili_jct` cookie. */
export function parseCredentials(cookie: string): Credentials {
  const trimmed = cookie.trim();
  if (!trimmed) {
    throw new CredentialsError('No cookie configured. Set platform.cookie or FOOTPRINT_COOKIE.');
  }
  const match = trimmed.match(/(?:^|;\s*)bili_jct=([^;]+)/);
  if (!match?.[1]) {
    throw new CredentialsError('Cookie has no bili_jct value; cannot derive the CSRF token');
  }
  return { cookie: trimmed, csrf: match[1].trim() };
}

const AccountSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z.object({ mid: z.number().int().positive() }).nullish(),
});

export class PlatformClient implements PlatformApi {
  readonly csrf: string;
  readonly apiBase: string;
  readonly messageBase: string;
  private readonly cookie: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private closed = false;

  constructor(config: Config['platform'], credentials: Credentials = parseCredentials(config.cookie)) {
    this.cookie = credentials.cookie;
    this.csrf = credentials.csrf;
    this.apiBase = config.api_base.replace(/\/+$/, '');
    this.messageBase = config.message_base.replace(/\/+$/, '');
    this.userAgent = config.user_agent;
    this.timeoutMs = config.timeout_ms;
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    if (this.closed) {
      throw new CredentialsError('Platform session is closed');
    }
    return {
      'User-Agent': this.userAgent,
      Cookie: this.cookie,
      Referer: 'https://www.bilibili.com/',
      Accept: 'application/json, text/plain, */*',
      ...extra,
    };
  }

  async getJson(url: string): Promise<unknown> {
    return requestJson({ url, headers: this.headers(), timeoutMs: this.timeoutMs });
  }

  async postForm(url: string, form: Record<string, string>): Promise<unknown> {
    return requestJson({
      url,
      method: 'POST',
      headers: this.headers({ 'Content-Type': 'application/x-www-form-urlencoded' }),
      body: new URLSearchParams(form).toString(),
      timeoutMs: this.timeoutMs,
    });
  }

  async postJson(url: string, body: Record<string, unknown>): Promise<unknown> {
    return requestJson({
      url,
      method: 'POST',
      headers: this.headers({ 'Content-Type': 'application/json' }),
      body: JSON.stringify(body),
      timeoutMs: this.timeoutMs,
    });
  }

  /** Numeric id of the logged-in account. */
  async getUid(): Promise<number> {
    const raw = await this.getJson(`${this.apiBase}/x/member/web/account`);
    const parsed = AccountSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError('Unexpected account response');
    }
    if (parsed.data.code !== 0) {
      throw new RemoteApiError(`Account lookup failed: ${parsed.data.message ?? 'unknown error'}`, parsed.data.code);
    }
    if (!parsed.data.data) {
      throw new CredentialsError('Account lookup returned no user; the cookie may have expired');
    }
    return parsed.data.data.mid;
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      logger.debug('Platform session closed');
    }
  }
}
