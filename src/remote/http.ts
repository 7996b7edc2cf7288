import { isInteger, isSafeNumber, parse as parseLossless } from 'lossless-json';
import { RequestFailedError } from '../shared/errors.js';

export interface JsonRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

/** Integers past 2^53 (danmu and reply ids) stay as their decimal string. */
function parseNumber(value: string): number | string {
  return isInteger(value) && !isSafeNumber(value) ? value : parseFloat(value);
}

export function parseJsonBody(text: string): unknown {
  return parseLossless(text, null, parseNumber);
}

/**
 * Issue one request and parse its JSON body. Every transport-level problem surfaces as
 * `RequestFailedError`; application codes inside the body are left to the caller.
 */
export async function requestJson(req: JsonRequest): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), req.timeoutMs);
  const target = new URL(req.url);
  const where = `${target.host}${target.pathname}`;

  let response: Response;
  try {
    response = await fetch(req.url, {
      method: req.method ?? 'GET',
      headers: req.headers,
      body: req.body,
      signal: controller.signal,
    });
  } catch (err) {
    const reason = controller.signal.aborted ? `timed out after ${req.timeoutMs}ms` : String(err);
    throw new RequestFailedError(`Request to ${where} failed: ${reason}`, { url: where });
  } finally {
    clearTimeout(timer);
  }

  if (!response.ok) {
    throw new RequestFailedError(`Request to ${where} failed: HTTP ${response.status}`, {
      url: where,
      status: response.status,
    });
  }

  const text = await response.text();
  try {
    return parseJsonBody(text);
  } catch {
    throw new RequestFailedError(`Response from ${where} is not JSON`, { url: where, status: response.status });
  }
}
