import fetch, { FetchError } from 'node-fetch';
import type { z } from 'zod';

export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HttpRequestError';
  }
}

export interface JsonRequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs: number;
}

/**
 * Sends a JSON request and validates the response body against `schema`.
 * Network failures, timeouts, non-2xx statuses and bodies that do not match
 * the schema all surface as `HttpRequestError`.
 */
export async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  opts: JsonRequestOptions
): Promise<z.output<S>> {
  const headers: Record<string, string> = { Accept: 'application/json', ...opts.headers };
  if (opts.body !== undefined) headers['Content-Type'] = 'application/json';

  try {
    const res = await fetch(url, {
      method: opts.method ?? 'GET',
      headers,
      body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      timeout: opts.timeoutMs,
    });

    const text = await res.text();
    if (!res.ok) {
      throw new HttpRequestError(
        `${opts.method ?? 'GET'} ${url} failed: ${res.status} ${text.slice(0, 500)}`,
        res.status
      );
    }

    let json: unknown;
    try {
      json = text.length > 0 ? JSON.parse(text) : null;
    } catch (error) {
      throw new HttpRequestError(`Invalid JSON from ${url}`, res.status, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new HttpRequestError(
        `Unexpected response from ${url}: ${parsed.error.message}`,
        res.status
      );
    }
    return parsed.data;
  } catch (error) {
    if (error instanceof HttpRequestError) throw error;
    if (error instanceof FetchError) {
      const message =
        error.type === 'request-timeout'
          ? `Request to ${url} timed out after ${opts.timeoutMs}ms`
          : `Request to ${url} failed: ${error.message}`;
      throw new HttpRequestError(message, undefined, { cause: error });
    }
    throw error;
  }
}

export function bearerHeaders(token: string | undefined): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}
