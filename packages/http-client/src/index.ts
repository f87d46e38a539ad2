import type { z } from 'zod';

/**
 * Thin fetch wrapper for calls to external HTTP APIs.
 * Uses the native fetch of Node 20+ and validates every body with zod.
 */
export interface ServiceRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  body?: unknown;
  headers?: Record<string, string>;
  query?: Record<string, string | number | undefined>;
  timeout?: number;
}

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: unknown,
  ) {
    super(`${url} responded ${status}: ${JSON.stringify(body)}`);
    this.name = 'HttpError';
  }
}

export function buildUrl(baseUrl: string, path: string, query?: ServiceRequestOptions['query']): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export async function serviceRequest<S extends z.ZodTypeAny>(
  baseUrl: string,
  path: string,
  schema: S,
  options: ServiceRequestOptions = {},
): Promise<z.infer<S>> {
  const { method = 'GET', body, headers = {}, query, timeout = 10_000 } = options;
  const url = buildUrl(baseUrl, path, query);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const res = await fetch(url, {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
      body: body !== undefined ? JSON.stringify(body) : undefined,
      signal: controller.signal,
    });

    const json = await readBody(res);
    if (!res.ok) {
      throw new HttpError(res.status, url, json);
    }
    return schema.parse(json);
  } finally {
    clearTimeout(timer);
  }
}
