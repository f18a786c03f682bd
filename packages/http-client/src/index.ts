/**
 * Lightweight HTTP client for service-to-service calls.
 * Uses the native fetch of Node 20+ (no external dependencies).
 */
export interface ServiceRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  body?: unknown;
  headers?: Record<string, string>;
  timeout?: number;
}

export class ServiceHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: unknown,
  ) {
    super(`Service ${url} responded ${status}: ${JSON.stringify(body)}`);
    this.name = 'ServiceHttpError';
  }
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export async function serviceRequest(
  baseUrl: string,
  path: string,
  options: ServiceRequestOptions = {},
): Promise<unknown> {
  const { method = 'GET', body, headers = {}, timeout = 10_000 } = options;
  const url = `${baseUrl}${path}`;

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

    const json = parseBody(await res.text());
    if (!res.ok) {
      throw new ServiceHttpError(res.status, url, json);
    }
    return json;
  } finally {
    clearTimeout(timer);
  }
}
