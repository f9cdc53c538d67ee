/**
 * =============================================================================
 * HTTP UTILITIES - Outbound JSON Requests
 * =============================================================================
 *
 * Thin layer over the global fetch used by the geocoding and routing clients.
 * Clients take a FetchFn in their constructor; production passes the global
 * fetch, tests pass an in-process stand-in.
 * =============================================================================
 */

export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export interface FetchInit {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Non-2xx answer from an upstream service
 */
export class HttpStatusError extends Error {
  constructor(public readonly status: number, public readonly url: string, public readonly body?: unknown) {
    super(`Upstream responded with HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Build an absolute URL with query parameters. Undefined and empty values are skipped.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  params: Record<string, string | number | undefined> = {}
): string {
  const url = new URL(path, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === '') continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * GET a URL and return the decoded JSON body.
 * Non-2xx responses throw HttpStatusError carrying whatever body could be read.
 */
export async function getJson(
  fetchFn: FetchFn,
  url: string,
  init: FetchInit = {}
): Promise<unknown> {
  const response = await fetchFn(url, {
    ...init,
    headers: { Accept: 'application/json', ...init.headers }
  });

  if (!response.ok) {
    const body = await response.json().catch(() => undefined);
    throw new HttpStatusError(response.status, url, body);
  }

  return await response.json();
}

/**
 * Drop credentials from a URL before it reaches a log line
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:api_key|key|token)=)[^&]*/gi, '$1***');
}

/**
 * Circuit breaker filter: a 400/404 answer means the service is up and
 * rejected this particular request, so it does not count against the service
 */
export function isUpstreamFailure(error: unknown): boolean {
  return !(error instanceof HttpStatusError && (error.status === 400 || error.status === 404));
}
