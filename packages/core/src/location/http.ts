/**
 * Minimal JSON-over-HTTP helper shared by the location services.
 */

export type FetchFn = typeof fetch;

export interface HttpOptions {
  /** Injected so tests can run without a network */
  readonly fetch: FetchFn;
  readonly userAgent: string;
  readonly timeoutMs: number;
}

/**
 * GETs a URL and returns the decoded JSON body.
 *
 * @throws Error on network failure, timeout, non-2xx status or a body that is not JSON
 */
export async function getJson(url: URL, options: HttpOptions): Promise<unknown> {
  const fetchFn = options.fetch;
  const response = await fetchFn(url, {
    headers: {
      Accept: 'application/json',
      'User-Agent': options.userAgent,
    },
    signal: AbortSignal.timeout(options.timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`GET ${url.origin}${url.pathname} failed (${response.status})`);
  }

  const body: unknown = await response.json();
  return body;
}
