/**
 * Thin fetch wrapper with timeout and user agent
 */

export interface HttpOptions {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
}

export async function httpGet(url: string, options: HttpOptions): Promise<Response> {
  const response = await fetch(url, {
    method: 'GET',
    headers: {
      'User-Agent': options.userAgent,
      Accept: options.accept ?? '*/*',
    },
    signal: AbortSignal.timeout(options.timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} for ${url}`);
  }

  return response;
}

export async function httpGetJson(url: string, options: HttpOptions): Promise<unknown> {
  const response = await httpGet(url, { ...options, accept: 'application/json' });
  return response.json();
}
