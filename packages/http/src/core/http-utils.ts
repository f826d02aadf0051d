// Pure HTTP utility functions
// All functions are pure - no side effects

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Build URL from base URL, endpoint and optional query parameters
 */
export const buildUrl = (baseUrl: string, endpoint: string, query?: QueryParams): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  // If endpoint is empty or just '/', use baseUrl (single-endpoint APIs post everything to one URL)
  let url = cleanBaseUrl;
  if (endpoint && endpoint !== '/') {
    const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    url = `${cleanBaseUrl}${cleanEndpoint}`;
  }

  const queryString = encodeFormBody(query ?? {});
  if (!queryString) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${queryString}`;
};

/**
 * URL-encode parameters in insertion order, skipping undefined values
 */
export const encodeFormBody = (params: QueryParams): string => {
  const entries = Object.entries(params)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([key, value]): [string, string] => [key, String(value)]);
  return new URLSearchParams(entries).toString();
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    // List of sensitive parameter names to redact
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password', 'sign'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    // If URL parsing fails, return as-is (shouldn't happen in practice)
    return url;
  }
};
