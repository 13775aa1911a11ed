/**
 * Drops credentials and redacts secret-looking query parameters before a URL
 * is recorded on a span or in a log line.
 */
export function sanitizeUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    urlObj.username = '';
    urlObj.password = '';

    const sensitiveParams = ['token', 'private_token', 'key', 'apikey', 'api_key', 'secret', 'password'];
    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
}
