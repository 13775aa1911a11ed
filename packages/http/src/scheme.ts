import { err, ok, type Result } from 'neverthrow';

import { HTTP_PREFIX, HTTPS_PREFIX, UNIX_SOCKET_PREFIX } from './config.js';
import { type TransportKind, UnsupportedUrlSchemeError } from './types.js';

// Checked in order; the first matching prefix wins
const SCHEME_PREFIXES: readonly (readonly [prefix: string, kind: TransportKind])[] = [
  [UNIX_SOCKET_PREFIX, 'unix'],
  [HTTP_PREFIX, 'http'],
  [HTTPS_PREFIX, 'https'],
];

export function resolveTransportKind(url: string): Result<TransportKind, UnsupportedUrlSchemeError> {
  for (const [prefix, kind] of SCHEME_PREFIXES) {
    if (url.startsWith(prefix)) {
      return ok(kind);
    }
  }
  return err(new UnsupportedUrlSchemeError(url));
}

export function socketPathFromUrl(url: string): string {
  return url.startsWith(UNIX_SOCKET_PREFIX) ? url.slice(UNIX_SOCKET_PREFIX.length) : url;
}
