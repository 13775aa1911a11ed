import { getLogger } from '@relay-kit/logger';
import { err, ok, type Result } from 'neverthrow';
import { fetch as undiciFetch } from 'undici';

import { HttpClient } from './client.js';
import { parseHttpClientConfig, readTimeoutMs } from './config.js';
import { sanitizeUrl } from './http-utils.js';
import { composeMiddleware, withCorrelation, withTracing, type FetchFn, type Middleware } from './instrumentation.js';
import { resolveTransportKind } from './scheme.js';
import type { SkippedCertificateSource, TrustStoreEffects } from './trust-store.js';
import { buildTransport } from './transports.js';
import type { HttpClientConfig, HttpClientError, HttpsTransport } from './types.js';

const logger = getLogger('HttpClientFactory');

export interface CreateHttpClientOptions {
  /** Extra middleware, applied inside the correlation and tracing layers */
  middleware?: readonly Middleware[] | undefined;
  /** Called when CA files or directory entries had to be skipped */
  onCertificatesSkipped?: ((skipped: readonly SkippedCertificateSource[]) => void) | undefined;
  trustStoreEffects?: Partial<TrustStoreEffects> | undefined;
}

/**
 * Builds a client for the backend at `config.url`.
 *
 * Fails on an invalid config, an unsupported URL scheme, or a client
 * certificate/key pair that cannot be loaded. Unreadable CA files and an
 * unavailable system trust store only narrow the trust pool.
 */
export function createHttpClient(
  config: HttpClientConfig,
  options: CreateHttpClientOptions = {}
): Result<HttpClient, HttpClientError> {
  const parsed = parseHttpClientConfig(config);
  if (parsed.isErr()) {
    return err(parsed.error);
  }
  const resolved = parsed.value;

  const kind = resolveTransportKind(resolved.url);
  if (kind.isErr()) {
    return err(kind.error);
  }

  const timeoutMs = readTimeoutMs(resolved.readTimeoutSeconds);
  const transportResult = buildTransport(kind.value, resolved, {
    timeoutMs,
    trustStoreEffects: options.trustStoreEffects,
  });
  if (transportResult.isErr()) {
    return err(transportResult.error);
  }
  const transport = transportResult.value;

  if (transport.kind === 'https') {
    reportTrustStore(transport, options.onCertificatesSkipped);
  }

  const roundTrip: FetchFn = (input, init) => undiciFetch(input, { ...init, dispatcher: transport.dispatcher });
  const fetch = composeMiddleware(roundTrip, [withCorrelation(), withTracing(), ...(options.middleware ?? [])]);

  logger.debug({ host: sanitizeUrl(transport.host), scheme: transport.kind, timeoutMs }, 'HTTP client created');

  return ok(new HttpClient({ transport, timeoutMs, fetch }));
}

/**
 * Returns `undefined` instead of an error, after logging it.
 *
 * @deprecated Use createHttpClient, which returns the error to the caller.
 */
export function newHttpClient(config: HttpClientConfig): HttpClient | undefined {
  const result = createHttpClient(config);
  if (result.isErr()) {
    logger.error({ error: result.error }, 'new http client with opts');
    return undefined;
  }
  return result.value;
}

function reportTrustStore(
  transport: HttpsTransport,
  onCertificatesSkipped: CreateHttpClientOptions['onCertificatesSkipped']
): void {
  const { trustStore } = transport;
  if (!trustStore.systemRootsLoaded) {
    logger.warn('System trust store unavailable, starting from an empty pool');
  }
  if (trustStore.skipped.length === 0) {
    return;
  }

  logger.debug(
    { skipped: trustStore.skipped.length, sources: trustStore.skipped.map((source) => source.path) },
    'Skipped unreadable CA certificate sources'
  );
  onCertificatesSkipped?.(trustStore.skipped);
}
