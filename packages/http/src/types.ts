import type { Dispatcher } from 'undici';

import type { ClientCertificate } from './client-certificate.js';
import { sanitizeUrl } from './http-utils.js';
import type { TrustStore } from './trust-store.js';

export type TransportKind = 'unix' | 'http' | 'https';

/**
 * Input to createHttpClient. Absent optional fields mean "not configured";
 * empty strings are rejected during validation.
 */
export interface HttpClientConfig {
  /** `http+unix://<socket path>`, `http://...` or `https://...` */
  readonly url: string;
  /** Path prefix appended to the synthetic host of socket transports */
  readonly relativeUrlRoot?: string | undefined;
  readonly caFile?: string | undefined;
  /** Directory scanned (non-recursively) for extra trusted certificates */
  readonly caPath?: string | undefined;
  /** Disables certificate chain and hostname verification */
  readonly selfSignedCert?: boolean | undefined;
  /** 0 or absent selects DEFAULT_READ_TIMEOUT_SECONDS */
  readonly readTimeoutSeconds?: number | undefined;
  readonly clientCertPath?: string | undefined;
  readonly clientKeyPath?: string | undefined;
}

export interface TlsSettings {
  ca: string[];
  minVersion: 'TLSv1.2';
  rejectUnauthorized: boolean;
  certificates: ClientCertificate[];
}

interface TransportBase {
  /** Base URL requests are addressed to */
  host: string;
  dispatcher: Dispatcher;
}

export interface SocketTransport extends TransportBase {
  kind: 'unix';
  socketPath: string;
}

export interface PlainHttpTransport extends TransportBase {
  kind: 'http';
}

export interface HttpsTransport extends TransportBase {
  kind: 'https';
  tls: TlsSettings;
  trustStore: TrustStore;
}

export type Transport = SocketTransport | PlainHttpTransport | HttpsTransport;

// Error classes

export class HttpClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpClientError';
  }
}

export class ConfigValidationError extends HttpClientError {
  constructor(
    message: string,
    public readonly issues: { message: string; path: string }[]
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Carries the URL with credentials and secret query parameters removed, since
 * the error usually ends up in a log line.
 */
export class UnsupportedUrlSchemeError extends HttpClientError {
  public readonly url: string;

  constructor(url: string) {
    const safeUrl = sanitizeUrl(url);
    super(`unsupported URL scheme: ${safeUrl}`);
    this.url = safeUrl;
    this.name = 'UnsupportedUrlSchemeError';
  }
}

export class ClientCertificateError extends HttpClientError {
  constructor(
    message: string,
    public readonly certPath: string,
    public readonly keyPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ClientCertificateError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
