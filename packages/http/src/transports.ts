import net from 'node:net';

import { err, ok, type Result } from 'neverthrow';
import { Agent, type buildConnector } from 'undici';

import { loadClientCertificate, type ClientCertificate } from './client-certificate.js';
import {
  hasClientCertificate,
  MIN_TLS_VERSION,
  SOCKET_BASE_URL,
  SOCKET_CONNECT_TIMEOUT_MS,
  type ResolvedHttpClientConfig,
} from './config.js';
import { socketPathFromUrl } from './scheme.js';
import { buildTrustStore, type TrustStoreEffects } from './trust-store.js';
import type {
  ClientCertificateError,
  HttpsTransport,
  PlainHttpTransport,
  SocketTransport,
  TlsSettings,
  Transport,
  TransportKind,
} from './types.js';

export type SocketDialer = (options: net.IpcNetConnectOpts) => net.Socket;

export interface TransportOptions {
  /** Applied to undici's header and body timeouts; also caps the socket connect deadline */
  timeoutMs: number;
  trustStoreEffects?: Partial<TrustStoreEffects> | undefined;
}

/**
 * Builds an undici connector that dials `socketPath` whatever host and port the
 * request targets. The callback fires once, on connect or on the first error.
 */
export function createUnixSocketConnector(
  socketPath: string,
  connectTimeoutMs?: number,
  dial: SocketDialer = (options) => net.connect(options)
): buildConnector.connector {
  return (_options, callback) => {
    const socket = dial({ path: socketPath });
    let settled = false;

    const settle = (error: Error | null): void => {
      if (settled) return;
      settled = true;
      socket.off('connect', onConnect);
      socket.off('error', onError);
      socket.off('timeout', onTimeout);
      socket.setTimeout(0);
      if (error) {
        socket.destroy();
        callback(error, null);
      } else {
        callback(null, socket);
      }
    };
    const onConnect = () => settle(null);
    const onError = (error: Error) => settle(error);
    const onTimeout = () => settle(new Error(`Connect timeout on unix socket ${socketPath}`));

    socket.once('connect', onConnect);
    socket.once('error', onError);
    if (connectTimeoutMs !== undefined && connectTimeoutMs > 0) {
      socket.setTimeout(connectTimeoutMs);
      socket.once('timeout', onTimeout);
    }
  };
}

/**
 * Synthetic host for socket transports: `http://unix`, plus the relative root
 * without its leading and trailing slashes when one is set.
 */
export function socketHost(relativeUrlRoot: string | undefined): string {
  const root = (relativeUrlRoot ?? '').replace(/^\/+|\/+$/g, '');
  return root === '' ? SOCKET_BASE_URL : `${SOCKET_BASE_URL}/${root}`;
}

export function socketConnectTimeoutMs(timeoutMs: number): number {
  return Math.min(timeoutMs, SOCKET_CONNECT_TIMEOUT_MS);
}

export function buildSocketTransport(
  url: string,
  relativeUrlRoot: string | undefined,
  options: TransportOptions
): SocketTransport {
  const socketPath = socketPathFromUrl(url);
  const dispatcher = new Agent({
    bodyTimeout: options.timeoutMs,
    connect: createUnixSocketConnector(socketPath, socketConnectTimeoutMs(options.timeoutMs)),
    headersTimeout: options.timeoutMs,
  });
  return { kind: 'unix', socketPath, host: socketHost(relativeUrlRoot), dispatcher };
}

export function buildHttpTransport(url: string, options: TransportOptions): PlainHttpTransport {
  const dispatcher = new Agent({
    bodyTimeout: options.timeoutMs,
    headersTimeout: options.timeoutMs,
  });
  return { kind: 'http', host: url, dispatcher };
}

export function buildHttpsTransport(
  config: ResolvedHttpClientConfig,
  options: TransportOptions
): Result<HttpsTransport, ClientCertificateError> {
  const trustStore = buildTrustStore({ caFile: config.caFile, caPath: config.caPath }, options.trustStoreEffects);

  const certificates: ClientCertificate[] = [];
  if (hasClientCertificate(config)) {
    const certificate = loadClientCertificate(config.clientCertPath, config.clientKeyPath);
    if (certificate.isErr()) {
      return err(certificate.error);
    }
    certificates.push(certificate.value);
  }

  const tlsSettings: TlsSettings = {
    ca: trustStore.certificates,
    minVersion: MIN_TLS_VERSION,
    rejectUnauthorized: !config.selfSignedCert,
    certificates,
  };

  const [clientCertificate] = certificates;
  const dispatcher = new Agent({
    bodyTimeout: options.timeoutMs,
    connect: {
      ca: tlsSettings.ca,
      minVersion: tlsSettings.minVersion,
      rejectUnauthorized: tlsSettings.rejectUnauthorized,
      ...(clientCertificate ? { cert: clientCertificate.cert, key: clientCertificate.key } : {}),
    },
    headersTimeout: options.timeoutMs,
  });

  return ok({ kind: 'https', host: config.url, dispatcher, tls: tlsSettings, trustStore });
}

export function buildTransport(
  kind: TransportKind,
  config: ResolvedHttpClientConfig,
  options: TransportOptions
): Result<Transport, ClientCertificateError> {
  switch (kind) {
    case 'unix':
      return ok(buildSocketTransport(config.url, config.relativeUrlRoot, options));
    case 'http':
      return ok(buildHttpTransport(config.url, options));
    case 'https':
      return buildHttpsTransport(config, options).map((transport): Transport => transport);
  }
}
