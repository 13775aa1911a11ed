// Backend HTTP client factory: transport selection, TLS trust and instrumentation
export * from './client-factory.js';
export * from './client.js';
export * from './types.js';
export * from './config.js';
export * from './instrumentation.js';
export * from './http-utils.js';
export * from './correlation.js';

export { resolveTransportKind, socketPathFromUrl } from './scheme.js';
export { buildTrustStore, parsePemCertificates, type SkippedCertificateSource, type TrustStore } from './trust-store.js';
export { loadClientCertificate, type ClientCertificate } from './client-certificate.js';
export { createUnixSocketConnector, socketConnectTimeoutMs, socketHost, type SocketDialer } from './transports.js';
