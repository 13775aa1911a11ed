import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ConfigValidationError, type HttpClientConfig } from './types.js';

export const SOCKET_BASE_URL = 'http://unix';
export const UNIX_SOCKET_PREFIX = 'http+unix://';
export const HTTP_PREFIX = 'http://';
export const HTTPS_PREFIX = 'https://';
export const DEFAULT_READ_TIMEOUT_SECONDS = 300;
// Largest whole-second delay a Node timer holds without overflowing (2^31 - 1 ms)
export const MAX_READ_TIMEOUT_SECONDS = Math.floor(0x7fffffff / 1000);
// Upper bound on dialing the Unix socket; requests may wait far longer for a response
export const SOCKET_CONNECT_TIMEOUT_MS = 10_000;
export const MIN_TLS_VERSION = 'TLSv1.2';
export const CORRELATION_HEADER = 'X-Request-Id';

const optionalPath = z.string().min(1, { message: 'must not be empty when set' }).optional();

export const httpClientConfigSchema = z.object({
  url: z.string().min(1, { message: 'URL is required' }),
  relativeUrlRoot: z.string().optional(),
  caFile: optionalPath,
  caPath: optionalPath,
  selfSignedCert: z.boolean().default(false),
  readTimeoutSeconds: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_READ_TIMEOUT_SECONDS, { message: `must be at most ${MAX_READ_TIMEOUT_SECONDS} seconds` })
    .default(0),
  clientCertPath: optionalPath,
  clientKeyPath: optionalPath,
});

export type ResolvedHttpClientConfig = Readonly<z.infer<typeof httpClientConfigSchema>>;

/**
 * Validates a config and fills in defaults.
 */
export function parseHttpClientConfig(config: HttpClientConfig): Result<ResolvedHttpClientConfig, ConfigValidationError> {
  const result = httpClientConfigSchema.safeParse(config);
  if (!result.success) {
    return err(toValidationError('Invalid HTTP client configuration', result.error));
  }
  return ok(result.data);
}

/**
 * A client certificate is only configured when both paths are present.
 * A partial pair counts as no certificate at all.
 */
export function hasClientCertificate(
  config: ResolvedHttpClientConfig
): config is ResolvedHttpClientConfig & { clientCertPath: string; clientKeyPath: string } {
  return config.clientCertPath !== undefined && config.clientKeyPath !== undefined;
}

export function readTimeoutMs(readTimeoutSeconds: number): number {
  const seconds = readTimeoutSeconds === 0 ? DEFAULT_READ_TIMEOUT_SECONDS : readTimeoutSeconds;
  return seconds * 1000;
}

// Environment loading

const emptyAsUndefined = (value: string | undefined) => (value === undefined || value.trim() === '' ? undefined : value);

const optionalEnvString = z.string().optional().transform(emptyAsUndefined);

export const httpClientEnvSchema = z.object({
  RELAY_BACKEND_URL: z.string().trim().min(1, { message: 'RELAY_BACKEND_URL is required' }),
  RELAY_RELATIVE_URL_ROOT: optionalEnvString,
  RELAY_CA_FILE: optionalEnvString,
  RELAY_CA_PATH: optionalEnvString,
  RELAY_SELF_SIGNED_CERT: z
    .enum(['true', 'false', '1', '0', ''])
    .optional()
    .transform((val) => val === 'true' || val === '1'),
  RELAY_READ_TIMEOUT_SECONDS: z
    .string()
    .regex(/^\d*$/, { message: 'must be a non-negative integer' })
    .optional()
    .transform((val) => (val === undefined || val === '' ? 0 : parseInt(val, 10))),
  RELAY_CLIENT_CERT: optionalEnvString,
  RELAY_CLIENT_KEY: optionalEnvString,
});

/**
 * Builds a config from RELAY_* environment variables. Empty variables count as unset.
 */
export function loadHttpClientConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Result<HttpClientConfig, ConfigValidationError> {
  const result = httpClientEnvSchema.safeParse(env);
  if (!result.success) {
    return err(toValidationError('Environment validation failed', result.error));
  }

  const vars = result.data;
  return ok({
    url: vars.RELAY_BACKEND_URL,
    relativeUrlRoot: vars.RELAY_RELATIVE_URL_ROOT,
    caFile: vars.RELAY_CA_FILE,
    caPath: vars.RELAY_CA_PATH,
    selfSignedCert: vars.RELAY_SELF_SIGNED_CERT,
    readTimeoutSeconds: vars.RELAY_READ_TIMEOUT_SECONDS,
    clientCertPath: vars.RELAY_CLIENT_CERT,
    clientKeyPath: vars.RELAY_CLIENT_KEY,
  });
}

function toValidationError(context: string, error: z.ZodError): ConfigValidationError {
  const issues = error.issues.map((issue) => ({ message: issue.message, path: issue.path.map(String).join('.') }));
  const details = issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n');
  return new ConfigValidationError(`${context}:\n${details}`, issues);
}
