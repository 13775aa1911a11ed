import {
  context,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace,
  type TextMapSetter,
  type Tracer,
} from '@opentelemetry/api';
import { Headers, type RequestInit, type Response } from 'undici';

import { CORRELATION_HEADER } from './config.js';
import { getCorrelationId } from './correlation.js';
import { sanitizeUrl } from './http-utils.js';
import { getErrorMessage } from './types.js';

/**
 * The round-trip capability a transport exposes: one request in, one response out.
 */
export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type Middleware = (next: FetchFn) => FetchFn;

const headerSetter: TextMapSetter<Headers> = {
  set(carrier, key, value) {
    carrier.set(key, value);
  },
};

/**
 * Wraps `fetchFn` so that `middleware[0]` sees the request first.
 */
export function composeMiddleware(fetchFn: FetchFn, middleware: readonly Middleware[]): FetchFn {
  return middleware.reduceRight<FetchFn>((next, wrap) => wrap(next), fetchFn);
}

/**
 * Copies the active correlation id onto the request, unless the caller already
 * set the header or no correlation context is active.
 */
export function withCorrelation(headerName: string = CORRELATION_HEADER): Middleware {
  return (next) => (input, init) => {
    const correlationId = getCorrelationId();
    if (correlationId === undefined) {
      return next(input, init);
    }

    const headers = new Headers(init?.headers);
    if (!headers.has(headerName)) {
      headers.set(headerName, correlationId);
    }
    return next(input, { ...init, headers });
  };
}

/**
 * Opens a client span per request and injects the trace context into the
 * request headers through the global propagator. Without a registered
 * OpenTelemetry SDK the tracer and propagator are no-ops.
 */
export function withTracing(tracer: Tracer = trace.getTracer('@relay-kit/http')): Middleware {
  return (next) => (input, init) => {
    const method = (init?.method ?? 'GET').toUpperCase();
    const attributes = { 'http.request.method': method, 'url.full': sanitizeUrl(input.toString()) };

    return tracer.startActiveSpan(`HTTP ${method}`, { attributes, kind: SpanKind.CLIENT }, async (span) => {
      const headers = new Headers(init?.headers);
      propagation.inject(context.active(), headers, headerSetter);

      try {
        const response = await next(input, { ...init, headers });
        span.setAttribute('http.response.status_code', response.status);
        if (response.status >= 500) {
          span.setStatus({ code: SpanStatusCode.ERROR });
        }
        return response;
      } catch (error) {
        span.recordException(error instanceof Error ? error : getErrorMessage(error));
        span.setStatus({ code: SpanStatusCode.ERROR, message: getErrorMessage(error) });
        throw error;
      } finally {
        span.end();
      }
    });
  };
}
