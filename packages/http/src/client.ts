import type { Dispatcher, RequestInit, Response } from 'undici';

import type { FetchFn } from './instrumentation.js';
import type { Transport } from './types.js';

export interface HttpClientInit {
  transport: Transport;
  timeoutMs: number;
  /** Transport round trip, already wrapped in the instrumentation middleware */
  fetch: FetchFn;
}

/**
 * A built client: a transport bound to its resolved host and a fixed timeout.
 * Safe to share between concurrent requests.
 *
 * @example
 * ```typescript
 * const result = createHttpClient({ url: 'http+unix:///var/run/backend.sock', relativeUrlRoot: '/api' });
 * if (result.isOk()) {
 *   // result.value.host === 'http://unix/api'
 *   const response = await result.value.fetch('/v4/internal/check');
 * }
 * ```
 */
export class HttpClient {
  readonly host: string;
  readonly timeoutMs: number;
  readonly transport: Transport;
  private readonly send: FetchFn;

  constructor(init: HttpClientInit) {
    this.host = init.transport.host;
    this.timeoutMs = init.timeoutMs;
    this.transport = init.transport;
    this.send = init.fetch;
  }

  get dispatcher(): Dispatcher {
    return this.transport.dispatcher;
  }

  /**
   * Joins the resolved host and `path` with a single slash.
   */
  url(path: string): string {
    const base = this.host.endsWith('/') ? this.host.slice(0, -1) : this.host;
    if (!path || path === '/') {
      return base;
    }
    return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`;
  }

  /**
   * Sends a request through the transport. Absolute http(s) URLs are used as
   * they are; anything else is resolved against the host. The request is
   * aborted by the caller's signal or after `timeoutMs`, whichever comes first.
   * Failures anywhere in the middleware chain surface as a rejection.
   */
  async fetch(pathOrUrl: string, init: RequestInit = {}): Promise<Response> {
    const target = /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : this.url(pathOrUrl);
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signal = init.signal ? AbortSignal.any([init.signal, timeoutSignal]) : timeoutSignal;
    return this.send(target, { ...init, signal });
  }

  close(): Promise<void> {
    return this.transport.dispatcher.close();
  }
}
