// Transport types
import type { ErrorCode, HttpMethod, ProxyEndpoint } from '@trawl/shared';

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  proxy: ProxyEndpoint | null;
  timeoutMs: number;
  body?: string;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
  contentType: string | null;
  elapsedMs: number;
  finalUrl: string;  // after redirects, when the transport knows it
}

/**
 * Performs one network round trip. Network-level failures (DNS, connect,
 * TLS, timeout) are thrown as TransportError; any HTTP status is a response.
 */
export interface Transport {
  readonly id: string;
  fetch(request: TransportRequest): Promise<TransportResponse>;
  close?(): Promise<void>;
}

export class TransportError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly elapsedMs: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export function proxyToUrl(proxy: ProxyEndpoint, withCredentials = true): string {
  const auth =
    withCredentials && proxy.username
      ? `${encodeURIComponent(proxy.username)}:${encodeURIComponent(proxy.password ?? '')}@`
      : '';
  return `${proxy.protocol}://${auth}${proxy.host}:${proxy.port}`;
}
