// HTTP transport using undici
import { request, ProxyAgent, type Dispatcher } from 'undici';
import { gunzipSync, inflateSync, brotliDecompressSync } from 'zlib';
import type { ErrorCode, ProxyEndpoint } from '@trawl/shared';
import { TransportError, proxyToUrl, type Transport, type TransportRequest, type TransportResponse } from './types';
import { httpLogger } from '../utils/logger';

const MAX_REDIRECTS = 5;

const TLS_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_ABORTED',
]);

export interface HttpTransportOptions {
  /** Dispatcher for direct (proxy-less) requests; undici's global dispatcher when omitted */
  dispatcher?: Dispatcher;
  /** Builds the dispatcher for a proxy; a cached undici ProxyAgent when omitted */
  proxyDispatcher?: (proxy: ProxyEndpoint) => Dispatcher;
  followRedirects?: boolean;  // default true, max 5
  acceptEncoding?: boolean;  // gzip, deflate, br
}

/**
 * Decompress response body based on Content-Encoding header
 */
export function decompressBody(buffer: Buffer, encoding: string | null): string {
  const enc = encoding?.toLowerCase().trim() ?? '';

  try {
    if (enc === 'gzip' || enc === 'x-gzip') {
      return gunzipSync(buffer).toString('utf-8');
    } else if (enc === 'deflate') {
      return inflateSync(buffer).toString('utf-8');
    } else if (enc === 'br') {
      return brotliDecompressSync(buffer).toString('utf-8');
    }
  } catch (error) {
    httpLogger.warn(`Failed to decode ${enc} body, using raw bytes`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return buffer.toString('utf-8');
}

function errorCodeOf(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) return null;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return errorCodeOf(error.cause);
  return null;
}

/**
 * Classify a thrown network error into an ErrorCode
 */
export function classifyTransportError(error: unknown, timeoutMs: number): { code: ErrorCode; detail: string } {
  const code = errorCodeOf(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code === 'UND_ERR_CONNECT_TIMEOUT' || code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') {
    return { code: 'FETCH_TIMEOUT', detail: `Request timeout after ${timeoutMs}ms` };
  }
  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return { code: 'FETCH_DNS', detail: `DNS lookup failed: ${message}` };
  }
  if (code !== null && TLS_ERROR_CODES.has(code)) {
    return { code: 'FETCH_TLS', detail: `TLS failed: ${code} - ${message}` };
  }
  if (code !== null && CONNECTION_ERROR_CODES.has(code)) {
    return { code: 'FETCH_CONNECTION', detail: `Connection failed: ${code} - ${message}` };
  }
  return { code: 'FETCH_CONNECTION', detail: `Fetch failed: ${message}` };
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      flat[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      flat[key.toLowerCase()] = value.join(', ');
    }
  }
  return flat;
}

/**
 * Plain HTTP transport. One call is one request; proxies go through
 * a ProxyAgent per endpoint, reused across calls.
 */
export class HttpTransport implements Transport {
  readonly id = 'http';
  private readonly proxyAgents = new Map<string, Dispatcher>();

  constructor(private readonly options: HttpTransportOptions = {}) {}

  async fetch(req: TransportRequest): Promise<TransportResponse> {
    const startTime = Date.now();
    const { followRedirects = true, acceptEncoding = true } = this.options;

    const headers: Record<string, string> = { ...req.headers };
    if (acceptEncoding) {
      headers['Accept-Encoding'] = 'gzip, deflate, br';
    }

    try {
      const response = await request(req.url, {
        method: req.method,
        headers,
        body: req.body,
        dispatcher: this.dispatcherFor(req.proxy),
        maxRedirections: followRedirects ? MAX_REDIRECTS : 0,
        headersTimeout: req.timeoutMs,
        bodyTimeout: req.timeoutMs,
        signal: req.signal,
      });

      const responseHeaders = flattenHeaders(response.headers);
      const buffer = Buffer.from(await response.body.arrayBuffer());
      const body = decompressBody(buffer, responseHeaders['content-encoding'] ?? null);
      const elapsedMs = Date.now() - startTime;

      httpLogger.debug(`${req.method} ${req.url} -> ${response.statusCode}`, { elapsedMs, bytes: buffer.length });

      return {
        status: response.statusCode,
        body,
        headers: responseHeaders,
        contentType: responseHeaders['content-type'] ?? null,
        elapsedMs,
        finalUrl: req.url,
      };
    } catch (error) {
      const { code, detail } = classifyTransportError(error, req.timeoutMs);
      throw new TransportError(code, detail, Date.now() - startTime, { cause: error });
    }
  }

  async close(): Promise<void> {
    const agents = [...new Set(this.proxyAgents.values())];
    this.proxyAgents.clear();
    await Promise.all(agents.map(agent => agent.close()));
  }

  private dispatcherFor(proxy: ProxyEndpoint | null): Dispatcher | undefined {
    if (!proxy) {
      return this.options.dispatcher;
    }

    const key = proxyToUrl(proxy);
    const cached = this.proxyAgents.get(key);
    if (cached) {
      return cached;
    }

    const agent = this.options.proxyDispatcher
      ? this.options.proxyDispatcher(proxy)
      : createProxyAgent(proxy);
    this.proxyAgents.set(key, agent);
    return agent;
  }
}

function createProxyAgent(proxy: ProxyEndpoint): ProxyAgent {
  const token = proxy.username
    ? `Basic ${Buffer.from(`${proxy.username}:${proxy.password ?? ''}`).toString('base64')}`
    : undefined;
  return new ProxyAgent({ uri: proxyToUrl(proxy, false), token });
}
