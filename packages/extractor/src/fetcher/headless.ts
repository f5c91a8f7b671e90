// Playwright headless browser transport
import { chromium, type Browser, type BrowserContext, type LaunchOptions, type Route } from 'playwright-core';
import type { ErrorCode } from '@trawl/shared';
import { TransportError, proxyToUrl, type Transport, type TransportRequest, type TransportResponse } from './types';
import { shapeFromContentType } from './plausibility';
import { headlessLogger } from '../utils/logger';

export type BlockableResource = 'image' | 'stylesheet' | 'font' | 'media';

export interface HeadlessTransportOptions {
  renderWaitMs?: number;      // Wait after page load (default 0)
  waitForSelector?: string;   // Wait for specific element, best effort
  waitUntil?: 'load' | 'domcontentloaded' | 'networkidle';
  blockResources?: BlockableResource[];
  launchOptions?: LaunchOptions;
}

const DEFAULT_LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
  '--window-size=1920,1080',
];

const SELECTOR_WAIT_MS = 10000;

/**
 * Classify Playwright errors into ErrorCode types
 */
export function classifyBrowserError(error: unknown): ErrorCode {
  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (msg.includes('timeout')) return 'FETCH_TIMEOUT';
  if (msg.includes('net::err_name_not_resolved')) return 'FETCH_DNS';
  if (msg.includes('net::err_cert')) return 'FETCH_TLS';
  return 'FETCH_CONNECTION';
}

function isBlockable(value: string, blocked: readonly BlockableResource[]): boolean {
  return blocked.some(resource => resource === value);
}

/**
 * Headless Chromium transport. One browser is launched lazily and shared;
 * each fetch runs in its own context so the proxy and user agent are per request.
 */
export class HeadlessTransport implements Transport {
  readonly id = 'headless';
  private browser: Promise<Browser> | null = null;

  constructor(private readonly options: HeadlessTransportOptions = {}) {}

  async fetch(req: TransportRequest): Promise<TransportResponse> {
    const startTime = Date.now();
    let context: BrowserContext | null = null;
    const { 'User-Agent': userAgent, ...extraHTTPHeaders } = req.headers;

    const onAbort = () => {
      context?.close().catch((err: unknown) => {
        headlessLogger.warn('Failed to close aborted context', { reason: String(err) });
      });
    };
    req.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const browser = await this.getBrowser();
      context = await browser.newContext({
        userAgent,
        extraHTTPHeaders,
        viewport: { width: 1920, height: 1080 },
        locale: 'en-US',
        proxy: req.proxy
          ? {
              server: proxyToUrl(req.proxy, false),
              username: req.proxy.username,
              password: req.proxy.password,
            }
          : undefined,
      });

      const page = await context.newPage();
      const blocked = this.options.blockResources ?? [];
      if (blocked.length > 0) {
        await page.route('**/*', async (route: Route) => {
          if (isBlockable(route.request().resourceType(), blocked)) {
            await route.abort();
          } else {
            await route.continue();
          }
        });
      }

      const response = await page.goto(req.url, {
        timeout: req.timeoutMs,
        waitUntil: this.options.waitUntil ?? 'domcontentloaded',
      });
      if (!response) {
        throw new Error(`No response for navigation to ${req.url}`);
      }

      if (this.options.renderWaitMs) {
        await page.waitForTimeout(this.options.renderWaitMs);
      }

      if (this.options.waitForSelector) {
        await page.waitForSelector(this.options.waitForSelector, { timeout: SELECTOR_WAIT_MS }).catch((err: unknown) => {
          headlessLogger.debug(`Selector ${this.options.waitForSelector} did not appear`, { reason: String(err) });
        });
      }

      const headers = response.headers();
      const contentType = headers['content-type'] ?? null;
      // JSON documents are read raw; Chromium wraps them in a <pre> viewer otherwise
      const body = shapeFromContentType(contentType) === 'json' ? await response.text() : await page.content();

      return {
        status: response.status(),
        body,
        headers,
        contentType,
        elapsedMs: Date.now() - startTime,
        finalUrl: page.url(),
      };
    } catch (error) {
      const code = classifyBrowserError(error);
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(code, detail, Date.now() - startTime, { cause: error });
    } finally {
      req.signal?.removeEventListener('abort', onAbort);
      if (context) {
        await context.close().catch((err: unknown) => {
          headlessLogger.warn('Error closing context', { reason: String(err) });
        });
      }
    }
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = null;
    if (pending) {
      const browser = await pending;
      await browser.close();
      headlessLogger.info('Browser closed');
    }
  }

  private async getBrowser(): Promise<Browser> {
    if (!this.browser) {
      this.browser = chromium.launch({
        headless: true,
        args: DEFAULT_LAUNCH_ARGS,
        ...this.options.launchOptions,
      });
    }
    try {
      return await this.browser;
    } catch (error) {
      this.browser = null;
      throw error;
    }
  }
}
