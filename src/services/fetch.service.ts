import axios, { AxiosInstance } from 'axios';
import { chromium } from 'playwright-core';
import { BROWSER_CONFIG, FETCH_HEADERS } from '@/config/constants';
import { DeviceConfig, FetchMode } from '@/types/device.types';
import {
  DocumentFetcher,
  DocumentKind,
  FetchOutcome,
  FetchRequest,
  RetryOutcome,
  RetryPolicy,
} from '@/types/fetch.types';
import { MEASUREMENT_FIELDS } from '@/types/measurement.types';
import { sleep, TimeoutError, withTimeout } from '@/utils/async.utils';
import { FetchFailure, getErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

// The slice of the Playwright API a fetch touches
export interface BrowserPage {
  goto(url: string, options: { waitUntil: 'load' | 'domcontentloaded'; timeout: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { state: 'attached'; timeout: number }): Promise<unknown>;
  content(): Promise<string>;
}

export interface BrowserHandle {
  newPage(options: { viewport: { width: number; height: number } }): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface BrowserLaunchOptions {
  headless: boolean;
  args: string[];
  executablePath?: string;
  timeout: number;
}

export type BrowserLauncher = (options: BrowserLaunchOptions) => Promise<BrowserHandle>;

const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

export const detectDocumentKind = (contentType: string, body: string): DocumentKind => {
  if (contentType.toLowerCase().includes('json')) {
    return 'json';
  }
  const head = body.trimStart();
  return head.startsWith('{') || head.startsWith('[') ? 'json' : 'html';
};

const failed = (error: FetchFailure): FetchOutcome => ({ success: false, error });

/**
 * Plain GET for endpoints that serve their values without scripting.
 */
export class HttpFetcher implements DocumentFetcher {
  readonly mode: FetchMode = 'http';

  constructor(private readonly client: AxiosInstance = axios.create()) {}

  async fetch(request: FetchRequest): Promise<FetchOutcome> {
    const { endpoint } = request;

    try {
      const response = await this.client.get<unknown>(endpoint, {
        timeout: request.timeout_ms,
        headers: { ...FETCH_HEADERS },
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
        signal: request.signal,
      });

      if (response.status < 200 || response.status >= 300) {
        return failed(new FetchFailure(endpoint, 'http_status', `${endpoint} answered HTTP ${response.status}`));
      }

      const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
      const contentType = String(response.headers['content-type'] ?? '');

      return {
        success: true,
        document: { endpoint, kind: detectDocumentKind(contentType, body), body, fetched_at: new Date() },
      };
    } catch (error) {
      return failed(this.toFailure(request, error));
    }
  }

  private toFailure(request: FetchRequest, error: unknown): FetchFailure {
    const { endpoint } = request;
    if (request.signal?.aborted || axios.isCancel(error)) {
      return new FetchFailure(endpoint, 'aborted', `Fetch of ${endpoint} was aborted`);
    }
    if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
      return new FetchFailure(endpoint, 'timeout', `Fetch of ${endpoint} timed out after ${request.timeout_ms}ms`);
    }
    return new FetchFailure(endpoint, 'transport', `Fetch of ${endpoint} failed: ${getErrorMessage(error)}`);
  }
}

export interface BrowserFetcherOptions {
  executablePath?: string;
  settleDelayMs: number;
  launcher?: BrowserLauncher;
}

interface BrowserSession {
  browser: BrowserHandle | null;
  released: boolean;
}

/**
 * Renders the endpoint in headless Chromium so client-side scripts can
 * fill in values. Every attempt launches its own browser and closes it
 * on every exit path, including abort.
 */
export class BrowserFetcher implements DocumentFetcher {
  readonly mode: FetchMode = 'browser';
  private readonly launcher: BrowserLauncher;

  constructor(private readonly options: BrowserFetcherOptions) {
    this.launcher = options.launcher ?? launchChromium;
  }

  async fetch(request: FetchRequest): Promise<FetchOutcome> {
    const session: BrowserSession = { browser: null, released: false };
    const release = () => this.release(session, request.endpoint);
    const onAbort = () => {
      void release();
    };

    if (request.signal?.aborted) {
      return failed(new FetchFailure(request.endpoint, 'aborted', `Fetch of ${request.endpoint} was aborted`));
    }
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const body = await withTimeout(this.render(request, session), request.timeout_ms, `Fetch of ${request.endpoint}`);
      return {
        success: true,
        document: { endpoint: request.endpoint, kind: 'html', body, fetched_at: new Date() },
      };
    } catch (error) {
      return failed(this.toFailure(request, error));
    } finally {
      request.signal?.removeEventListener('abort', onAbort);
      await release();
    }
  }

  private async render(request: FetchRequest, session: BrowserSession): Promise<string> {
    const startedAt = Date.now();
    const remaining = () => Math.max(1, request.timeout_ms - (Date.now() - startedAt));

    const browser = await this.launcher({
      headless: true,
      args: [...BROWSER_CONFIG.ARGS],
      executablePath: this.options.executablePath,
      timeout: request.timeout_ms,
    });

    // Timed out or aborted while Chromium was still starting
    if (session.released) {
      await browser.close();
      throw new FetchFailure(request.endpoint, 'aborted', `Fetch of ${request.endpoint} was abandoned`);
    }
    session.browser = browser;

    const page = await browser.newPage({ viewport: { ...BROWSER_CONFIG.VIEWPORT } });
    await page.goto(request.endpoint, { waitUntil: 'domcontentloaded', timeout: remaining() });

    if (request.ready_selector) {
      try {
        await page.waitForSelector(request.ready_selector, { state: 'attached', timeout: remaining() });
      } catch (error) {
        throw new FetchFailure(
          request.endpoint,
          'not_ready',
          `Readiness marker ${request.ready_selector} never appeared: ${getErrorMessage(error)}`
        );
      }
    } else {
      await sleep(Math.min(this.options.settleDelayMs, remaining()), request.signal);
    }

    return page.content();
  }

  private async release(session: BrowserSession, endpoint: string): Promise<void> {
    session.released = true;
    const { browser } = session;
    session.browser = null;
    if (!browser) {
      return;
    }

    try {
      await browser.close();
    } catch (error) {
      logger.debug(`Closing browser for ${endpoint} failed: ${getErrorMessage(error)}`);
    }
  }

  private toFailure(request: FetchRequest, error: unknown): FetchFailure {
    const { endpoint } = request;
    if (request.signal?.aborted) {
      return new FetchFailure(endpoint, 'aborted', `Fetch of ${endpoint} was aborted`);
    }
    if (error instanceof FetchFailure) {
      return error;
    }
    if (error instanceof TimeoutError || (error instanceof Error && error.name === 'TimeoutError')) {
      return new FetchFailure(endpoint, 'timeout', `Fetch of ${endpoint} timed out after ${request.timeout_ms}ms`);
    }
    return new FetchFailure(endpoint, 'transport', `Fetch of ${endpoint} failed: ${getErrorMessage(error)}`);
  }
}

/**
 * Node whose presence means the page has rendered its values: the
 * configured marker, else the first CSS locator. Undefined falls back to
 * the settle delay.
 */
export const readinessMarker = (device: DeviceConfig): string | undefined => {
  if (device.ready_selector) {
    return device.ready_selector;
  }
  return MEASUREMENT_FIELDS.map((field) => device.locators[field]?.selector).find(
    (selector): selector is string => typeof selector === 'string' && selector.length > 0
  );
};

export interface FetcherFactoryOptions {
  forceHttp: boolean;
  executablePath?: string;
  settleDelayMs: number;
  launcher?: BrowserLauncher;
  httpClient?: AxiosInstance;
}

export const createFetcher = (mode: FetchMode, options: FetcherFactoryOptions): DocumentFetcher => {
  if (mode === 'http' || options.forceHttp) {
    return new HttpFetcher(options.httpClient);
  }
  return new BrowserFetcher({
    executablePath: options.executablePath,
    settleDelayMs: options.settleDelayMs,
    launcher: options.launcher,
  });
};

/**
 * Runs up to `max_attempts` fetches with a fixed pause between them.
 * Stops early on success or abort; the last failure is returned.
 */
export const fetchWithRetry = async (
  fetcher: DocumentFetcher,
  request: FetchRequest,
  policy: RetryPolicy
): Promise<RetryOutcome> => {
  const attempts = Math.max(1, policy.max_attempts);
  const aborted = (made: number): RetryOutcome => ({
    ...failed(new FetchFailure(request.endpoint, 'aborted', `Fetch of ${request.endpoint} was aborted`)),
    attempts: made,
  });
  let outcome: FetchOutcome | null = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    // Stopped before the first attempt or during the pause between attempts
    if (request.signal?.aborted) {
      return aborted(attempt - 1);
    }

    outcome = await fetcher.fetch(request);
    if (outcome.success) {
      return { ...outcome, attempts: attempt };
    }

    if (outcome.error.reason === 'aborted') {
      return { ...outcome, attempts: attempt };
    }

    logger.warn(`Attempt ${attempt}/${attempts} for ${request.endpoint} failed: ${outcome.error.message}`);
    if (attempt < attempts) {
      await sleep(policy.delay_ms, request.signal);
    }
  }

  if (!outcome || request.signal?.aborted) {
    return aborted(attempts);
  }
  return { ...outcome, attempts };
};
