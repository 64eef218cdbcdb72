/**
 * Browser Manager - Handles Playwright browser lifecycle
 *
 * Every extraction gets its own browser: openSession() launches Chromium,
 * and the session's close() tears the whole browser down. Sessions are
 * never pooled or reused across searches.
 *
 * Playwright is loaded lazily so that importing this module never requires
 * a browser build to be present.
 */

import type { Browser, ElementHandle, LaunchOptions, Page } from 'playwright-core';
import type { ProxySettings } from '../utils/config-schemas.js';
import { chromiumLaunchError, playwrightNotInstalledError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';

// Lazy-loaded Playwright reference
let playwrightModule: typeof import('playwright-core') | null = null;

async function loadPlaywright(): Promise<typeof import('playwright-core')> {
  if (playwrightModule) {
    return playwrightModule;
  }
  try {
    playwrightModule = await import('playwright-core');
    return playwrightModule;
  } catch (error) {
    logger.browser.error('Playwright not available', { error });
    throw new Error(playwrightNotInstalledError(), { cause: error });
  }
}

// ============================================
// SESSION SEAM
// ============================================

/**
 * One result row on the page
 */
export interface ResultElement {
  /** innerText of the first descendant matching selector, null if absent */
  textOf(selector: string): Promise<string | null>;
}

/**
 * The slice of a browser page the extractor drives
 */
export interface ResultsPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  queryAll(selector: string): Promise<ResultElement[]>;
}

export interface BrowserSession {
  readonly page: ResultsPage;
  close(): Promise<void>;
}

export interface BrowserSessionFactory {
  openSession(): Promise<BrowserSession>;
}

// ============================================
// PLAYWRIGHT ADAPTERS
// ============================================

class PlaywrightResultElement implements ResultElement {
  constructor(private readonly handle: ElementHandle<SVGElement | HTMLElement>) {}

  async textOf(selector: string): Promise<string | null> {
    const node = await this.handle.$(selector);
    return node ? node.innerText() : null;
  }
}

class PlaywrightResultsPage implements ResultsPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs });
  }

  async queryAll(selector: string): Promise<ResultElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightResultElement(handle));
  }
}

// ============================================
// MANAGER
// ============================================

export interface BrowserConfig {
  headless: boolean;
  proxy?: ProxySettings;
  slowMo: number;
  userAgent: string;
  viewport: { width: number; height: number };
}

const DEFAULT_CONFIG: BrowserConfig = {
  headless: true,
  slowMo: 0,
  userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  viewport: { width: 1920, height: 1080 },
};

export class BrowserManager implements BrowserSessionFactory {
  private config: BrowserConfig;
  private openSessions = 0;

  constructor(config: Partial<BrowserConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getConfig(): BrowserConfig {
    return { ...this.config };
  }

  getOpenSessionCount(): number {
    return this.openSessions;
  }

  /**
   * Options handed to chromium.launch()
   */
  getLaunchOptions(): LaunchOptions {
    const options: LaunchOptions = {
      headless: this.config.headless,
      slowMo: this.config.slowMo,
    };
    if (this.config.proxy) {
      options.proxy = { ...this.config.proxy };
    }
    return options;
  }

  async openSession(): Promise<BrowserSession> {
    const pw = await loadPlaywright();
    let browser: Browser;
    try {
      browser = await pw.chromium.launch(this.getLaunchOptions());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.browser.error('Chromium launch failed', { error });
      throw new Error(chromiumLaunchError(reason), { cause: error });
    }
    this.openSessions++;
    logger.browser.debug('Browser launched', {
      headless: this.config.headless,
      proxied: this.config.proxy !== undefined,
    });

    try {
      const context = await browser.newContext({
        userAgent: this.config.userAgent,
        viewport: this.config.viewport,
      });
      const page = await context.newPage();
      let closed = false;
      return {
        page: new PlaywrightResultsPage(page),
        close: async () => {
          if (closed) return;
          closed = true;
          await this.closeBrowser(browser);
        },
      };
    } catch (error) {
      await this.closeBrowser(browser);
      throw error;
    }
  }

  private async closeBrowser(browser: Browser): Promise<void> {
    try {
      await browser.close();
    } finally {
      this.openSessions = Math.max(0, this.openSessions - 1);
      logger.browser.debug('Browser closed');
    }
  }
}
