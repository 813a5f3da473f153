/**
 * browserManager.ts: Launches the Chromium process the controller drives.
 *
 * One `launch()` yields one browser, one incognito context and one page,
 * wrapped for single-flight access.  The returned `close()` releases all
 * three, is idempotent, and is also wired to SIGINT/SIGTERM so an
 * interrupted run does not leave Chromium behind.
 *
 * Puppeteer's bundled Chrome download is switched off for this project
 * (`.puppeteerrc.cjs`); point `browser.executablePath` or `browser.channel`
 * at an installed Chrome.
 */

import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, Page } from 'puppeteer';
import type { BrowserLauncher, BrowserSession } from './types';
import type { AppConfig } from './config';
import { TransportError, describeError, toTransportError } from './errors';
import { PuppeteerPage } from './puppeteerPage';
import { serializePage } from '../middleware';
import { Logger } from './logger';

const logger = new Logger('BrowserManager');

// puppeteer-extra plugins must be registered before the first launch().
puppeteer.use(StealthPlugin());

const LAUNCH_ARGS = ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'];

/** 128 + signal number, the shell convention. */
function exitCodeFor(signal: NodeJS.Signals): number {
  return signal === 'SIGINT' ? 130 : 143;
}

export class BrowserManager implements BrowserLauncher {
  constructor(private readonly config: AppConfig) {}

  // ── Core API ───────────────────────────────────────────

  async launch(): Promise<BrowserSession> {
    const browser = await this.launchBrowser();

    let opened: { context: BrowserContext; page: Page };
    try {
      opened = await this.openPage(browser);
    } catch (err) {
      await closeQuietly('browser', () => browser.close());
      throw toTransportError(err, 'Opening page failed');
    }
    const { context, page: rawPage } = opened;

    const page = serializePage(
      new PuppeteerPage(rawPage, { typingDelayMs: this.config.browser.typingDelayMs }),
      { requestDelayMs: this.config.scraping.requestDelay * 1000 },
    );

    let closed = false;
    const close = async (): Promise<void> => {
      if (closed) return;
      closed = true;
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);

      await page.stop();
      await closeQuietly('page', () => rawPage.close());
      await closeQuietly('context', () => context.close());
      await closeQuietly('browser', () => browser.close());
      logger.info('Browser stopped', { event: 'browser.stop' });
    };

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.warn(`Received ${signal}, closing browser…`, { event: 'browser.signal', signal });
      void close().then(
        () => process.exit(exitCodeFor(signal)),
        (err: unknown) => {
          logger.error('Teardown after signal failed', { event: 'browser.stop' }, err);
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    return { page, close };
  }

  // ── Internals ──────────────────────────────────────────

  private async openPage(browser: Browser): Promise<{ context: BrowserContext; page: Page }> {
    const context = await browser.createBrowserContext();
    const page = await context.newPage();
    await page.setViewport({
      width: this.config.browser.viewportWidth,
      height: this.config.browser.viewportHeight,
    });
    await page.setUserAgent(this.config.browser.userAgent);
    page.setDefaultTimeout(this.config.scraping.requestTimeout * 1000);
    return { context, page };
  }

  /** Launch with up to `scraping.maxRetries` attempts.  Login itself never retries. */
  private async launchBrowser(): Promise<Browser> {
    const { browser: settings, scraping } = this.config;
    let lastError: unknown;
    for (let attempt = 1; attempt <= scraping.maxRetries; attempt++) {
      try {
        const browser = await puppeteer.launch({
          headless: settings.headless,
          executablePath: settings.executablePath,
          channel: settings.channel,
          args: LAUNCH_ARGS,
        });
        logger.info('Browser started', {
          event: 'browser.start',
          headless: settings.headless,
          attempt,
        });
        return browser;
      } catch (err) {
        lastError = err;
        logger.warn(`Browser launch attempt ${attempt}/${scraping.maxRetries} failed: ${describeError(err)}`, {
          event: 'browser.start_failed',
          attempt,
        });
        if (attempt < scraping.maxRetries) {
          await sleep(scraping.requestDelay * 1000);
        }
      }
    }

    throw new TransportError(`Browser launch failed: ${describeError(lastError)}`, { cause: lastError });
  }
}

async function closeQuietly(what: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    // Already gone (crashed or closed by a parent); nothing left to release.
    logger.debug(`Closing ${what} failed: ${describeError(err)}`, { event: 'browser.stop' });
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
