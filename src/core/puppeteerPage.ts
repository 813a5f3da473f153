/**
 * puppeteerPage.ts: BrowserPage implementation over a Puppeteer Page.
 *
 * Element handles never leave this file: a probe hands back an `ElementRef`
 * whose id indexes `handles`.  A click or key press may replace the
 * document, so every held handle is disposed after one, and before the
 * next navigation; a ref is good until then.  Engine failures are rethrown as
 * TransportError; a probe that simply times out resolves to null.
 */

import { TimeoutError } from 'puppeteer';
import type { CookieParam, Cookie as PuppeteerCookie, ElementHandle, Page } from 'puppeteer';
import type { BrowserPage, Cookie, ElementRef, Locator, PressKey } from './types';
import { TransportError, describeError, toTransportError } from './errors';
import { describeLocator, toSelector } from './locators';
import { Logger } from './logger';

const logger = new Logger('PuppeteerPage');

/** Quiet period that counts as "network idle". */
const IDLE_TIME_MS = 500;

export interface PuppeteerPageOptions {
  /** Per-keystroke delay for `fill`. */
  typingDelayMs: number;
}

export class PuppeteerPage implements BrowserPage {
  private readonly handles = new Map<number, ElementHandle<Element>>();
  private nextId = 1;

  constructor(
    private readonly page: Page,
    private readonly options: PuppeteerPageOptions,
  ) {}

  // ── Navigation ─────────────────────────────────────────

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.releaseHandles();
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (err) {
      throw toTransportError(err, `Navigation to ${url} failed`);
    }
  }

  /**
   * Wait for the network to go quiet.  Pages that long-poll never do, so a
   * timeout here is logged and tolerated; anything else is a transport
   * failure.
   */
  async waitForSettle(timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForNetworkIdle({ idleTime: IDLE_TIME_MS, timeout: timeoutMs });
    } catch (err) {
      if (err instanceof TimeoutError) {
        logger.warn(`Network still busy after ${timeoutMs}ms, continuing`, {
          event: 'page.settle_timeout',
          url: this.page.url(),
        });
        return;
      }
      throw toTransportError(err, 'Waiting for network idle failed');
    }
  }

  // ── Elements ───────────────────────────────────────────

  async probe(locator: Locator, timeoutMs: number): Promise<ElementRef | null> {
    try {
      const handle = await this.page.waitForSelector(toSelector(locator), { timeout: timeoutMs });
      if (!handle) return null;

      const id = this.nextId++;
      this.handles.set(id, handle);
      return { id, locator };
    } catch (err) {
      if (err instanceof TimeoutError) return null;
      if (this.page.isClosed() || !this.page.browser().connected) {
        throw toTransportError(err, 'Probe failed');
      }
      // A selector the engine rejects is a miss, not a crash.
      logger.debug(`Probe rejected: ${describeError(err)}`, {
        event: 'resolve.invalid',
        locator: describeLocator(locator),
      });
      return null;
    }
  }

  async fill(element: ElementRef, text: string): Promise<void> {
    const handle = this.handleFor(element);
    try {
      // Select whatever is already in the field so typing replaces it.
      await handle.click({ count: 3 });
      await handle.type(text, { delay: this.options.typingDelayMs });
    } catch (err) {
      throw toTransportError(err, 'Filling field failed');
    }
  }

  async click(element: ElementRef): Promise<void> {
    const handle = this.handleFor(element);
    try {
      await handle.click();
    } catch (err) {
      throw toTransportError(err, 'Click failed');
    } finally {
      await this.releaseHandles();
    }
  }

  async press(element: ElementRef, key: PressKey): Promise<void> {
    const handle = this.handleFor(element);
    try {
      await handle.press(key);
    } catch (err) {
      throw toTransportError(err, `Pressing ${key} failed`);
    } finally {
      await this.releaseHandles();
    }
  }

  // ── Cookies & state ────────────────────────────────────

  async cookies(): Promise<Cookie[]> {
    try {
      const cookies = await this.page.cookies();
      return cookies.map(fromPuppeteerCookie);
    } catch (err) {
      throw toTransportError(err, 'Reading cookies failed');
    }
  }

  async setCookies(cookies: Cookie[]): Promise<void> {
    if (cookies.length === 0) return;
    try {
      await this.page.setCookie(...cookies.map(toCookieParam));
    } catch (err) {
      throw toTransportError(err, 'Restoring cookies failed');
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async title(): Promise<string> {
    try {
      return await this.page.title();
    } catch (err) {
      throw toTransportError(err, 'Reading title failed');
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async releaseHandles(): Promise<void> {
    const held = [...this.handles.values()];
    this.handles.clear();
    for (const handle of held) {
      try {
        await handle.dispose();
      } catch (err) {
        // Already gone with its document or its page.
        logger.debug(`Handle dispose failed: ${describeError(err)}`, { event: 'page.dispose' });
      }
    }
  }

  private handleFor(element: ElementRef): ElementHandle<Element> {
    const handle = this.handles.get(element.id);
    if (!handle) {
      throw new TransportError(`Unknown element handle #${element.id} (${describeLocator(element.locator)})`);
    }
    return handle;
  }
}

function fromPuppeteerCookie(cookie: PuppeteerCookie): Cookie {
  return {
    ...cookie,
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
    sameSite: cookie.sameSite,
  };
}

function toCookieParam(cookie: Cookie): CookieParam {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
    sameSite: cookie.sameSite,
  };
}
