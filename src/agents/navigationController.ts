/**
 * navigationController.ts: Actions on an already-authenticated page.
 *
 * Each operation resolves one purpose-specific candidate list, acts on the
 * match, waits for the page to settle, and reports Success or NotFound.
 * The controller never logs in: hand it the page of an Authenticator whose
 * `login()` has succeeded.
 */

import type { BrowserPage, NavigationFailure, NavigationResult, NavigationTarget } from '../core/types';
import type { AppConfig } from '../core/config';
import { toTransportError } from '../core/errors';
import { withKey } from '../core/locators';
import { resolveCandidates } from '../middleware';
import type { SessionStore } from './sessionStore';
import { Logger } from '../core/logger';

const logger = new Logger('NavigationController');

const SUCCESS: NavigationResult = { success: true };

export interface NavigationControllerDeps {
  page: BrowserPage;
  config: AppConfig;
  /** When given, `lastActivityAt` is bumped after each successful action. */
  sessionStore?: SessionStore;
}

export class NavigationController {
  private readonly page: BrowserPage;
  private readonly config: AppConfig;
  private readonly sessionStore?: SessionStore;

  constructor(deps: NavigationControllerDeps) {
    this.page = deps.page;
    this.config = deps.config;
    this.sessionStore = deps.sessionStore;
  }

  /** Open the search tab / page. */
  openSearchSurface(): Promise<NavigationResult> {
    return this.run('openSearchSurface', async (page) => {
      const surface = await resolveCandidates(
        page,
        this.config.locators.searchSurface,
        this.config.timeouts.searchSurfaceMs,
      );
      if (!surface.found) return notFound('searchSurface');

      await page.click(surface.element);
      await page.waitForSettle(this.settleMs);
      return SUCCESS;
    });
  }

  /**
   * Type `key` into the search box and submit: click the search button when
   * one resolves, press Enter in the box when none does.
   */
  searchByKey(key: string): Promise<NavigationResult> {
    return this.run('searchByKey', async (page) => {
      const { locators, timeouts } = this.config;

      const input = await resolveCandidates(page, locators.searchInput, timeouts.searchInputMs);
      if (!input.found) return notFound('searchInput');
      await page.fill(input.element, key);

      const button = await resolveCandidates(page, locators.searchSubmit, timeouts.candidateMs);
      if (button.found) {
        await page.click(button.element);
      } else {
        logger.debug('No search button, submitting with Enter', { event: 'navigation.search_enter' });
        await page.press(input.element, 'Enter');
      }

      await page.waitForSettle(this.settleMs);
      return SUCCESS;
    });
  }

  /** Open the search result for `key`.  `{key}` in the result candidates is replaced first. */
  openResult(key: string): Promise<NavigationResult> {
    return this.run('openResult', async (page) => {
      const candidates = withKey(this.config.locators.result, key);
      const result = await resolveCandidates(page, candidates, this.config.timeouts.resultMs);
      if (!result.found) return notFound('result');

      await page.click(result.element);
      await page.waitForSettle(this.settleMs);
      return SUCCESS;
    });
  }

  // ── Internals ──────────────────────────────────────────

  private get settleMs(): number {
    return this.config.scraping.requestTimeout * 1000;
  }

  private async run(
    operation: string,
    action: (page: BrowserPage) => Promise<NavigationResult>,
  ): Promise<NavigationResult> {
    let result: NavigationResult;
    try {
      result = await action(this.page);
    } catch (err) {
      result = {
        success: false,
        error: { kind: 'TransportError', message: toTransportError(err, operation).message },
      };
    }

    if (result.success) {
      this.sessionStore?.touch();
      logger.info(`${operation} done`, { event: `navigation.${operation}`, success: true, url: this.page.currentUrl() });
    } else {
      logger.warn(`${operation} failed: ${describeNavigationFailure(result.error)}`, {
        event: `navigation.${operation}`,
        success: false,
        kind: result.error.kind,
      });
    }
    return result;
  }
}

function notFound(target: NavigationTarget): NavigationResult {
  return { success: false, error: { kind: 'NotFound', target } };
}

export function describeNavigationFailure(error: NavigationFailure): string {
  switch (error.kind) {
    case 'NotFound':
      return `no ${error.target} element matched any candidate`;
    case 'TransportError':
      return error.message;
  }
}
