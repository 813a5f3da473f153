/**
 * loginStateDetector.ts: Decide whether the page is behind the login wall.
 *
 * The target site has no "am I logged in" endpoint, so the check is two
 * heuristics, cheapest first:
 *
 *   1. URL: on the target origin (and under its base path) and not on a
 *      login URL → authenticated.  The configured login page always counts
 *      as a login URL, whatever the patterns say.
 *   2. Markers: probe a short list of elements only a logged-in user sees
 *      (logout link, profile block, member-only menu text).
 *
 * Both the login URL patterns and the markers come from configuration.
 * The check only reads the page and is safe to repeat.
 */

import type { BrowserPage, CandidateList } from '../core/types';
import { resolveCandidates } from '../middleware';
import { Logger } from '../core/logger';

const logger = new Logger('LoginStateDetector');

export interface LoginStateDetectorOptions {
  baseUrl: string;
  /** The login page itself; matched on origin and path. */
  loginUrl?: string;
  /** Substrings that identify a login page URL. */
  loginUrlPatterns: readonly string[];
  markers: CandidateList;
  markerTimeoutMs: number;
}

export class LoginStateDetector {
  private readonly base: URL;
  private readonly loginPage: URL | null;

  constructor(private readonly options: LoginStateDetectorOptions) {
    this.base = new URL(options.baseUrl);
    this.loginPage = options.loginUrl ? new URL(options.loginUrl) : null;
  }

  async isAuthenticated(page: BrowserPage): Promise<boolean> {
    const url = page.currentUrl();

    if (this.isOnTarget(url) && !this.isLoginUrl(url)) {
      logger.debug('Authenticated by URL', { event: 'login.detect', tier: 'url', url });
      return true;
    }

    if (this.options.markers.length === 0) return false;

    const resolution = await resolveCandidates(page, this.options.markers, this.options.markerTimeoutMs);
    logger.debug(resolution.found ? 'Authenticated by marker' : 'No post-login marker found', {
      event: 'login.detect',
      tier: 'marker',
      authenticated: resolution.found,
      attempts: resolution.attempts,
    });
    return resolution.found;
  }

  isLoginUrl(url: string): boolean {
    return this.isLoginPage(url) || this.options.loginUrlPatterns.some((pattern) => url.includes(pattern));
  }

  /** Same origin as the base URL, and under its path. */
  isOnTarget(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    if (parsed.origin !== this.base.origin) return false;

    const basePath = trimSlashes(this.base.pathname);
    return basePath === '' || parsed.pathname === basePath || parsed.pathname.startsWith(`${basePath}/`);
  }

  /** Query string and fragment are ignored; so is a trailing slash. */
  private isLoginPage(url: string): boolean {
    if (!this.loginPage) return false;
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    return (
      parsed.origin === this.loginPage.origin && trimSlashes(parsed.pathname) === trimSlashes(this.loginPage.pathname)
    );
  }
}

function trimSlashes(pathname: string): string {
  return pathname.replace(/\/+$/, '');
}
