import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DateTime } from 'luxon';
import type { AppConfig } from '../src/core/config';
import { buildConfig } from '../src/core/config';
import type { Cookie, Locator } from '../src/core/types';

export const BASE_URL = 'https://portal.test';
export const LOGIN_URL = 'https://portal.test/login';
export const DASHBOARD_URL = 'https://portal.test/home';

export const USERNAME_FIELD: Locator = { kind: 'css', selector: '#username' };
export const IDENTIFIER: Locator = { kind: 'css', selector: '#email' };
export const SECRET: Locator = { kind: 'css', selector: '#password' };
export const SUBMIT: Locator = { kind: 'css', selector: 'button[type="submit"]' };
export const LOGOUT_LINK: Locator = { kind: 'attribute', attribute: 'href', value: 'logout', match: 'contains' };

export const SEARCH_TAB: Locator = { kind: 'text', text: 'User search', tag: 'a' };
export const SEARCH_INPUT: Locator = { kind: 'attribute', attribute: 'name', value: 'nickname', tag: 'input' };
export const SEARCH_BUTTON: Locator = { kind: 'text', text: 'Search', tag: 'button' };
export const RESULT_LINK: Locator = { kind: 'text', text: '{key}', tag: 'a' };
export const RESULT_FALLBACK: Locator = { kind: 'css', selector: '.result a' };

export const SESSION_COOKIE: Cookie = {
  name: 'sid',
  value: 'test-session-id',
  domain: 'portal.test',
  path: '/',
  expires: -1,
  secure: true,
  httpOnly: true,
  sameSite: 'Lax',
};

export const T0 = DateTime.fromISO('2026-03-01T10:00:00.000Z', { zone: 'utc' });

/** Config pointed at portal.test with small, explicit candidate lists. */
export function testConfig(raw: Record<string, unknown> = {}): AppConfig {
  return buildConfig({
    targetSite: { baseUrl: BASE_URL, loginUrl: LOGIN_URL },
    scraping: { requestDelay: 0, requestTimeout: 1 },
    locators: {
      identifier: [USERNAME_FIELD, IDENTIFIER],
      secret: [SECRET],
      submit: [SUBMIT],
      loggedInMarkers: [LOGOUT_LINK],
      searchSurface: [SEARCH_TAB],
      searchInput: [SEARCH_INPUT],
      searchSubmit: [SEARCH_BUTTON],
      result: [RESULT_LINK, RESULT_FALLBACK],
    },
    ...raw,
  });
}

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'portal-session-'));
}

/** A settable clock for SessionStore. */
export function manualClock(start: DateTime = T0): { now: () => DateTime; advance: (seconds: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (seconds: number) => {
      current = current.plus({ seconds });
    },
  };
}
