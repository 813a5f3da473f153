/**
 * types.ts: Shared type definitions for the session controller.
 *
 * Every layer (resolver, detector, authenticator, navigation, store) agrees
 * on these shapes.  Nothing in here depends on Puppeteer: the browser is
 * reached only through the `BrowserPage` capability at the bottom of this
 * file, so tests can swap in an in-process fake.
 */

// ─── Credentials ───────────────────────────────────────────

/**
 * Login credentials.  Constructed per invocation, handed to
 * `Authenticator.login`, and dropped when that call returns.  Never
 * persisted and never passed to the logger.
 */
export interface Credentials {
  identifier: string;
  secret: string;
}

// ─── Locators ──────────────────────────────────────────────

export type AttributeMatch = 'exact' | 'contains' | 'prefix';

/** A rule for finding exactly one UI element. */
export type Locator =
  | { kind: 'css'; selector: string }
  /** Deepest element whose text contains `text`, optionally restricted to a tag. */
  | { kind: 'text'; text: string; tag?: string }
  | { kind: 'attribute'; attribute: string; value: string; match?: AttributeMatch; tag?: string }
  /** Accessibility role, optionally with an accessible name. */
  | { kind: 'role'; role: string; name?: string };

/** Ordered locators: tried in order, first match wins. */
export type CandidateList = readonly Locator[];

/**
 * Opaque handle to an element found by a probe.  Only the page that
 * produced it knows how to map `id` back to an engine handle.  It stays
 * usable until the next navigate, click or press.
 */
export interface ElementRef {
  readonly id: number;
  readonly locator: Locator;
}

// ─── Cookies & session records ─────────────────────────────

/**
 * Browser cookie, exchanged verbatim with the engine.  `expires` is in
 * seconds since the epoch, -1 for a session cookie.  Extra engine fields
 * survive a save/load round-trip untouched.
 */
export interface Cookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  secure: boolean;
  httpOnly: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
  [extra: string]: unknown;
}

export type UserInfo = Record<string, unknown>;

/** Contents of the metadata artifact (`session_info.json`). */
export interface SessionMetadata {
  /** ISO-8601 UTC. */
  createdAt: string;
  /** Always `createdAt + sessionTimeout`; never extended by activity. */
  expiresAt: string;
  /** Cosmetic; bumped by `touch()`. */
  lastActivityAt: string;
  userInfo: UserInfo;
}

export interface SessionRecord extends SessionMetadata {
  cookies: Cookie[];
}

export type SessionStatusReason = 'active' | 'expired_or_missing' | 'error';

/** Read-only projection returned by `SessionStore.status()`. */
export interface SessionStatus {
  isValid: boolean;
  reason: SessionStatusReason;
  /** Whole seconds until `expiresAt`, 0 when invalid. */
  remainingSeconds: number;
  createdAt: string | null;
  expiresAt: string | null;
  lastActivityAt: string | null;
  userInfo: UserInfo;
}

// ─── Outcomes ──────────────────────────────────────────────

export type LoginField = 'identifier' | 'secret' | 'submit';

export type LoginFailure =
  | { kind: 'ElementNotFound'; field: LoginField }
  | { kind: 'VerificationFailed' }
  | { kind: 'TransportError'; message: string };

export type LoginResult =
  | {
      success: true;
      /** True when the short-circuit fired and no credentials were entered. */
      alreadyAuthenticated: boolean;
      /** False when the post-login save failed (logged as a warning). */
      sessionSaved: boolean;
    }
  | { success: false; error: LoginFailure };

export type NavigationTarget = 'searchSurface' | 'searchInput' | 'result';

export type NavigationFailure =
  | { kind: 'NotFound'; target: NavigationTarget }
  | { kind: 'TransportError'; message: string };

export type NavigationResult = { success: true } | { success: false; error: NavigationFailure };

/** Login state machine states, in the order a full attempt walks them. */
export type AuthState =
  | 'Idle'
  | 'NavigatedToLogin'
  | 'AlreadyAuthenticated'
  | 'CredentialsFilled'
  | 'Submitted'
  | 'Verified';

// ─── Browser capability ────────────────────────────────────

export type PressKey = 'Enter' | 'Tab' | 'Escape';

/**
 * The narrow slice of a browser page the controller relies on.
 *
 * Implementations throw `TransportError` for engine or navigation
 * failures.  `probe` resolves to null when nothing matched within the
 * timeout; it has no side effect on the page.
 */
export interface BrowserPage {
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** Wait until the network has been idle, bounded by `timeoutMs`. */
  waitForSettle(timeoutMs: number): Promise<void>;
  probe(locator: Locator, timeoutMs: number): Promise<ElementRef | null>;
  fill(element: ElementRef, text: string): Promise<void>;
  click(element: ElementRef): Promise<void>;
  press(element: ElementRef, key: PressKey): Promise<void>;
  cookies(): Promise<Cookie[]>;
  setCookies(cookies: Cookie[]): Promise<void>;
  currentUrl(): string;
  title(): Promise<string>;
}

/** A launched browser: the page plus an idempotent teardown. */
export interface BrowserSession {
  page: BrowserPage;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<BrowserSession>;
}
