/**
 * authenticator.ts: Login state machine and browser-session owner.
 *
 *   Idle → NavigatedToLogin → AlreadyAuthenticated
 *                           ↘ CredentialsFilled → Submitted → Verified
 *
 * An Authenticator owns exactly one browser session (process, context,
 * page) between `start()` and `close()`.  `login()` walks the state machine
 * once: no retries, and the page is left wherever the last step put it.
 * Callers own the retry policy.
 *
 * Every failure comes back as a value.  Engine and navigation errors thrown
 * by the page become `TransportError` outcomes; nothing thrown below this
 * file reaches the caller.
 */

import type {
  AuthState,
  BrowserLauncher,
  BrowserPage,
  BrowserSession,
  CandidateList,
  Cookie,
  Credentials,
  ElementRef,
  LoginFailure,
  LoginField,
  LoginResult,
} from '../core/types';
import type { AppConfig, TargetSite } from '../core/config';
import { requireTargetSite } from '../core/config';
import { describeError, toTransportError } from '../core/errors';
import { resolveCandidates } from '../middleware';
import { LoginStateDetector } from './loginStateDetector';
import type { SessionStore } from './sessionStore';
import { Logger } from '../core/logger';

const logger = new Logger('Authenticator');

export type TransportFailure = { kind: 'TransportError'; message: string };

export type StartResult = { success: true } | { success: false; error: TransportFailure };

export interface AuthenticatorDeps {
  config: AppConfig;
  launcher: BrowserLauncher;
  sessionStore: SessionStore;
  /** Defaults to one built from `config`. */
  detector?: LoginStateDetector;
}

/** An element step either resolved or ended the attempt. */
type StepOutcome = { element: ElementRef } | { failure: LoginResult };

export class Authenticator {
  private readonly config: AppConfig;
  private readonly target: TargetSite;
  private readonly launcher: BrowserLauncher;
  private readonly sessionStore: SessionStore;
  private readonly detector: LoginStateDetector;

  private session: BrowserSession | null = null;
  private currentState: AuthState = 'Idle';

  constructor(deps: AuthenticatorDeps) {
    this.config = deps.config;
    this.target = requireTargetSite(deps.config);
    this.launcher = deps.launcher;
    this.sessionStore = deps.sessionStore;
    this.detector =
      deps.detector ??
      new LoginStateDetector({
        baseUrl: this.target.baseUrl,
        loginUrl: this.target.loginUrl,
        loginUrlPatterns: this.target.loginUrlPatterns,
        markers: deps.config.locators.loggedInMarkers,
        markerTimeoutMs: deps.config.timeouts.markerMs,
      });
  }

  get state(): AuthState {
    return this.currentState;
  }

  get started(): boolean {
    return this.session !== null;
  }

  // ── Lifecycle ──────────────────────────────────────────

  /**
   * Launch the browser and restore saved cookies, if any.  Calling it on
   * an already-started instance is a no-op.
   */
  async start(): Promise<StartResult> {
    if (this.session) return { success: true };

    try {
      this.session = await this.launcher.launch();
    } catch (err) {
      const error = toTransportError(err, 'Browser launch failed');
      logger.error(error.message, { event: 'browser.start', started: false }, err);
      return { success: false, error: { kind: 'TransportError', message: error.message } };
    }

    const record = this.sessionStore.load();
    if (record) {
      try {
        await this.session.page.setCookies(record.cookies);
        logger.info(`Restored ${record.cookies.length} cookies`, {
          event: 'session.restore',
          expiresAt: record.expiresAt,
        });
      } catch (err) {
        logger.warn(`Could not restore saved cookies: ${describeError(err)}`, { event: 'session.restore' });
      }
    }

    return { success: true };
  }

  /** The page owned by this instance.  Throws if `start()` has not succeeded. */
  getPage(): BrowserPage {
    if (!this.session) {
      throw new Error('Authenticator.start() has not completed');
    }
    return this.session.page;
  }

  /** Release the browser.  Idempotent, and safe after a failed start. */
  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.currentState = 'Idle';
    if (!session) return;

    try {
      await session.close();
    } catch (err) {
      logger.error(`Browser teardown failed: ${describeError(err)}`, { event: 'browser.stop' }, err);
    }
  }

  // ── Login ──────────────────────────────────────────────

  async login(credentials: Credentials): Promise<LoginResult> {
    const page = this.session?.page;
    if (!page) {
      return this.fail({ kind: 'TransportError', message: 'Browser session is not started' });
    }

    const { candidateMs } = this.config.timeouts;
    const { locators } = this.config;
    const settleMs = this.config.scraping.requestTimeout * 1000;

    this.currentState = 'Idle';
    logger.info('Login attempt started', { event: 'login.attempt', loginUrl: this.target.loginUrl });

    try {
      await page.navigate(this.target.loginUrl, settleMs);
      await page.waitForSettle(settleMs);
      this.transition('NavigatedToLogin');

      if (await this.detector.isAuthenticated(page)) {
        this.transition('AlreadyAuthenticated');
        this.sessionStore.touch();
        logger.info('Already logged in, skipping credential entry', {
          event: 'login.success',
          alreadyAuthenticated: true,
        });
        return { success: true, alreadyAuthenticated: true, sessionSaved: false };
      }

      const identifier = await this.locate(page, 'identifier', locators.identifier, candidateMs);
      if ('failure' in identifier) return identifier.failure;
      await page.fill(identifier.element, credentials.identifier);

      const secret = await this.locate(page, 'secret', locators.secret, candidateMs);
      if ('failure' in secret) return secret.failure;
      await page.fill(secret.element, credentials.secret);
      this.transition('CredentialsFilled');

      const submit = await this.locate(page, 'submit', locators.submit, candidateMs);
      if ('failure' in submit) return submit.failure;
      await page.click(submit.element);
      await page.waitForSettle(settleMs);
      this.transition('Submitted');

      const authenticated = await this.detector.isAuthenticated(page);
      this.transition('Verified');
      if (!authenticated) {
        return this.fail({ kind: 'VerificationFailed' });
      }

      const sessionSaved = await this.persistSession(page);
      logger.info('Login succeeded', {
        event: 'login.success',
        alreadyAuthenticated: false,
        sessionSaved,
      });
      return { success: true, alreadyAuthenticated: false, sessionSaved };
    } catch (err) {
      const error = toTransportError(err, 'Login aborted');
      return this.fail({ kind: 'TransportError', message: error.message });
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async locate(
    page: BrowserPage,
    field: LoginField,
    candidates: CandidateList,
    timeoutMs: number,
  ): Promise<StepOutcome> {
    const resolution = await resolveCandidates(page, candidates, timeoutMs);
    if (!resolution.found) {
      return { failure: this.fail({ kind: 'ElementNotFound', field }) };
    }
    return { element: resolution.element };
  }

  /** A failed save is a warning; the login itself still stands. */
  private async persistSession(page: BrowserPage): Promise<boolean> {
    let cookies: Cookie[];
    try {
      cookies = await page.cookies();
    } catch (err) {
      logger.warn(`Could not read cookies after login: ${describeError(err)}`, { event: 'session.save' });
      return false;
    }

    const result = this.sessionStore.save(cookies, {
      baseUrl: this.target.baseUrl,
      landingUrl: page.currentUrl(),
    });
    return result.success;
  }

  private transition(next: AuthState): void {
    const previous = this.currentState;
    this.currentState = next;
    logger.debug(`${previous} → ${next}`, { event: 'login.state', from: previous, to: next });
  }

  private fail(error: LoginFailure): LoginResult {
    logger.warn(describeFailure(error), {
      event: 'login.failure',
      kind: error.kind,
      field: error.kind === 'ElementNotFound' ? error.field : undefined,
      state: this.currentState,
    });
    return { success: false, error };
  }
}

/** One-line, human-readable reason for a login failure. */
export function describeFailure(error: LoginFailure): string {
  switch (error.kind) {
    case 'ElementNotFound':
      return `Login failed: no ${error.field} element matched any candidate`;
    case 'VerificationFailed':
      return 'Login failed: still not authenticated after submitting credentials';
    case 'TransportError':
      return `Login failed: ${error.message}`;
  }
}

// ─── Loan helper ───────────────────────────────────────────

export type SessionRun<T> = { success: true; value: T } | { success: false; error: TransportFailure };

/**
 * Start an Authenticator, hand it to `fn`, and always close it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withAuthenticator<T>(
  deps: AuthenticatorDeps,
  fn: (auth: Authenticator) => Promise<T>,
): Promise<SessionRun<T>> {
  const auth = new Authenticator(deps);
  try {
    const started = await auth.start();
    if (!started.success) return started;
    return { success: true, value: await fn(auth) };
  } finally {
    await auth.close();
  }
}
