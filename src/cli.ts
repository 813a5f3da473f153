#!/usr/bin/env node
/**
 * cli.ts: Command-line entry point.
 *
 *   portal-session [--config <file>] [--debug] <command>
 *
 *   login           log in (or confirm an existing session) and save cookies
 *   search-user     log in, open the search surface, search a key, open the hit
 *   session-status  show validity, timestamps and remaining seconds
 *   clear-session   delete the saved session
 *   test-browser    launch the browser and print the base page's title
 *   config          print the effective configuration (password masked)
 *
 * Exit codes: 0 success, 1 failed operation (reason printed), 2 usage or
 * configuration error.  Nothing is retried here.
 */

import { Command, CommanderError } from 'commander';
import { stringify as stringifyYaml } from 'yaml';
import type { AppConfig } from './core/config';
import { loadConfig, redactConfig, requireTargetSite } from './core/config';
import { ConfigError, describeError, toTransportError } from './core/errors';
import { BrowserManager } from './core/browserManager';
import type { Credentials, SessionStatus } from './core/types';
import {
  NavigationController,
  SessionStore,
  describeFailure,
  describeNavigationFailure,
  withAuthenticator,
} from './agents';
import type { Authenticator, TransportFailure } from './agents';
import { Logger, setLogLevel } from './core/logger';

const logger = new Logger('CLI');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

interface CredentialOptions {
  identifier?: string;
  secret?: string;
}

interface SearchOptions extends CredentialOptions {
  key: string;
}

export type BrowserCheck = { success: true; title: string } | { success: false; error: TransportFailure };

// ─── Helpers ───────────────────────────────────────────────

function createStore(config: AppConfig): SessionStore {
  return new SessionStore({
    dir: config.session.dir,
    sessionTimeoutSeconds: config.auth.sessionTimeout,
  });
}

/** Flags first, then configured credentials (SCRAPING_USERNAME / SCRAPING_PASSWORD). */
export function resolveCredentials(options: CredentialOptions, config: AppConfig): Credentials {
  const identifier = options.identifier ?? config.auth.username;
  const secret = options.secret ?? config.auth.password;
  if (!identifier || !secret) {
    throw new ConfigError('Credentials missing: pass --identifier/--secret or set SCRAPING_USERNAME/SCRAPING_PASSWORD');
  }
  return { identifier, secret };
}

export function formatStatus(status: SessionStatus): string[] {
  if (!status.isValid) {
    return [`✗ Session is not valid: ${status.reason}`];
  }
  return [
    '✓ Session is valid',
    `Created:       ${status.createdAt ?? '-'}`,
    `Expires:       ${status.expiresAt ?? '-'}`,
    `Last activity: ${status.lastActivityAt ?? '-'}`,
    `Remaining:     ${status.remainingSeconds}s`,
  ];
}

function print(lines: string | string[]): void {
  for (const line of Array.isArray(lines) ? lines : [lines]) {
    console.log(line);
  }
}

// ─── Commands ──────────────────────────────────────────────

async function loginCommand(config: AppConfig, options: CredentialOptions): Promise<number> {
  const credentials = resolveCredentials(options, config);
  const run = await withAuthenticator(
    { config, launcher: new BrowserManager(config), sessionStore: createStore(config) },
    (auth) => auth.login(credentials),
  );

  if (!run.success) {
    print(`✗ ${run.error.message}`);
    return EXIT_FAILURE;
  }

  const result = run.value;
  if (!result.success) {
    print(`✗ ${describeFailure(result.error)}`);
    return EXIT_FAILURE;
  }

  print(result.alreadyAuthenticated ? '✓ Already logged in' : '✓ Logged in');
  if (!result.alreadyAuthenticated && !result.sessionSaved) {
    print('! Session could not be saved; the next run will log in again');
  }
  return EXIT_OK;
}

async function searchUser(
  auth: Authenticator,
  config: AppConfig,
  store: SessionStore,
  credentials: Credentials,
  key: string,
): Promise<number> {
  const login = await auth.login(credentials);
  if (!login.success) {
    print(`✗ ${describeFailure(login.error)}`);
    return EXIT_FAILURE;
  }
  print('✓ Logged in');

  const navigation = new NavigationController({ page: auth.getPage(), config, sessionStore: store });
  const steps = [
    { done: 'Opened search', failed: 'Could not open search', run: () => navigation.openSearchSurface() },
    { done: `Searched for "${key}"`, failed: 'Search failed', run: () => navigation.searchByKey(key) },
    { done: `Opened result for "${key}"`, failed: `No result for "${key}"`, run: () => navigation.openResult(key) },
  ];

  for (const step of steps) {
    const result = await step.run();
    if (!result.success) {
      print(`✗ ${step.failed}: ${describeNavigationFailure(result.error)}`);
      return EXIT_FAILURE;
    }
    print(`✓ ${step.done}`);
  }
  return EXIT_OK;
}

async function searchUserCommand(config: AppConfig, options: SearchOptions): Promise<number> {
  const credentials = resolveCredentials(options, config);
  const store = createStore(config);
  const run = await withAuthenticator(
    { config, launcher: new BrowserManager(config), sessionStore: store },
    (auth) => searchUser(auth, config, store, credentials, options.key),
  );

  if (!run.success) {
    print(`✗ ${run.error.message}`);
    return EXIT_FAILURE;
  }
  return run.value;
}

function sessionStatusCommand(config: AppConfig): number {
  const status = createStore(config).status();
  print(formatStatus(status));
  return status.isValid ? EXIT_OK : EXIT_FAILURE;
}

function clearSessionCommand(config: AppConfig): number {
  const result = createStore(config).clear();
  if (!result.success) {
    print(`✗ ${result.error.message}`);
    return EXIT_FAILURE;
  }
  print('✓ Session cleared');
  return EXIT_OK;
}

/** Open the base URL in the authenticator's page and read its title. */
export async function checkBrowser(auth: Authenticator, baseUrl: string, timeoutMs: number): Promise<BrowserCheck> {
  try {
    const page = auth.getPage();
    await page.navigate(baseUrl, timeoutMs);
    return { success: true, title: await page.title() };
  } catch (err) {
    return { success: false, error: { kind: 'TransportError', message: toTransportError(err, 'Browser test').message } };
  }
}

async function testBrowserCommand(config: AppConfig): Promise<number> {
  const { baseUrl } = requireTargetSite(config);
  const timeoutMs = config.scraping.requestTimeout * 1000;

  const run = await withAuthenticator(
    { config, launcher: new BrowserManager(config), sessionStore: createStore(config) },
    (auth) => checkBrowser(auth, baseUrl, timeoutMs),
  );

  const check = run.success ? run.value : run;
  if (!check.success) {
    print(`✗ Browser test failed: ${check.error.message}`);
    return EXIT_FAILURE;
  }
  print(`✓ Browser test passed: ${check.title}`);
  return EXIT_OK;
}

// ─── Program ───────────────────────────────────────────────

/**
 * Parse `argv` and run the selected command.  Resolves to the exit code;
 * only the entry block below touches `process.exitCode`.
 */
export async function main(argv: string[]): Promise<number> {
  let exitCode = EXIT_OK;
  const program = new Command();

  program
    .name('portal-session')
    .description('Authenticated browser session controller')
    .option('-c, --config <file>', 'settings file (default: config/settings.yaml)')
    .option('--debug', 'log at debug level')
    .exitOverride();

  /** Load config once, then hand it to the command body. */
  const withConfig =
    <A extends unknown[]>(body: (config: AppConfig, ...args: A) => number | Promise<number>) =>
    async (...args: A): Promise<void> => {
      const globals = program.opts<GlobalOptions>();
      const config = loadConfig({ configPath: globals.config });
      setLogLevel(globals.debug ? 'debug' : config.logging.level);
      exitCode = await body(config, ...args);
    };

  program
    .command('login')
    .description('log in and save the session')
    .option('--identifier <identifier>', 'login identifier (default: SCRAPING_USERNAME)')
    .option('--secret <secret>', 'login secret (default: SCRAPING_PASSWORD)')
    .action(withConfig((config, options: CredentialOptions) => loginCommand(config, options)));

  program
    .command('search-user')
    .description('log in, search for a key and open the matching result')
    .requiredOption('--key <key>', 'value to search for')
    .option('--identifier <identifier>', 'login identifier (default: SCRAPING_USERNAME)')
    .option('--secret <secret>', 'login secret (default: SCRAPING_PASSWORD)')
    .action(withConfig((config, options: SearchOptions) => searchUserCommand(config, options)));

  program
    .command('session-status')
    .description('show whether a saved session is usable')
    .action(withConfig((config) => sessionStatusCommand(config)));

  program
    .command('clear-session')
    .description('delete the saved session')
    .action(withConfig((config) => clearSessionCommand(config)));

  program
    .command('test-browser')
    .description('launch the browser and open the base URL')
    .action(withConfig((config) => testBrowserCommand(config)));

  program
    .command('config')
    .description('print the effective configuration')
    .action(
      withConfig((config) => {
        print(stringifyYaml(redactConfig(config)).trimEnd());
        return EXIT_OK;
      }),
    );

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    if (err instanceof ConfigError) {
      print(`✗ ${err.message}`);
      return EXIT_USAGE;
    }
    logger.error(`Unexpected error: ${describeError(err)}`, { event: 'cli.crash' }, err);
    return EXIT_FAILURE;
  }
  return exitCode;
}

const isDirectRun = require.main === module;
if (isDirectRun) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('✗ Unexpected failure:', err);
      process.exitCode = EXIT_FAILURE;
    });
}
