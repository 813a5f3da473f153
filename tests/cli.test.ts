import { existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, checkBrowser, formatStatus, main, resolveCredentials } from '../src/cli';
import { Authenticator } from '../src/agents/authenticator';
import { SessionStore } from '../src/agents/sessionStore';
import { buildConfig } from '../src/core/config';
import { ConfigError, TransportError } from '../src/core/errors';
import { getLogLevel, setLogLevel } from '../src/core/logger';
import { FakeLauncher, FakePage } from './mocks/fake-page';
import { BASE_URL, SESSION_COOKIE, tempDir, testConfig } from './test-utils';

const CREDENTIAL_VARS = ['SCRAPING_USERNAME', 'SCRAPING_PASSWORD', 'SESSION_DIR', 'PORTAL_CONFIG'] as const;

describe('formatStatus', () => {
  it('prints the reason for an unusable session', () => {
    expect(
      formatStatus({
        isValid: false,
        reason: 'expired_or_missing',
        remainingSeconds: 0,
        createdAt: null,
        expiresAt: null,
        lastActivityAt: null,
        userInfo: {},
      }),
    ).toEqual(['✗ Session is not valid: expired_or_missing']);
  });

  it('prints timestamps and remaining time for an active session', () => {
    expect(
      formatStatus({
        isValid: true,
        reason: 'active',
        remainingSeconds: 3000,
        createdAt: '2026-03-01T10:00:00.000Z',
        expiresAt: '2026-03-01T11:00:00.000Z',
        lastActivityAt: '2026-03-01T10:05:00.000Z',
        userInfo: {},
      }),
    ).toEqual([
      '✓ Session is valid',
      'Created:       2026-03-01T10:00:00.000Z',
      'Expires:       2026-03-01T11:00:00.000Z',
      'Last activity: 2026-03-01T10:05:00.000Z',
      'Remaining:     3000s',
    ]);
  });
});

describe('resolveCredentials', () => {
  const config = buildConfig({ auth: { username: 'user@example.test', password: 'test-secret' } });

  it('prefers flags over configured credentials', () => {
    expect(resolveCredentials({ identifier: 'other@example.test' }, config)).toEqual({
      identifier: 'other@example.test',
      secret: 'test-secret',
    });
  });

  it('fails when neither source has a secret', () => {
    expect(() => resolveCredentials({ identifier: 'other@example.test' }, buildConfig({}))).toThrow(ConfigError);
  });
});

describe('checkBrowser', () => {
  async function started(page: FakePage): Promise<Authenticator> {
    const auth = new Authenticator({
      config: testConfig(),
      launcher: new FakeLauncher(page),
      sessionStore: new SessionStore({ dir: tempDir(), sessionTimeoutSeconds: 3600 }),
    });
    await auth.start();
    return auth;
  }

  it('returns the title of the base page', async () => {
    const page = new FakePage();
    page.pageTitle = 'Portal Home';

    await expect(checkBrowser(await started(page), BASE_URL, 1000)).resolves.toEqual({
      success: true,
      title: 'Portal Home',
    });
    expect(page.navigations).toEqual([BASE_URL]);
  });

  it('returns a navigation failure instead of throwing', async () => {
    const page = new FakePage();
    page.failures.navigate = new TransportError('net::ERR_NAME_NOT_RESOLVED');

    await expect(checkBrowser(await started(page), BASE_URL, 1000)).resolves.toEqual({
      success: false,
      error: { kind: 'TransportError', message: 'net::ERR_NAME_NOT_RESOLVED' },
    });
  });

  it('wraps other errors with the step name', async () => {
    const page = new FakePage();
    page.failures.navigate = new Error('socket hang up');

    await expect(checkBrowser(await started(page), BASE_URL, 1000)).resolves.toEqual({
      success: false,
      error: { kind: 'TransportError', message: 'Browser test: socket hang up' },
    });
  });
});

describe('main', () => {
  const savedEnv: Partial<Record<(typeof CREDENTIAL_VARS)[number], string>> = {};
  const initialLevel = getLogLevel();
  let dir: string;
  let settings: string;
  let output: string[];

  beforeEach(() => {
    for (const name of CREDENTIAL_VARS) {
      savedEnv[name] = process.env[name];
      delete process.env[name];
    }
    dir = join(tempDir(), 'session');
    settings = join(tempDir(), 'settings.yaml');
    writeFileSync(
      settings,
      [
        'targetSite:',
        '  baseUrl: https://portal.test',
        'auth:',
        '  password: test-secret',
        'session:',
        `  dir: ${JSON.stringify(dir)}`,
        'logging:',
        '  level: error',
        '',
      ].join('\n'),
    );
    output = [];
    jest.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    setLogLevel(initialLevel);
    for (const name of CREDENTIAL_VARS) {
      const value = savedEnv[name];
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
  });

  const run = (...args: string[]) => main(['node', 'portal-session', '--config', settings, ...args]);

  it('exits 1 from session-status when nothing is saved', async () => {
    await expect(run('session-status')).resolves.toBe(EXIT_FAILURE);
    expect(output).toEqual(['✗ Session is not valid: expired_or_missing']);
  });

  it('exits 0 from session-status for a saved session', async () => {
    new SessionStore({ dir, sessionTimeoutSeconds: 3600 }).save([SESSION_COOKIE]);

    await expect(run('session-status')).resolves.toBe(EXIT_OK);
    expect(output[0]).toBe('✓ Session is valid');
  });

  it('clears the saved session', async () => {
    const store = new SessionStore({ dir, sessionTimeoutSeconds: 3600 });
    store.save([SESSION_COOKIE]);

    await expect(run('clear-session')).resolves.toBe(EXIT_OK);
    expect(output).toEqual(['✓ Session cleared']);
    expect(existsSync(store.metadataPath)).toBe(false);
    expect(existsSync(store.cookiesPath)).toBe(false);
  });

  it('prints the configuration with the password masked', async () => {
    await expect(run('config')).resolves.toBe(EXIT_OK);

    expect(output).toHaveLength(1);
    expect(output[0]).toContain('baseUrl: https://portal.test');
    expect(output[0]).toContain('********');
    expect(output[0]).not.toContain('test-secret');
  });

  it('exits 2 when login has no identifier to use', async () => {
    await expect(run('login')).resolves.toBe(EXIT_USAGE);
    expect(output).toEqual([
      '✗ Credentials missing: pass --identifier/--secret or set SCRAPING_USERNAME/SCRAPING_PASSWORD',
    ]);
  });

  it('exits 2 when the settings file does not exist', async () => {
    const missing = join(tempDir(), 'missing.yaml');

    await expect(main(['node', 'portal-session', '--config', missing, 'session-status'])).resolves.toBe(EXIT_USAGE);
    expect(output).toEqual([`✗ Settings file not found: ${missing}`]);
  });

  it('exits 2 on an unknown command', async () => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await expect(run('logn')).resolves.toBe(EXIT_USAGE);
  });
});
