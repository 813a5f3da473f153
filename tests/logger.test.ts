import { Logger, formatFields, getLogLevel, setLogLevel } from '../src/core/logger';

describe('formatFields', () => {
  it('renders key=value pairs in insertion order', () => {
    expect(formatFields({ event: 'login.success', attempts: 2, alreadyAuthenticated: false })).toBe(
      ' event=login.success attempts=2 alreadyAuthenticated=false',
    );
  });

  it('drops undefined values and keeps null', () => {
    expect(formatFields({ event: 'login.failure', field: undefined, url: null })).toBe(' event=login.failure url=null');
  });

  it('quotes values with spaces, quotes or equals signs', () => {
    expect(formatFields({ title: 'My page', selector: 'a[href="x"]', query: 'q=1' })).toBe(
      ' title="My page" selector="a[href=\\"x\\"]" query="q=1"',
    );
  });

  it('renders nothing without fields', () => {
    expect(formatFields()).toBe('');
    expect(formatFields({})).toBe('');
  });
});

describe('Logger', () => {
  const initial = getLogLevel();
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    setLogLevel(initial);
  });

  it('drops lines below the threshold', () => {
    setLogLevel('warn');
    const logger = new Logger('SessionStore');

    logger.info('Session saved');
    logger.warn('Session save failed', { event: 'session.save' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN \] \[SessionStore\] Session save failed event=session\.save$/,
    );
  });

  it('writes debug lines to stdout once enabled', () => {
    setLogLevel('debug');

    new Logger('CandidateResolver').debug('Candidate missed', { attempt: 1 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/\[DEBUG\] \[CandidateResolver\] Candidate missed attempt=1$/);
  });
});
