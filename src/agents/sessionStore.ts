/**
 * sessionStore.ts: Cookie persistence with a fixed-window expiry.
 *
 * A saved session is two files in the session directory:
 *
 *   cookies.json        the cookie list, exactly as the browser gave it
 *   session_info.json   { createdAt, expiresAt, lastActivityAt, userInfo }
 *
 * The metadata file is the only thing that decides whether a usable session
 * exists.  A cookie file on its own (a save that died half-way, a manual
 * delete) is treated as absent.
 *
 * `expiresAt` is fixed when the session is saved and is never moved by
 * activity; `touch()` only bumps `lastActivityAt`.
 *
 * I/O is synchronous and assumes one writer.  Two processes sharing a
 * directory race on save/load and the last write wins.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { Cookie, SessionMetadata, SessionRecord, SessionStatus, UserInfo } from '../core/types';
import { PersistenceIOError, describeError } from '../core/errors';
import { Logger } from '../core/logger';

const logger = new Logger('SessionStore');

export const COOKIES_FILE = 'cookies.json';
export const METADATA_FILE = 'session_info.json';

// ─── On-disk schemas ───────────────────────────────────────

const isoTimestamp = z
  .string()
  .refine((value) => DateTime.fromISO(value).isValid, { message: 'not an ISO-8601 timestamp' });

const metadataSchema = z.object({
  createdAt: isoTimestamp,
  expiresAt: isoTimestamp,
  lastActivityAt: isoTimestamp,
  userInfo: z.record(z.unknown()).default({}),
});

const cookieSchema = z
  .object({
    name: z.string(),
    value: z.string(),
    domain: z.string(),
    path: z.string(),
    expires: z.number(),
    secure: z.boolean(),
    httpOnly: z.boolean(),
    sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
  })
  .passthrough();

const cookieListSchema = z.array(cookieSchema);

// ─── Types ─────────────────────────────────────────────────

export interface SessionStoreOptions {
  dir: string;
  /** Length of the fixed session window, in seconds. */
  sessionTimeoutSeconds: number;
  /** Injected for tests. */
  clock?: () => DateTime;
}

export type SaveResult = { success: true; record: SessionRecord } | { success: false; error: PersistenceIOError };

export type ClearResult = { success: true } | { success: false; error: PersistenceIOError };

type MetadataRead =
  | { state: 'missing' }
  | { state: 'unreadable'; reason: string }
  | { state: 'malformed'; reason: string }
  | { state: 'expired'; metadata: SessionMetadata }
  | { state: 'valid'; metadata: SessionMetadata; expiresAt: DateTime };

// ─── Store ─────────────────────────────────────────────────

export class SessionStore {
  readonly cookiesPath: string;
  readonly metadataPath: string;
  private readonly clock: () => DateTime;

  constructor(private readonly options: SessionStoreOptions) {
    this.cookiesPath = join(options.dir, COOKIES_FILE);
    this.metadataPath = join(options.dir, METADATA_FILE);
    this.clock = options.clock ?? (() => DateTime.utc());
  }

  /**
   * Replace the saved session.  The old metadata is removed first and the
   * new metadata is written last, so there is never a moment where fresh
   * cookies sit next to stale metadata or the reverse.
   */
  save(cookies: Cookie[], userInfo: UserInfo = {}): SaveResult {
    const now = this.clock();
    const metadata: SessionMetadata = {
      createdAt: toIso(now),
      expiresAt: toIso(now.plus({ seconds: this.options.sessionTimeoutSeconds })),
      lastActivityAt: toIso(now),
      userInfo,
    };

    try {
      mkdirSync(this.options.dir, { recursive: true });
      rmSync(this.metadataPath, { force: true });
      writeJsonAtomic(this.cookiesPath, cookies);
      writeJsonAtomic(this.metadataPath, metadata);
    } catch (err) {
      const error = new PersistenceIOError(`Saving session failed: ${describeError(err)}`, this.options.dir, {
        cause: err,
      });
      logger.warn(error.message, { event: 'session.save', saved: false });
      return { success: false, error };
    }

    logger.info(`Saved ${cookies.length} cookies`, {
      event: 'session.save',
      saved: true,
      expiresAt: metadata.expiresAt,
    });
    return { success: true, record: { ...metadata, cookies } };
  }

  /**
   * The saved session, or null when there is none to use.  Missing,
   * expired, malformed and unreadable all come back as null: to the caller
   * each just means "log in again".
   */
  load(): SessionRecord | null {
    const read = this.readMetadata();

    switch (read.state) {
      case 'missing':
        logger.debug('No saved session', { event: 'session.load', found: false });
        return null;
      case 'unreadable':
      case 'malformed':
        logger.warn(`Ignoring saved session: ${read.reason}`, { event: 'session.load', found: false });
        return null;
      case 'expired':
        logger.info('Saved session has expired', {
          event: 'session.expired',
          expiresAt: read.metadata.expiresAt,
        });
        return null;
      case 'valid':
        break;
    }

    let cookies: Cookie[];
    try {
      cookies = this.readCookies();
    } catch (err) {
      logger.warn(`Ignoring saved session: ${describeError(err)}`, { event: 'session.load', found: false });
      return null;
    }

    logger.info(`Loaded ${cookies.length} saved cookies`, {
      event: 'session.load',
      found: true,
      expiresAt: read.metadata.expiresAt,
    });
    return { ...read.metadata, cookies };
  }

  /**
   * Bump `lastActivityAt`.  `expiresAt` stays where `save()` put it.
   * Returns false when there is no valid session to touch.
   */
  touch(): boolean {
    const read = this.readMetadata();
    if (read.state !== 'valid') return false;

    try {
      writeJsonAtomic(this.metadataPath, { ...read.metadata, lastActivityAt: toIso(this.clock()) });
      return true;
    } catch (err) {
      logger.warn(`Could not update last activity: ${describeError(err)}`, { event: 'session.touch' });
      return false;
    }
  }

  /** Remove both artifacts.  Nothing to remove is not an error. */
  clear(): ClearResult {
    try {
      rmSync(this.metadataPath, { force: true });
      rmSync(this.cookiesPath, { force: true });
    } catch (err) {
      const error = new PersistenceIOError(`Clearing session failed: ${describeError(err)}`, this.options.dir, {
        cause: err,
      });
      logger.warn(error.message, { event: 'session.clear', cleared: false });
      return { success: false, error };
    }

    logger.info('Session cleared', { event: 'session.clear', cleared: true });
    return { success: true };
  }

  /** Read-only view of the saved session.  Never touches `lastActivityAt`. */
  status(): SessionStatus {
    const read = this.readMetadata();

    if (read.state !== 'valid') {
      return {
        isValid: false,
        reason: read.state === 'unreadable' ? 'error' : 'expired_or_missing',
        remainingSeconds: 0,
        createdAt: null,
        expiresAt: null,
        lastActivityAt: null,
        userInfo: {},
      };
    }

    const remaining = read.expiresAt.diff(this.clock(), 'seconds').seconds;
    return {
      isValid: true,
      reason: 'active',
      remainingSeconds: Math.max(0, Math.floor(remaining)),
      createdAt: read.metadata.createdAt,
      expiresAt: read.metadata.expiresAt,
      lastActivityAt: read.metadata.lastActivityAt,
      userInfo: read.metadata.userInfo,
    };
  }

  // ── Internals ──────────────────────────────────────────

  private readMetadata(): MetadataRead {
    let raw: string;
    try {
      raw = readFileSync(this.metadataPath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return { state: 'missing' };
      return { state: 'unreadable', reason: describeError(err) };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      return { state: 'malformed', reason: `${METADATA_FILE} is not JSON (${describeError(err)})` };
    }

    const parsed = metadataSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      return { state: 'malformed', reason: `${METADATA_FILE}: ${first.path.join('.')} ${first.message}` };
    }

    const metadata = parsed.data;
    const expiresAt = DateTime.fromISO(metadata.expiresAt);
    if (this.clock().toMillis() > expiresAt.toMillis()) {
      return { state: 'expired', metadata };
    }
    return { state: 'valid', metadata, expiresAt };
  }

  /** A missing cookie file next to valid metadata reads as no cookies. */
  private readCookies(): Cookie[] {
    let raw: string;
    try {
      raw = readFileSync(this.cookiesPath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new PersistenceIOError(`Reading ${COOKIES_FILE} failed: ${describeError(err)}`, this.cookiesPath, {
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceIOError(`${COOKIES_FILE} is not JSON (${describeError(err)})`, this.cookiesPath, {
        cause: err,
      });
    }

    const parsed = cookieListSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceIOError(`${COOKIES_FILE} does not hold a cookie list`, this.cookiesPath);
    }
    return parsed.data;
  }
}

// ─── Helpers ───────────────────────────────────────────────

function toIso(dt: DateTime): string {
  const iso = dt.toUTC().toISO();
  if (iso === null) {
    throw new RangeError(`Invalid timestamp: ${dt.invalidExplanation ?? 'unknown reason'}`);
  }
  return iso;
}

/** Write to a sibling temp file, then rename over the target. */
function writeJsonAtomic(path: string, data: unknown): void {
  const tmp = `${path}.${process.pid}.tmp`;
  writeFileSync(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  renameSync(tmp, path);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
