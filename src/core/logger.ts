/**
 * logger.ts: Progress logger for the session controller.
 *
 * Every line carries a timestamp, a level and the emitting module, followed
 * by the human-readable message and an optional structured field set:
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [Authenticator] Login succeeded event=login.success alreadyAuthenticated=false
 *
 * The field set is what downstream tooling keys on (`event=…`); the message
 * is for the operator watching the run.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured fields appended to a log line.  Never put credentials here. */
export type LogFields = Record<string, string | number | boolean | null | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

/** Set the process-wide minimum level.  Called once at startup. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Lightweight logger that emits timestamped, context-labelled lines.
 *
 * Usage:
 *   const logger = new Logger('SessionStore');
 *   logger.info('Session saved', { event: 'session.save', cookies: 12 });
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Probe-level detail: each candidate tried, each queue hand-off. */
  debug(message: string, fields?: LogFields): void {
    this.emit('debug', message, fields);
  }

  /** Routine progress: browser started, login succeeded, session saved. */
  info(message: string, fields?: LogFields): void {
    this.emit('info', message, fields);
  }

  /** Something unexpected but non-fatal: session save failed, cookie blob unreadable. */
  warn(message: string, fields?: LogFields): void {
    this.emit('warn', message, fields);
  }

  /** A hard failure: browser crash, navigation error. */
  error(message: string, fields?: LogFields, err?: unknown): void {
    this.emit('error', message, fields);
    if (err && isEnabled('debug')) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (!isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}${formatFields(fields)}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Render fields as ` key=value` pairs.  Values containing whitespace or
 * quotes are JSON-quoted; undefined values are dropped.
 */
export function formatFields(fields?: LogFields): string {
  if (!fields) return '';

  let out = '';
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const raw = String(value);
    out += ` ${key}=${/[\s"=]/.test(raw) ? JSON.stringify(raw) : raw}`;
  }
  return out;
}
