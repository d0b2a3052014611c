/**
 * Log levels, ordered by verbosity.
 * A record passes a threshold when `record.level <= threshold`; OFF admits nothing.
 */
export enum LogLevel {
  OFF = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
  TRACE = 5,
}

/**
 * Levels a record can carry (OFF is a threshold only)
 */
export type Level =
  | LogLevel.ERROR
  | LogLevel.WARN
  | LogLevel.INFO
  | LogLevel.DEBUG
  | LogLevel.TRACE;

/**
 * Upper-case token printed in the line prefix
 */
export type LevelName = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG' | 'TRACE';

/**
 * A single log call.
 * `message` may be a thunk; it is only rendered once the record is known to pass.
 */
export interface LogRecord {
  level: Level;
  target: string;
  file?: string;
  line?: number;
  message: string | (() => string);
}

/**
 * Call-site details for the convenience emitters
 */
export interface LogSite {
  target?: string;
  file?: string;
  line?: number;
}

/**
 * One of the four console entry points a record can be routed to
 */
export type Channel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Output function for a single channel. Receives a final, display-ready line.
 */
export type Sink = (line: string) => void;

/**
 * Severity-keyed console collaborator
 */
export type ConsoleSinks = Readonly<Record<Channel, Sink>>;

/**
 * Environment collaborator: a bag of bindings or a lookup function that may throw.
 * Only a string value read from the bag's own properties counts as set.
 */
export type EnvSource =
  | Readonly<Record<string, unknown>>
  | ((name: string) => unknown);

export type ColorMode = 'auto' | 'on' | 'off';

/**
 * - 'directives': `target=level` rules with last-declared-wins matching
 * - 'level': a single global threshold
 */
export type FilterMode = 'directives' | 'level';

/**
 * What a second `install()` does besides returning the conflict
 */
export type ConflictPolicy = 'report' | 'log';

/**
 * Logger configuration
 */
export interface LoggerOptions {
  /**
   * Console collaborator. Default: `console.error|warn|info|debug`
   */
  sinks?: ConsoleSinks;
  /**
   * ANSI styling of the level token (default: 'off')
   */
  color?: ColorMode;
  /**
   * Timestamp source for the line prefix. Default: ISO-8601 wall clock
   */
  clock?: () => string;
  /**
   * How the configuration string is interpreted (default: 'directives')
   */
  filterMode?: FilterMode;
  /**
   * 'log' also writes the install conflict at DEBUG through the installed logger (default: 'report')
   */
  conflictPolicy?: ConflictPolicy;
  /**
   * Environment bag for `color: 'auto'` detection; defaults to `process.env`
   */
  env?: Record<string, string | undefined>;
}

/* --------------------------------- Result --------------------------------- */

type Ok<T> = { readonly ok: true; readonly value: T };
type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
