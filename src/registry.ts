import { LogLevel, err, ok } from './types';
import type { ConflictPolicy, Level, LogRecord, LogSite, Result } from './types';
import { AlreadyInstalledError } from './errors';

/**
 * What the registry needs from an installed logger
 */
export interface InstallableLogger {
  readonly conflictPolicy: ConflictPolicy;
  effectiveMaxLevel(): LogLevel;
  enabled(target: string, level: Level): boolean;
  log(record: LogRecord): void;
  flush(): void;
}

type Message = LogRecord['message'];

/**
 * Level emitters bound to a target
 */
export interface ScopedLog {
  readonly target: string;
  error(message: Message, site?: Omit<LogSite, 'target'>): void;
  warn(message: Message, site?: Omit<LogSite, 'target'>): void;
  info(message: Message, site?: Omit<LogSite, 'target'>): void;
  debug(message: Message, site?: Omit<LogSite, 'target'>): void;
  trace(message: Message, site?: Omit<LogSite, 'target'>): void;
}

/** Target used for the registry's own records. */
export const INTERNAL_TARGET = 'log-gate';

/**
 * Single-assignment slot for the process sink, and the dispatcher every log call goes through.
 * Uninstalled until the first successful `install()`; installed for good after that.
 */
export class LoggerRegistry {
  private installed?: InstallableLogger;

  /**
   * Compare-and-set once. The first caller wins; later callers get the conflict
   * and the installed logger stays in place.
   */
  install(logger: InstallableLogger): Result<void, AlreadyInstalledError> {
    const current = this.installed;
    if (current === undefined) {
      this.installed = logger;
      return ok(undefined);
    }

    const conflict = new AlreadyInstalledError();
    if (logger.conflictPolicy === 'log') {
      current.log({
        level: LogLevel.DEBUG,
        target: INTERNAL_TARGET,
        message: `install ignored: ${conflict.message}`,
      });
    }
    return err(conflict);
  }

  isInstalled(): boolean {
    return this.installed !== undefined;
  }

  logger(): InstallableLogger | undefined {
    return this.installed;
  }

  /** Cheap gate: OFF while nothing is installed. */
  maxLevel(): LogLevel {
    return this.installed ? this.installed.effectiveMaxLevel() : LogLevel.OFF;
  }

  enabled(target: string, level: Level): boolean {
    const logger = this.installed;
    if (!logger || level > logger.effectiveMaxLevel()) return false;
    return logger.enabled(target, level);
  }

  log(record: LogRecord): void {
    const logger = this.installed;
    if (!logger || record.level > logger.effectiveMaxLevel()) return;
    logger.log(record);
  }

  flush(): void {
    this.installed?.flush();
  }

  error(message: Message, site?: LogSite): void {
    this.emit(LogLevel.ERROR, message, site);
  }

  warn(message: Message, site?: LogSite): void {
    this.emit(LogLevel.WARN, message, site);
  }

  info(message: Message, site?: LogSite): void {
    this.emit(LogLevel.INFO, message, site);
  }

  debug(message: Message, site?: LogSite): void {
    this.emit(LogLevel.DEBUG, message, site);
  }

  trace(message: Message, site?: LogSite): void {
    this.emit(LogLevel.TRACE, message, site);
  }

  /**
   * Emitters stamped with `target`; they share this registry's installed logger.
   */
  scoped(target: string): ScopedLog {
    return {
      target,
      error: (message, site) => this.emit(LogLevel.ERROR, message, { ...site, target }),
      warn: (message, site) => this.emit(LogLevel.WARN, message, { ...site, target }),
      info: (message, site) => this.emit(LogLevel.INFO, message, { ...site, target }),
      debug: (message, site) => this.emit(LogLevel.DEBUG, message, { ...site, target }),
      trace: (message, site) => this.emit(LogLevel.TRACE, message, { ...site, target }),
    };
  }

  private emit(level: Level, message: Message, site?: LogSite): void {
    const logger = this.installed;
    if (!logger || level > logger.effectiveMaxLevel()) return;

    const record: LogRecord = { level, target: site?.target ?? '', message };
    if (site?.file !== undefined) record.file = site.file;
    if (site?.line !== undefined) record.line = site.line;
    logger.log(record);
  }
}

export function createRegistry(): LoggerRegistry {
  return new LoggerRegistry();
}

/** Process-wide registry used when no other is given. */
export const defaultRegistry = createRegistry();
