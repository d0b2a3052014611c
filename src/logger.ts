import { LogLevel, err, ok } from './types';
import type {
  ConflictPolicy,
  ConsoleSinks,
  EnvSource,
  Level,
  LogRecord,
  LoggerOptions,
  Result,
} from './types';
import { FilterEngine } from './filter';
import { createLineFormatter, resolveTarget, shouldColor } from './format';
import type { LineFormatter } from './format';
import { consoleSinks } from './sinks';
import { defaultRegistry } from './registry';
import type { InstallableLogger, LoggerRegistry } from './registry';
import { EnvLookupError } from './errors';
import type { AlreadyInstalledError } from './errors';
import { levelKeyword } from './level';

function lookupEnv(env: EnvSource, name: string): Result<string, EnvLookupError> {
  let value: unknown;
  try {
    value = typeof env === 'function' ? env(name) : Object.hasOwn(env, name) ? env[name] : undefined;
  } catch (cause) {
    return err(new EnvLookupError(name, { cause }));
  }
  return typeof value === 'string' ? ok(value) : err(new EnvLookupError(name));
}

/**
 * Console logger behind a directive filter.
 * Formats each passing record as one line and hands it to the channel for its level.
 */
export class LoggerFacade implements InstallableLogger {
  readonly filter: FilterEngine;
  readonly conflictPolicy: ConflictPolicy;
  private readonly sinks: ConsoleSinks;
  private readonly format: LineFormatter;

  /**
   * Never fails: unusable pieces of `spec` are dropped by the filter.
   */
  constructor(spec: string, options: LoggerOptions = {}) {
    this.filter = FilterEngine.build(spec, options.filterMode ?? 'directives');
    this.conflictPolicy = options.conflictPolicy ?? 'report';
    this.sinks = options.sinks ?? consoleSinks();
    this.format = createLineFormatter(shouldColor(options.color ?? 'off', options.env), options.clock);
  }

  static fromLevel(level: LogLevel, options?: LoggerOptions): LoggerFacade {
    return new LoggerFacade(levelKeyword(level), options);
  }

  /**
   * Build from the value of environment variable `name`.
   * Fails only when the variable cannot be read.
   */
  static fromEnv(
    env: EnvSource,
    name: string,
    options?: LoggerOptions
  ): Result<LoggerFacade, EnvLookupError> {
    const value = lookupEnv(env, name);
    return value.ok ? ok(new LoggerFacade(value.value, options)) : value;
  }

  /**
   * Register as the sink of `registry`. A registry that already has a logger keeps it.
   */
  install(registry: LoggerRegistry = defaultRegistry): Result<void, AlreadyInstalledError> {
    return registry.install(this);
  }

  effectiveMaxLevel(): LogLevel {
    return this.filter.effectiveMaxLevel();
  }

  enabled(target: string, level: Level): boolean {
    return this.filter.enabled(target, level);
  }

  log(record: LogRecord): void {
    // Callers may reach a facade without going through a registry
    if (!this.filter.matches(record)) return;

    const message = typeof record.message === 'function' ? record.message() : record.message;
    const line = this.format(record.level, resolveTarget(record), message);
    switch (record.level) {
      case LogLevel.ERROR:
        this.sinks.error(line);
        break;
      case LogLevel.WARN:
        this.sinks.warn(line);
        break;
      case LogLevel.DEBUG:
        this.sinks.debug(line);
        break;
      case LogLevel.INFO:
      case LogLevel.TRACE:
        this.sinks.info(line);
        break;
    }
  }

  /** Alias of `log`. */
  emit(record: LogRecord): void {
    this.log(record);
  }

  /** Console output is unbuffered. */
  flush(): void {}
}
