/**
 * log-gate: routes log records to console.error/warn/info/debug
 * behind a `target=level` directive filter.
 */

import { LogLevel } from './types';
import type { EnvSource, LoggerOptions, Result } from './types';
import { LoggerFacade } from './logger';
import { defaultRegistry } from './registry';
import type { LoggerRegistry } from './registry';
import type { LogGateError } from './errors';

export { LoggerFacade } from './logger';
export { FilterEngine, parseSpec, DEFAULT_LEVEL } from './filter';
export type { Directive, ParsedSpec } from './filter';
export { LoggerRegistry, createRegistry, defaultRegistry, INTERNAL_TARGET } from './registry';
export type { InstallableLogger, ScopedLog } from './registry';
export { consoleSinks, MemorySink } from './sinks';
export type { CapturedLine } from './sinks';
export { createLineFormatter, isoClock, resolveTarget } from './format';
export type { LineFormatter } from './format';
export { parseLevel, levelName } from './level';
export { LogGateError, EnvLookupError, AlreadyInstalledError } from './errors';
export { LogLevel, ok, err } from './types';
export type {
  Level,
  LevelName,
  LogRecord,
  LogSite,
  Channel,
  Sink,
  ConsoleSinks,
  EnvSource,
  ColorMode,
  FilterMode,
  ConflictPolicy,
  LoggerOptions,
  Result,
} from './types';

export interface InitOptions extends LoggerOptions {
  /** Registry to install into. Default: the process-wide one */
  registry?: LoggerRegistry;
}

/**
 * Build a logger from a filter spec (e.g. `"info,db=debug"`) and install it.
 */
export function initWithString(spec: string, options: InitOptions = {}): Result<void, LogGateError> {
  const { registry = defaultRegistry, ...rest } = options;
  return new LoggerFacade(spec, rest).install(registry);
}

/**
 * Build a logger that admits `level` and everything less verbose, and install it.
 */
export function initWithLevel(level: LogLevel, options: InitOptions = {}): Result<void, LogGateError> {
  const { registry = defaultRegistry, ...rest } = options;
  return LoggerFacade.fromLevel(level, rest).install(registry);
}

/**
 * Build a logger from the environment variable `name` and install it.
 * Nothing is installed when the variable cannot be read.
 */
export function initWithEnv(
  env: EnvSource,
  name: string,
  options: InitOptions = {}
): Result<void, LogGateError> {
  const { registry = defaultRegistry, ...rest } = options;
  const facade = LoggerFacade.fromEnv(env, name, rest);
  return facade.ok ? facade.value.install(registry) : facade;
}

/* ------------------------- Process-wide emitters ------------------------- */

export const error = defaultRegistry.error.bind(defaultRegistry);
export const warn = defaultRegistry.warn.bind(defaultRegistry);
export const info = defaultRegistry.info.bind(defaultRegistry);
export const debug = defaultRegistry.debug.bind(defaultRegistry);
export const trace = defaultRegistry.trace.bind(defaultRegistry);
export const log = defaultRegistry.log.bind(defaultRegistry);
export const enabled = defaultRegistry.enabled.bind(defaultRegistry);
export const scoped = defaultRegistry.scoped.bind(defaultRegistry);

// Default export
export default {
  initWithString,
  initWithLevel,
  initWithEnv,
  LogLevel,
};
