import { LogLevel } from './types';
import type { Level, LevelName } from './types';

/**
 * Resolve a level keyword into a `LogLevel`.
 * Accepts 'off'|'error'|'warn'|'info'|'debug'|'trace' in any case, surrounding spaces ignored.
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function parseLevel(s: string): LogLevel | undefined {
    switch (s.trim().toUpperCase())
    {
        case 'OFF':   return LogLevel.OFF;
        case 'ERROR': return LogLevel.ERROR;
        case 'WARN':  return LogLevel.WARN;
        case 'INFO':  return LogLevel.INFO;
        case 'DEBUG': return LogLevel.DEBUG;
        case 'TRACE': return LogLevel.TRACE;
    }
    return undefined;
}

export function levelName(level: Level): LevelName {
    switch (level) {
        case LogLevel.ERROR: return 'ERROR';
        case LogLevel.WARN:  return 'WARN';
        case LogLevel.INFO:  return 'INFO';
        case LogLevel.DEBUG: return 'DEBUG';
        case LogLevel.TRACE: return 'TRACE';
    }
}

/** Keyword accepted by `parseLevel`, for building a spec out of a level. */
export function levelKeyword(level: LogLevel): string {
    return level === LogLevel.OFF ? 'off' : levelName(level).toLowerCase();
}
