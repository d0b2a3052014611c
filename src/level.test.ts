import { describe, expect, it } from 'vitest';
import { levelKeyword, levelName, parseLevel } from './level';
import { LogLevel } from './types';

describe('parseLevel', () => {
  it('accepts every keyword in any case', () => {
    expect(parseLevel('off')).toBe(LogLevel.OFF);
    expect(parseLevel('Error')).toBe(LogLevel.ERROR);
    expect(parseLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLevel(' info ')).toBe(LogLevel.INFO);
    expect(parseLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLevel('tRaCe')).toBe(LogLevel.TRACE);
  });

  it('rejects anything else', () => {
    expect(parseLevel('warning')).toBeUndefined();
    expect(parseLevel('3')).toBeUndefined();
    expect(parseLevel('')).toBeUndefined();
  });
});

describe('levelName / levelKeyword', () => {
  it('prints upper-case tokens', () => {
    expect(levelName(LogLevel.TRACE)).toBe('TRACE');
    expect(levelName(LogLevel.WARN)).toBe('WARN');
  });

  it('round-trips through parseLevel', () => {
    for (const level of [LogLevel.OFF, LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG, LogLevel.TRACE]) {
      expect(parseLevel(levelKeyword(level))).toBe(level);
    }
  });
});
