import { describe, expect, it, vi } from 'vitest';
import { consoleSinks, MemorySink } from './sinks';

describe('consoleSinks', () => {
  it('maps each channel to the console method of the same name', () => {
    const spies = {
      error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => undefined),
      info: vi.spyOn(console, 'info').mockImplementation(() => undefined),
      debug: vi.spyOn(console, 'debug').mockImplementation(() => undefined),
    };
    const sinks = consoleSinks();

    sinks.error('e');
    sinks.warn('w');
    sinks.info('i');
    sinks.debug('d');

    expect(spies.error).toHaveBeenCalledWith('e');
    expect(spies.warn).toHaveBeenCalledWith('w');
    expect(spies.info).toHaveBeenCalledWith('i');
    expect(spies.debug).toHaveBeenCalledWith('d');
  });
});

describe('MemorySink', () => {
  it('records lines per channel in order', () => {
    const sink = new MemorySink();
    sink.info('a');
    sink.error('b');
    sink.info('c');
    expect(sink.on('info')).toEqual(['a', 'c']);
    expect(sink.on('warn')).toEqual([]);
    expect(sink.lines).toHaveLength(3);
  });

  it('clear drops everything captured', () => {
    const sink = new MemorySink();
    sink.debug('x');
    sink.clear();
    expect(sink.lines).toEqual([]);
  });
});
