import type { Channel, ConsoleSinks } from './types';

/**
 * Console sinks that write to console.* (Node/Browser compatible)
 */
export function consoleSinks(): ConsoleSinks {
  return {
    error: (line) => console.error(line),
    warn: (line) => console.warn(line),
    info: (line) => console.info(line),
    debug: (line) => console.debug(line),
  };
}

export interface CapturedLine {
  channel: Channel;
  line: string;
}

/**
 * Memory sink for testing or buffering logs
 */
export class MemorySink implements ConsoleSinks {
  public lines: CapturedLine[] = [];

  readonly error = (line: string): void => this.push('error', line);
  readonly warn = (line: string): void => this.push('warn', line);
  readonly info = (line: string): void => this.push('info', line);
  readonly debug = (line: string): void => this.push('debug', line);

  private push(channel: Channel, line: string): void {
    this.lines.push({ channel, line });
  }

  clear(): void {
    this.lines = [];
  }

  /** Lines written to one channel, in order. */
  on(channel: Channel): string[] {
    return this.lines.filter((l) => l.channel === channel).map((l) => l.line);
  }
}
