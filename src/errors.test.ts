import { describe, expect, it } from 'vitest';
import { AlreadyInstalledError, EnvLookupError, LogGateError } from './errors';

describe('LogGateError hierarchy', () => {
  it('LogGateError is an Error with code', () => {
    const err = new LogGateError('test', 'TEST_ERROR');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('LogGateError');
    expect(err.code).toBe('TEST_ERROR');
    expect(err.message).toBe('test');
  });

  it('domain errors have correct codes and extend LogGateError', () => {
    const lookup = new EnvLookupError('LOG');
    expect(lookup).toBeInstanceOf(LogGateError);
    expect(lookup.code).toBe('ENV_LOOKUP');
    expect(lookup.name).toBe('EnvLookupError');
    expect(lookup.variable).toBe('LOG');
    expect(lookup.message).toBe('environment variable "LOG" could not be read');

    const installed = new AlreadyInstalledError();
    expect(installed).toBeInstanceOf(LogGateError);
    expect(installed.code).toBe('ALREADY_INSTALLED');
    expect(installed.name).toBe('AlreadyInstalledError');
  });

  it('preserves cause chain', () => {
    const cause = new Error('original');
    const err = new EnvLookupError('LOG', { cause });
    expect(err.cause).toBe(cause);
  });
});
