import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, ValidationError } from '@sizinglab/utils';
import { die, formatError } from '../../src/core/error-handler.js';

describe('formatError', () => {
  it('names the offending parameter of a configuration error', () => {
    expect(formatError(new ConfigurationError('Invalid seed', 'seed'))).toBe(
      'Invalid seed (parameter: seed)'
    );
  });

  it('uses the message of other errors', () => {
    expect(formatError(new ValidationError('Bad range'))).toBe('Bad range');
    expect(formatError('plain text')).toBe('plain text');
    expect(formatError(42)).toBe('An unexpected error occurred');
  });
});

describe('die', () => {
  it('prints the error and exits with status 1', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    expect(() => die(new ValidationError('Bad range'))).toThrow('process.exit');
    expect(write).toHaveBeenCalledWith('Error: Bad range\n');
    expect(exit).toHaveBeenCalledWith(1);
  });
});
