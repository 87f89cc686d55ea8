import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigurationError,
  NotFoundError,
  ValidationError,
  isOperationalError,
} from '../../src/errors.js';

describe('errors', () => {
  it('AppError carries code, status and context', () => {
    const error = new AppError('boom', 'CUSTOM', 418, { key: 'value' }, false);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AppError');
    expect(error.code).toBe('CUSTOM');
    expect(error.statusCode).toBe(418);
    expect(error.context).toEqual({ key: 'value' });
    expect(error.isOperational).toBe(false);
  });

  it('toJSON exposes the structured fields', () => {
    const json = new ValidationError('bad input', { field: 'numTrades' }).toJSON();

    expect(json).toMatchObject({
      name: 'ValidationError',
      message: 'bad input',
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context: { field: 'numTrades' },
      isOperational: true,
    });
  });

  it('ConfigurationError records the offending key', () => {
    const error = new ConfigurationError('winProbability out of range', 'winProbability', {
      value: 1.2,
    });

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.configKey).toBe('winProbability');
    expect(error.context).toEqual({ configKey: 'winProbability', value: 1.2 });
  });

  it('NotFoundError builds its message from resource and identifier', () => {
    expect(new NotFoundError('Study preset', 'nope').message).toBe(
      "Study preset with identifier 'nope' not found"
    );
    expect(new NotFoundError('Study preset').message).toBe('Study preset not found');
  });

  it('isOperationalError only trusts AppError flags', () => {
    expect(isOperationalError(new ValidationError('x'))).toBe(true);
    expect(isOperationalError(new AppError('x', 'X', 500, undefined, false))).toBe(false);
    expect(isOperationalError(new Error('plain'))).toBe(false);
  });
});
