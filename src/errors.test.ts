import { describe, it, expect } from 'vitest';
import {
  ConfigValidationError,
  DirectoryAccessError,
  MoveError,
  ResolverExhaustedError,
  describeError,
  errorCode,
} from './errors.js';
import { AppError } from './logger.js';

describe('organizer errors', () => {
  it('carries codes and context', () => {
    const error = new MoveError('/d/a.jpg', '/d/images/a.jpg', 'disk full');

    expect(error).toBeInstanceOf(AppError);
    expect(error.message).toBe('Move operation failed: disk full');
    expect(error.code).toBe('MOVE_FAILED');
    expect(error.context).toEqual({ source: '/d/a.jpg', destination: '/d/images/a.jpg' });
  });

  it('formats directory and resolver failures', () => {
    expect(new DirectoryAccessError('/d', 'denied').message).toBe('Cannot access downloads folder: denied');
    expect(new ResolverExhaustedError('/d/a.jpg', 3).message).toBe(
      'No free destination name for /d/a.jpg after 3 attempts'
    );
  });

  it('joins validation messages', () => {
    const error = new ConfigValidationError(['a is wrong', 'b is wrong']);
    expect(error.message).toBe('Invalid configuration: a is wrong; b is wrong');
    expect(error.statusCode).toBe(400);
    expect(error.errors).toEqual(['a is wrong', 'b is wrong']);
  });
});

describe('describeError', () => {
  it('uses the message of errors and stringifies the rest', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});

describe('errorCode', () => {
  it('reads string codes only', () => {
    expect(errorCode(Object.assign(new Error('x'), { code: 'EXDEV' }))).toBe('EXDEV');
    expect(errorCode({ code: 13 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});
