/**
 * Error classes and CLI error responses
 */

import { describe, it, expect } from 'vitest';
import {
  ShapeSiftError,
  ConfigError,
  FileIOError,
  InputReadError,
  InferenceError,
  RenderError,
  ErrorCode,
} from '../../../src/utils/errors.js';

describe('Errors', () => {
  it('should create ShapeSiftError with correct properties', () => {
    const error = new ShapeSiftError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    expect(error.message).toBe('test message');
    expect(error.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(error.details).toEqual({ detail: 'extra' });
    expect(error.name).toBe('ShapeSiftError');
    expect(error).toBeInstanceOf(Error);
  });

  it.each([
    [new ConfigError('x'), ErrorCode.CONFIG_ERROR, 'ConfigError'],
    [new FileIOError('x'), ErrorCode.FILE_IO_ERROR, 'FileIOError'],
    [new InputReadError('x'), ErrorCode.INPUT_READ_ERROR, 'InputReadError'],
    [new InferenceError('x'), ErrorCode.INFERENCE_ERROR, 'InferenceError'],
    [new RenderError('x'), ErrorCode.RENDER_ERROR, 'RenderError'],
  ])('should give %s its code and name', (error, code, name) => {
    expect(error).toBeInstanceOf(ShapeSiftError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });

  it('should format error for CLI response', () => {
    const error = new ShapeSiftError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    expect(error.toResponse('inference')).toEqual({
      status: 'error',
      phase: 'inference',
      error: {
        code: ErrorCode.GENERAL_ERROR,
        message: 'test message',
        details: { detail: 'extra' },
      },
    });
  });

  it('should include the cause in the CLI response', () => {
    const error = new FileIOError('io error', undefined, { cause: new Error('ENOENT') });
    expect(error.toResponse('load').error).toEqual({
      code: ErrorCode.FILE_IO_ERROR,
      message: 'io error',
      cause: 'Error: ENOENT',
    });
  });
});
