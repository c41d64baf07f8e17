import { describe, it, expect } from 'vitest';
import {
  isNodeSystemError,
  isNodeErrorWithCode,
  isFileNotFoundError,
  isError,
  getErrorMessage,
  isString,
  isNonEmptyString,
  isPositiveInteger,
  isStringArray,
} from './guards.js';

describe('Error Type Guards', () => {
  describe('isNodeSystemError', () => {
    it('should return true for node system errors', () => {
      const error = Object.assign(new Error('ENOENT'), { code: 'ENOENT' });
      expect(isNodeSystemError(error)).toBe(true);
    });

    it('should return false for regular errors', () => {
      expect(isNodeSystemError(new Error('test'))).toBe(false);
      expect(isNodeSystemError(null)).toBe(false);
      expect(isNodeSystemError({ code: 'ENOENT' })).toBe(false);
    });
  });

  describe('isNodeErrorWithCode', () => {
    it('should return true for matching error codes', () => {
      const error = Object.assign(new Error('test'), { code: 'ENOENT' });
      expect(isNodeErrorWithCode(error, 'ENOENT')).toBe(true);
    });

    it('should return false for non-matching codes', () => {
      const error = Object.assign(new Error('test'), { code: 'EACCES' });
      expect(isNodeErrorWithCode(error, 'ENOENT')).toBe(false);
    });
  });

  describe('specific error code checks', () => {
    it('isFileNotFoundError should detect ENOENT', () => {
      const error = Object.assign(new Error('test'), { code: 'ENOENT' });
      expect(isFileNotFoundError(error)).toBe(true);
    });
  });
});

describe('Error Utilities', () => {
  describe('isError', () => {
    it('should return true for Error instances', () => {
      expect(isError(new Error('test'))).toBe(true);
      expect(isError(new TypeError('test'))).toBe(true);
    });

    it('should return false for non-errors', () => {
      expect(isError('error')).toBe(false);
      expect(isError({ message: 'test' })).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should extract message from Error', () => {
      expect(getErrorMessage(new Error('test message'))).toBe('test message');
    });

    it('should return string as is', () => {
      expect(getErrorMessage('string error')).toBe('string error');
    });

    it('should extract message from object with message property', () => {
      expect(getErrorMessage({ message: 'object message' })).toBe('object message');
    });

    it('should return default for unknown types', () => {
      expect(getErrorMessage(null)).toBe('Unknown error');
      expect(getErrorMessage(123)).toBe('Unknown error');
    });
  });
});

describe('Primitive Type Guards', () => {
  it('isString', () => {
    expect(isString('hello')).toBe(true);
    expect(isString('')).toBe(true);
    expect(isString(123)).toBe(false);
  });

  it('isNonEmptyString should reject blank strings', () => {
    expect(isNonEmptyString('a')).toBe(true);
    expect(isNonEmptyString('   ')).toBe(false);
    expect(isNonEmptyString(undefined)).toBe(false);
  });

  it('isPositiveInteger', () => {
    expect(isPositiveInteger(1)).toBe(true);
    expect(isPositiveInteger(0)).toBe(false);
    expect(isPositiveInteger(1.5)).toBe(false);
    expect(isPositiveInteger(NaN)).toBe(false);
  });

  it('isStringArray', () => {
    expect(isStringArray(['a', 'b'])).toBe(true);
    expect(isStringArray([])).toBe(true);
    expect(isStringArray(['a', 1])).toBe(false);
    expect(isStringArray('a')).toBe(false);
  });
});
