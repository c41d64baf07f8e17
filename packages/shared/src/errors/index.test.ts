import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigurationError,
  MediaSourceError,
  PlaybackError,
  ValidationError,
  isAppError,
  isConfigurationError,
  wrapError,
} from './index.js';

describe('errors', () => {
  it('carries code and context', () => {
    const error = new PlaybackError('Playback tick failed', { itemId: 'abc', mode: 'loop', context: { status: 'none' } });

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('PlaybackError');
    expect(error.code).toBe('PLAYBACK_ERROR');
    expect(error.itemId).toBe('abc');
    expect(error.mode).toBe('loop');
    expect(error.toJSON()).toMatchObject({
      name: 'PlaybackError',
      message: 'Playback tick failed',
      code: 'PLAYBACK_ERROR',
      context: { status: 'none' },
    });
  });

  it('keeps the cause', () => {
    const cause = new Error('spawn ffplay ENOENT');
    const error = new MediaSourceError('Player failed', { cause, localPath: '/cache/a.mp4' });
    expect(error.cause).toBe(cause);
    expect(error.localPath).toBe('/cache/a.mp4');
  });

  it('marks configuration errors as not operational', () => {
    const error = new ConfigurationError('Invalid configuration', { issues: ['LOOPCAST_MODE: invalid'] });
    expect(error.isOperational).toBe(false);
    expect(error.issues).toEqual(['LOOPCAST_MODE: invalid']);
    expect(isConfigurationError(error)).toBe(true);
    expect(isConfigurationError(new ValidationError('bad'))).toBe(false);
  });

  describe('wrapError', () => {
    it('returns app errors unchanged', () => {
      const error = new ValidationError('bad', { field: 'id' });
      expect(wrapError(error)).toBe(error);
    });

    it('wraps other values', () => {
      const wrapped = wrapError('boom', 'Scan failed');
      expect(isAppError(wrapped)).toBe(true);
      expect(wrapped.message).toBe('Scan failed');
      expect(wrapped.code).toBe('UNKNOWN_ERROR');
      expect(wrapped.cause).toBeInstanceOf(Error);
    });
  });
});
