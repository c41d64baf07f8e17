import path from 'path';
import { z } from 'zod';
import {
  CACHE_DIR_NAME,
  CACHE_RESCAN_INTERVAL,
  ConfigurationError,
  DEFAULT_PLAYBACK_MODE,
  OverlayTiming,
  PlaybackConfig,
  PlaybackMode,
} from '@loopcast/shared';
import type { PlaybackModeType } from '@loopcast/shared';

/**
 * Timing knobs of one controller instance.
 * Defaults come from PlaybackConfig / OverlayTiming.
 */
export interface PlaybackTimings {
  tickIntervalMs: number;
  maxRetryAttempts: number;
  seekThresholdMs: number;
  noneGracePeriodMs: number;
  loopRestartDelayMs: number;
  progressLogIntervalMs: number;
  titleShowDelayMs: number;
  titleClearLeadMs: number;
  titleClearLookaheadMs: number;
  durationCheckDelayMs: number;
  durationPollIntervalMs: number;
  fadeDurationMs: number;
  fadeSteps: number;
  fadeEpsilon: number;
}

export const DEFAULT_TIMINGS: Readonly<PlaybackTimings> = Object.freeze({
  tickIntervalMs: PlaybackConfig.TICK_INTERVAL,
  maxRetryAttempts: PlaybackConfig.MAX_RETRY_ATTEMPTS,
  seekThresholdMs: PlaybackConfig.SEEK_THRESHOLD,
  noneGracePeriodMs: PlaybackConfig.NONE_GRACE_PERIOD,
  loopRestartDelayMs: PlaybackConfig.LOOP_RESTART_DELAY,
  progressLogIntervalMs: PlaybackConfig.PROGRESS_LOG_INTERVAL,
  titleShowDelayMs: OverlayTiming.SHOW_DELAY,
  titleClearLeadMs: OverlayTiming.CLEAR_LEAD,
  titleClearLookaheadMs: OverlayTiming.CLEAR_LOOKAHEAD,
  durationCheckDelayMs: OverlayTiming.DURATION_CHECK_DELAY,
  durationPollIntervalMs: OverlayTiming.DURATION_POLL_INTERVAL,
  fadeDurationMs: OverlayTiming.FADE_DURATION,
  fadeSteps: OverlayTiming.FADE_STEPS,
  fadeEpsilon: OverlayTiming.FADE_EPSILON,
});

export function resolveTimings(overrides: Partial<PlaybackTimings> = {}): PlaybackTimings {
  const timings = { ...DEFAULT_TIMINGS, ...overrides };
  if (timings.fadeSteps < 1 || !Number.isInteger(timings.fadeSteps)) {
    throw new ConfigurationError('fadeSteps must be a positive integer', {
      configKey: 'fadeSteps',
      issues: [`fadeSteps: ${timings.fadeSteps}`],
    });
  }
  return timings;
}

const playbackModes = [PlaybackMode.CONTINUOUS, PlaybackMode.SINGLE, PlaybackMode.LOOP] as const;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  LOOPCAST_CACHE_DIR: z.string().trim().min(1).optional(),
  LOOPCAST_MODE: z.enum(playbackModes).default(DEFAULT_PLAYBACK_MODE),
  LOOPCAST_TICK_INTERVAL_MS: z.coerce.number().int().min(100).max(60000).default(PlaybackConfig.TICK_INTERVAL),
  LOOPCAST_CONTINUOUS_WHEN_HIDDEN: booleanFlag.default('true'),
  LOOPCAST_RESCAN_INTERVAL_MS: z.coerce.number().int().min(0).default(CACHE_RESCAN_INTERVAL),
  LOOPCAST_PLAYER: z.string().trim().min(1).optional(),
  LOOPCAST_SEED: z.coerce.number().int().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

export interface AppConfig {
  cacheDir: string;
  mode: PlaybackModeType;
  tickIntervalMs: number;
  /** Whether continuous mode keeps playing while the output is hidden */
  continuousWhenHidden: boolean;
  /** 0 disables periodic rescans */
  rescanIntervalMs: number;
  playerCommand: string | null;
  /** Seed for reproducible selection; null uses Math.random */
  seed: number | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent' | null;
}

/**
 * Validate environment variables into an AppConfig.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }

  const parsed = result.data;
  return {
    cacheDir: path.resolve(cwd, parsed.LOOPCAST_CACHE_DIR ?? CACHE_DIR_NAME),
    mode: parsed.LOOPCAST_MODE,
    tickIntervalMs: parsed.LOOPCAST_TICK_INTERVAL_MS,
    continuousWhenHidden: parsed.LOOPCAST_CONTINUOUS_WHEN_HIDDEN,
    rescanIntervalMs: parsed.LOOPCAST_RESCAN_INTERVAL_MS,
    playerCommand: parsed.LOOPCAST_PLAYER ?? null,
    seed: parsed.LOOPCAST_SEED ?? null,
    logLevel: parsed.LOG_LEVEL ?? null,
  };
}

export function isPlaybackMode(value: unknown): value is PlaybackModeType {
  return typeof value === 'string' && playbackModes.some((mode) => mode === value);
}
