import type { PlaybackModeType } from '@loopcast/shared';
import type { TimerHandle } from './scheduler.js';

/**
 * Mutable state of one controller instance.
 */
export interface OrchestratorState {
  mode: PlaybackModeType;
  isPlaying: boolean;
  currentItemId: string | null;
  currentPath: string | null;
  // Epoch ms of the last successful start, drives the None grace period
  startedAt: number | null;

  playedSet: Set<string>;
  loopItemId: string | null;
  firstItemPlayed: boolean;

  retryCount: number;
  // Set whenever the controller itself stops playback; cleared by Playing
  stopIssued: boolean;

  loopRestartItemId: string | null;
  loopRestartTimer: TimerHandle | null;

  lastPositionMs: number;
  clearRescheduled: boolean;
  lastProgressBucket: number;

  initialStateChecked: boolean;
  waitingLogged: boolean;
  lastLibrarySize: number;
  shutDown: boolean;
}

export function createInitialState(mode: PlaybackModeType, playedIds: Iterable<string> = []): OrchestratorState {
  return {
    mode,
    isPlaying: false,
    currentItemId: null,
    currentPath: null,
    startedAt: null,

    playedSet: new Set(playedIds),
    loopItemId: null,
    firstItemPlayed: false,

    retryCount: 0,
    stopIssued: false,

    loopRestartItemId: null,
    loopRestartTimer: null,

    lastPositionMs: 0,
    clearRescheduled: false,
    lastProgressBucket: -1,

    initialStateChecked: false,
    waitingLogged: false,
    lastLibrarySize: 0,
    shutDown: false,
  };
}

/**
 * Forget per-item seek and progress tracking. The retry counter survives.
 */
export function resetTracking(state: OrchestratorState): void {
  state.lastPositionMs = 0;
  state.lastProgressBucket = -1;
  state.clearRescheduled = false;
}
