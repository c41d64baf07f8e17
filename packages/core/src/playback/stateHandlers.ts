import { MediaStatus, PlaybackMode } from '@loopcast/shared';
import type { MediaStatusType } from '@loopcast/shared';
import type { OrchestratorState } from './state.js';

/**
 * What the controller believes: nothing playing, or an item playing.
 */
export type OrchestratorPhase = 'idle' | 'playing';

export type HandlerAction =
  // host plays something the controller did not start
  | 'adopt'
  // seek detection, progress logging, clear re-aim
  | 'trackProgress'
  // item finished: loop restart, single stop or next item
  | 'advance'
  // start when visible and the mode allows it
  | 'startIfAllowed'
  // manual stop detection and bounded retry
  | 'handleStop'
  // playing but nothing loaded: reset after the grace period
  | 'checkDesync'
  | 'ignore';

export const TRANSITIONS: Readonly<Record<OrchestratorPhase, Readonly<Record<MediaStatusType, HandlerAction>>>> = {
  idle: {
    [MediaStatus.PLAYING]: 'adopt',
    [MediaStatus.ENDED]: 'startIfAllowed',
    [MediaStatus.STOPPED]: 'ignore',
    [MediaStatus.NONE]: 'startIfAllowed',
  },
  playing: {
    [MediaStatus.PLAYING]: 'trackProgress',
    [MediaStatus.ENDED]: 'advance',
    [MediaStatus.STOPPED]: 'handleStop',
    [MediaStatus.NONE]: 'checkDesync',
  },
};

export function phaseOf(state: OrchestratorState): OrchestratorPhase {
  return state.isPlaying ? 'playing' : 'idle';
}

export function resolveAction(state: OrchestratorState, status: MediaStatusType): HandlerAction {
  return TRANSITIONS[phaseOf(state)][status];
}

// ============================================
// Guards
// ============================================

/**
 * Position jumped forward by more than the threshold since the last tick.
 */
export function isSeek(state: OrchestratorState, positionMs: number, thresholdMs: number): boolean {
  return state.lastPositionMs > 0 && positionMs - state.lastPositionMs > thresholdMs;
}

/**
 * First Stopped report while playing that the controller did not cause.
 */
export function isManualStop(state: OrchestratorState): boolean {
  return state.isPlaying && !state.stopIssued;
}

export function isAwaitingLoopRestart(state: OrchestratorState): boolean {
  return state.mode === PlaybackMode.LOOP && state.loopRestartItemId !== null;
}

/**
 * Single mode refuses to start once its one item has played.
 */
export function canStart(state: OrchestratorState): boolean {
  return !(state.mode === PlaybackMode.SINGLE && state.firstItemPlayed);
}

export function isWithinGracePeriod(state: OrchestratorState, now: number, graceMs: number): boolean {
  return state.startedAt !== null && now - state.startedAt < graceMs;
}

/**
 * Remaining time is inside the window where the clear should be (re)aimed.
 */
export function isApproachingEnd(remainingMs: number, clearLeadMs: number, lookaheadMs: number): boolean {
  return remainingMs > 0 && remainingMs < clearLeadMs + lookaheadMs;
}
