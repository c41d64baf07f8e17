import type { MediaStatus, PlaybackMode } from '../constants/index.js';

export type PlaybackModeType = (typeof PlaybackMode)[keyof typeof PlaybackMode];
export type MediaStatusType = (typeof MediaStatus)[keyof typeof MediaStatus];

// One ready-to-play item in the library
export interface LibraryItem {
  id: string;
  localPath: string;
  title: string;
  artist: string;
  metadataDegraded: boolean;
}

export type LibraryEntry = Omit<LibraryItem, 'id'>;

export interface TitleInfo {
  title: string;
  artist: string;
  degraded: boolean;
}

export type RemovalResult = 'removed' | 'deferred' | 'missing';

export type FadeDirection = 'in' | 'out';

/**
 * Host media slot. All calls are synchronous and must not throw;
 * failures surface as `false` / `0` / empty string.
 */
export interface MediaSourceAdapter {
  isAvailable(): boolean;
  getStatus(): MediaStatusType;
  /** 0 when unknown */
  getDurationMs(): number;
  getPositionMs(): number;
  /**
   * `forceReload` must detach and reattach even when `path` is already loaded.
   */
  setLocalFile(path: string, forceReload: boolean): boolean;
  stopAndClear(): void;
  getActiveLocalPath(): string;
}

// Host text slot
export interface OverlayAdapter {
  isAvailable(): boolean;
  setText(text: string): boolean;
  setOpacity(percent: number): void;
}

// Host-driven signals read once per tick
export interface HostSignals {
  isVisible(): boolean;
  isShutdownRequested(): boolean;
}

export interface PlaybackSnapshot {
  mode: PlaybackModeType;
  isPlaying: boolean;
  currentItemId: string | null;
  currentItem: LibraryItem | null;
  loopItemId: string | null;
  firstItemPlayed: boolean;
  retryCount: number;
  playedCount: number;
  librarySize: number;
}

export interface ItemStartedEventData {
  item: LibraryItem;
  mode: PlaybackModeType;
  forceReload: boolean;
}

export interface StoppedEventData {
  itemId: string | null;
  reason: string;
}

export interface ModeChangedEventData {
  previous: PlaybackModeType;
  mode: PlaybackModeType;
}
