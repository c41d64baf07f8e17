import { EventEmitter } from 'events';
import {
  MediaStatus,
  PlaybackMode,
  DEFAULT_PLAYBACK_MODE,
  PlaybackError,
  formatDuration,
  getErrorMessage,
  toTitleInfo,
} from '@loopcast/shared';
import type {
  HostSignals,
  LibraryItem,
  MediaSourceAdapter,
  OverlayAdapter,
  PlaybackModeType,
  PlaybackSnapshot,
  RandomSource,
} from '@loopcast/shared';
import type { LibraryStore } from '../library/LibraryStore.js';
import { identifyItemFromPath } from '../library/cache.js';
import { resolveTimings } from '../config/index.js';
import type { PlaybackTimings } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { TimerScheduler } from './scheduler.js';
import type { TimerToken } from './scheduler.js';
import { TitleOverlay } from './TitleOverlay.js';
import { selectNext } from './videoSelector.js';
import { createInitialState, resetTracking } from './state.js';
import type { OrchestratorState } from './state.js';
import {
  canStart,
  isApproachingEnd,
  isAwaitingLoopRestart,
  isManualStop,
  isSeek,
  isWithinGracePeriod,
  resolveAction,
} from './stateHandlers.js';
import type { HandlerAction } from './stateHandlers.js';

const COMPONENT = 'Controller';

export interface PlaybackControllerOptions {
  library: LibraryStore;
  media: MediaSourceAdapter;
  overlay: OverlayAdapter;
  host: HostSignals;
  mode?: PlaybackModeType;
  /** Continuous mode keeps playing while the output is hidden */
  continuousWhenHidden?: boolean;
  timings?: Partial<PlaybackTimings>;
  random?: RandomSource;
  now?: () => number;
  /** Played set restored from a previous session */
  playedIds?: Iterable<string>;
}

/**
 * Drives playback from a fixed tick.
 *
 * Each tick reads the host status once and either starts an item, or hands
 * the status to the action the transition table picks for the current phase.
 * Overlay and loop-restart timers are delivered through the same event loop
 * as the tick, so no two of them ever run at once.
 *
 * Events:
 * - `itemStarted` (ItemStartedEventData)
 * - `stopped` (StoppedEventData)
 * - `modeChanged` (ModeChangedEventData)
 * - `tickFailed` (PlaybackError)
 */
export class PlaybackController extends EventEmitter {
  private library: LibraryStore;
  private media: MediaSourceAdapter;
  private overlayAdapter: OverlayAdapter;
  private host: HostSignals;
  private continuousWhenHidden: boolean;
  private timings: PlaybackTimings;
  private random: RandomSource;
  private now: () => number;

  private state: OrchestratorState;
  private scheduler: TimerScheduler;
  private title: TitleOverlay;
  private tickTimer: ReturnType<typeof setInterval> | null;
  private boundItemUpdated: (item: LibraryItem) => void;

  constructor(options: PlaybackControllerOptions) {
    super();
    this.library = options.library;
    this.media = options.media;
    this.overlayAdapter = options.overlay;
    this.host = options.host;
    this.continuousWhenHidden = options.continuousWhenHidden ?? true;
    this.timings = resolveTimings(options.timings);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;

    this.state = createInitialState(options.mode ?? DEFAULT_PLAYBACK_MODE, options.playedIds);
    this.scheduler = new TimerScheduler((token) => this.handleTimer(token));
    this.title = new TitleOverlay({
      adapter: this.overlayAdapter,
      scheduler: this.scheduler,
      getDurationMs: () => this.media.getDurationMs(),
      timings: this.timings,
    });
    this.tickTimer = null;

    this.boundItemUpdated = (item: LibraryItem) => this.onItemUpdated(item);
    this.library.on('itemUpdated', this.boundItemUpdated);
  }

  // ============================================
  // Lifecycle
  // ============================================

  start(): void {
    if (this.tickTimer) return;
    this.state.initialStateChecked = false;
    this.tickTimer = setInterval(() => this.tick(), this.timings.tickIntervalMs);
    logger.info(COMPONENT, 'Playback controller started', {
      mode: this.state.mode,
      tickIntervalMs: this.timings.tickIntervalMs,
    });
  }

  /**
   * Stop ticking, stop playback and release every timer and listener.
   */
  dispose(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    this.shutdown();
    this.library.off('itemUpdated', this.boundItemUpdated);
    this.removeAllListeners();
  }

  /**
   * One controller step. Never throws.
   */
  tick(): void {
    try {
      this.runTick();
    } catch (error: unknown) {
      const { currentItemId, mode, isPlaying } = this.state;
      logger.error(COMPONENT, 'Error in playback tick', error, { itemId: currentItemId, mode, isPlaying });
      this.emit(
        'tickFailed',
        new PlaybackError(`Playback tick failed: ${getErrorMessage(error)}`, {
          cause: error instanceof Error ? error : undefined,
          itemId: currentItemId ?? undefined,
          mode,
        })
      );
    }
  }

  private runTick(): void {
    const state = this.state;

    if (this.host.isShutdownRequested()) {
      this.shutdown();
      return;
    }

    if (!this.media.isAvailable() || !this.overlayAdapter.isAvailable()) {
      return;
    }

    const visible = this.host.isVisible();
    if (!visible) {
      if (!state.isPlaying) {
        state.waitingLogged = false;
        return;
      }
      if (state.mode !== PlaybackMode.CONTINUOUS || !this.continuousWhenHidden) {
        logger.info(COMPONENT, `Output hidden in ${state.mode} mode, stopping playback`);
        if (state.mode === PlaybackMode.LOOP) {
          state.loopItemId = null;
          state.firstItemPlayed = false;
        }
        this.fullStop('hidden');
        return;
      }
    }

    const librarySize = this.library.size;
    this.trackLibrarySize(librarySize);
    if (librarySize === 0) {
      if (!state.waitingLogged) {
        logger.info(COMPONENT, 'Waiting for items to be downloaded and processed...');
        state.waitingLogged = true;
      }
      return;
    }
    state.waitingLogged = false;

    const status = this.media.getStatus();

    if (!state.initialStateChecked) {
      state.initialStateChecked = true;
      if (status === MediaStatus.PLAYING && !state.isPlaying) {
        logger.info(COMPONENT, 'Media source is already playing, adopting it');
        this.adopt();
        return;
      }
    }

    // Host status lags near item boundaries; a visible idle output starts now
    if (visible && !state.isPlaying && canStart(state)) {
      logger.info(COMPONENT, `Output visible but not playing (status: ${status}), starting playback`);
      this.clearLoopPinForFreshStart();
      this.startNext();
      return;
    }

    this.runAction(resolveAction(state, status), visible);
  }

  private runAction(action: HandlerAction, visible: boolean): void {
    switch (action) {
      case 'adopt':
        this.adopt();
        break;
      case 'trackProgress':
        this.trackProgress();
        break;
      case 'advance':
        this.advance();
        break;
      case 'startIfAllowed':
        if (visible && canStart(this.state)) {
          this.clearLoopPinForFreshStart();
          this.startNext();
        }
        break;
      case 'handleStop':
        this.handleStop();
        break;
      case 'checkDesync':
        this.checkDesync();
        break;
      case 'ignore':
        break;
    }
  }

  private handleTimer(token: TimerToken): void {
    if (token.kind === 'loopRestart') {
      this.onLoopRestart(token.itemId);
      return;
    }
    this.title.handleTimer(token);
  }

  // ============================================
  // Status actions
  // ============================================

  /**
   * Host plays something the controller did not start: take it over.
   */
  private adopt(): void {
    const state = this.state;
    const duration = this.media.getDurationMs();
    if (duration <= 0) {
      logger.info(COMPONENT, 'No valid media loaded, starting playback');
      this.startNext();
      return;
    }

    state.isPlaying = true;
    state.startedAt = this.now();

    if (!state.currentItemId) {
      const activePath = this.media.getActiveLocalPath();
      const id = identifyItemFromPath(this.library, activePath);
      if (id) {
        this.setCurrent(id, activePath);
        logger.info(COMPONENT, 'Identified playing item', { itemId: id });
      }
    }

    if (state.mode === PlaybackMode.LOOP && state.loopItemId === null && state.currentItemId) {
      state.loopItemId = state.currentItemId;
      logger.info(COMPONENT, 'Loop mode: pinned adopted item', { itemId: state.currentItemId });
    }
    // An adopted item is the one item of Single/Loop mode
    if (state.mode !== PlaybackMode.CONTINUOUS) {
      state.firstItemPlayed = true;
    }

    this.trackProgress();
  }

  private trackProgress(): void {
    const state = this.state;
    state.stopIssued = false;
    state.retryCount = 0;

    if (
      state.loopRestartItemId !== null &&
      state.currentItemId === state.loopRestartItemId &&
      !this.scheduler.isActive(state.loopRestartTimer)
    ) {
      logger.info(COMPONENT, 'Loop restart completed', { itemId: state.loopRestartItemId });
      state.loopRestartItemId = null;
    }

    const duration = this.media.getDurationMs();
    const position = this.media.getPositionMs();
    if (duration <= 0 || position <= 0) {
      return;
    }

    const remaining = duration - position;

    if (isSeek(state, position, this.timings.seekThresholdMs)) {
      logger.info(
        COMPONENT,
        `Seek detected: jumped from ${(state.lastPositionMs / 1000).toFixed(1)}s to ${(position / 1000).toFixed(1)}s`
      );
      state.clearRescheduled = false;
      this.title.scheduleClearFromRemaining(remaining);
    }
    state.lastPositionMs = position;

    this.logProgress(position, duration);

    if (
      isApproachingEnd(remaining, this.timings.titleClearLeadMs, this.timings.titleClearLookaheadMs) &&
      (!state.clearRescheduled || !this.title.isClearScheduled())
    ) {
      this.title.scheduleClearFromRemaining(remaining);
      state.clearRescheduled = true;
    }
  }

  private advance(): void {
    const state = this.state;
    resetTracking(state);

    if (isAwaitingLoopRestart(state)) {
      return;
    }

    if (state.mode === PlaybackMode.LOOP) {
      const endedId = state.currentItemId ?? identifyItemFromPath(this.library, this.media.getActiveLocalPath());
      if (endedId) {
        if (state.loopItemId === null) {
          state.loopItemId = endedId;
          logger.info(COMPONENT, 'Loop mode: pinned ended item', { itemId: endedId });
        }
        this.scheduleLoopRestart(endedId);
        return;
      }
      logger.warn(COMPONENT, 'Loop mode: could not identify ended item, selecting next');
    }

    if (state.mode === PlaybackMode.SINGLE && state.firstItemPlayed) {
      logger.info(COMPONENT, 'Single mode: item ended, stopping playback');
      this.fullStop('single item finished');
      return;
    }

    logger.info(COMPONENT, 'Playback ended, starting next item');
    this.startNext();
  }

  private handleStop(): void {
    const state = this.state;

    // Reattaching the same file reports Stopped on the way
    if (isAwaitingLoopRestart(state)) {
      return;
    }

    if (isManualStop(state)) {
      logger.info(COMPONENT, 'Manual stop detected', { itemId: state.currentItemId });
      if (state.mode === PlaybackMode.LOOP) {
        state.loopItemId = null;
      }
      this.fullStop('manual stop');
      return;
    }

    if (state.retryCount < this.timings.maxRetryAttempts) {
      state.retryCount++;
      logger.warn(COMPONENT, `Playback stopped, retry attempt ${state.retryCount}`, {
        itemId: state.currentItemId,
        mode: state.mode,
      });
      this.startNext();
      return;
    }

    logger.warn(COMPONENT, 'Max retries reached, stopping playback', {
      itemId: state.currentItemId,
      mode: state.mode,
    });
    this.fullStop('retries exhausted');
  }

  private checkDesync(): void {
    const state = this.state;
    if (isAwaitingLoopRestart(state)) {
      return;
    }
    if (isWithinGracePeriod(state, this.now(), this.timings.noneGracePeriodMs)) {
      return;
    }

    const itemId = state.currentItemId;
    logger.warn(COMPONENT, 'Playing state but no media loaded, resetting state', { itemId, mode: state.mode });
    this.title.clearForStop();
    this.clearCurrent();
    this.emit('stopped', { itemId, reason: 'desync' });
  }

  // ============================================
  // Starting and stopping
  // ============================================

  private startNext(exclude: ReadonlySet<string> = new Set()): boolean {
    const state = this.state;

    if (!canStart(state)) {
      logger.info(COMPONENT, 'Single mode: item already played, stopping');
      this.fullStop('single item finished');
      return false;
    }

    // A removal of the current item is deferred, so skipped ids are tracked here
    const skipped = new Set<string>(exclude);
    const attempts = this.library.size + 1;
    for (let attempt = 0; attempt < attempts; attempt++) {
      const candidates = this.library.ids().filter((id) => !skipped.has(id));
      const id = selectNext(state.mode, candidates, state, this.random);
      if (id === null) {
        break;
      }
      const item = this.library.get(id);
      if (!item || !this.library.containsValidFile(id)) {
        skipped.add(id);
        this.dropMissingItem(id);
        continue;
      }
      return this.beginPlayback(item, false);
    }

    logger.warn(COMPONENT, 'No playable item available');
    this.fullStop('no playable item');
    return false;
  }

  /**
   * Replay one item from the start (Loop mode).
   */
  private startSpecific(itemId: string): boolean {
    const state = this.state;
    const item = this.library.get(itemId);
    if (!item || !this.library.containsValidFile(itemId)) {
      logger.warn(COMPONENT, 'Loop item is no longer playable, selecting another', { itemId });
      this.dropMissingItem(itemId);
      state.loopItemId = null;
      state.loopRestartItemId = null;
      return this.startNext(new Set([itemId]));
    }
    return this.beginPlayback(item, true);
  }

  private beginPlayback(item: LibraryItem, forceReload: boolean): boolean {
    const state = this.state;
    this.title.cancelTimers();

    if (!this.media.setLocalFile(item.localPath, forceReload)) {
      if (state.retryCount < this.timings.maxRetryAttempts) {
        state.retryCount++;
        logger.warn(COMPONENT, `Failed to start item, retry attempt ${state.retryCount}`, {
          itemId: item.id,
          mode: state.mode,
        });
        return forceReload ? this.startSpecific(item.id) : this.startNext();
      }
      logger.error(COMPONENT, 'Failed to start item, max retries reached', undefined, {
        itemId: item.id,
        mode: state.mode,
      });
      this.fullStop('media source failed');
      return false;
    }

    this.title.scheduleShow(toTitleInfo(item));

    state.isPlaying = true;
    this.setCurrent(item.id, item.localPath);
    state.startedAt = this.now();
    resetTracking(state);

    if (state.mode !== PlaybackMode.CONTINUOUS && !state.firstItemPlayed) {
      state.firstItemPlayed = true;
      logger.info(COMPONENT, `${state.mode} mode: started first playback: ${item.title} - ${item.artist}`);
    } else {
      logger.info(COMPONENT, `Started playback: ${item.title} - ${item.artist}`, { itemId: item.id });
    }

    this.title.scheduleClearWhenDurationKnown();
    this.emit('itemStarted', { item, mode: state.mode, forceReload });
    return true;
  }

  /**
   * Stop the host, clear the overlay and forget the current item.
   * Always cancels overlay and restart timers, even when nothing plays.
   */
  private fullStop(reason: string): void {
    const state = this.state;
    this.title.cancelTimers();
    this.cancelLoopRestart();
    state.stopIssued = true;
    state.retryCount = 0;

    if (!state.isPlaying) {
      return;
    }

    const itemId = state.currentItemId;
    this.media.stopAndClear();
    this.title.clearForStop();
    this.clearCurrent();
    logger.info(COMPONENT, 'Playback stopped and all sources cleared', { reason, itemId });
    this.emit('stopped', { itemId, reason });
  }

  private shutdown(): void {
    const state = this.state;
    if (state.isPlaying) {
      this.fullStop('shutdown');
    }
    if (state.shutDown) {
      return;
    }
    state.shutDown = true;
    this.scheduler.cancelAll();
    state.loopRestartTimer = null;
    this.title.reset();
    logger.info(COMPONENT, 'Playback controller shut down');
  }

  private setCurrent(id: string, localPath: string): void {
    this.state.currentItemId = id;
    this.state.currentPath = localPath;
    this.library.setCurrentItem(id);
  }

  private clearCurrent(): void {
    const state = this.state;
    state.isPlaying = false;
    state.currentItemId = null;
    state.currentPath = null;
    state.startedAt = null;
    this.library.setCurrentItem(null);
    resetTracking(state);
  }

  private dropMissingItem(id: string): void {
    const state = this.state;
    logger.warn(COMPONENT, 'Item file is missing, skipping', { itemId: id, mode: state.mode });
    state.playedSet.delete(id);
    if (state.loopItemId === id) {
      state.loopItemId = null;
    }
    this.library.remove(id);
  }

  private clearLoopPinForFreshStart(): void {
    if (this.state.mode === PlaybackMode.LOOP && this.state.loopItemId !== null) {
      logger.info(COMPONENT, 'Loop mode: clearing previous loop item to select a new one');
      this.state.loopItemId = null;
    }
  }

  // ============================================
  // Loop restart
  // ============================================

  private scheduleLoopRestart(itemId: string): void {
    const state = this.state;
    this.scheduler.cancel(state.loopRestartTimer);
    state.loopRestartItemId = itemId;
    state.loopRestartTimer = this.scheduler.schedule(this.timings.loopRestartDelayMs, {
      kind: 'loopRestart',
      itemId,
    });
    logger.info(COMPONENT, 'Loop mode: replaying the same item', { itemId });
  }

  private onLoopRestart(itemId: string): void {
    const state = this.state;
    state.loopRestartTimer = null;
    if (state.mode !== PlaybackMode.LOOP || state.loopRestartItemId !== itemId) {
      return;
    }
    this.startSpecific(itemId);
  }

  private cancelLoopRestart(): void {
    const state = this.state;
    this.scheduler.cancel(state.loopRestartTimer);
    state.loopRestartTimer = null;
    state.loopRestartItemId = null;
  }

  // ============================================
  // Mode and library
  // ============================================

  /**
   * Change mode with immediate effect on the playing item.
   */
  setMode(mode: PlaybackModeType): void {
    const state = this.state;
    const previous = state.mode;
    if (previous === mode) return;
    state.mode = mode;

    if (previous === PlaybackMode.LOOP) {
      state.loopItemId = null;
      this.cancelLoopRestart();
    }
    if (previous === PlaybackMode.SINGLE) {
      state.firstItemPlayed = false;
    }

    if (mode === PlaybackMode.SINGLE) {
      // Playing item becomes the one item; idle re-arms it
      state.firstItemPlayed = state.isPlaying;
    }
    if (mode === PlaybackMode.LOOP && state.isPlaying) {
      const id = state.currentItemId ?? identifyItemFromPath(this.library, this.media.getActiveLocalPath());
      if (id) {
        state.loopItemId = id;
        logger.info(COMPONENT, 'Loop mode: pinned playing item', { itemId: id });
      }
    }

    logger.info(COMPONENT, `Playback mode changed: ${previous} -> ${mode}`);
    this.emit('modeChanged', { previous, mode });
  }

  private onItemUpdated(item: LibraryItem): void {
    if (!this.state.isPlaying || item.id !== this.state.currentItemId) {
      return;
    }
    logger.info(COMPONENT, `Title updated: ${item.title} - ${item.artist}`, { itemId: item.id });
    this.title.changeTitle(toTitleInfo(item));
  }

  private trackLibrarySize(size: number): void {
    const last = this.state.lastLibrarySize;
    if (size === last) return;
    if (last === 0 && size > 0) {
      logger.info(COMPONENT, `First item available! Starting playback with ${size} item(s)`);
    } else if (size > last) {
      logger.info(COMPONENT, `New item added. Total items: ${size}`);
    }
    this.state.lastLibrarySize = size;
  }

  private logProgress(positionMs: number, durationMs: number): void {
    const state = this.state;
    const bucket = Math.floor(positionMs / this.timings.progressLogIntervalMs);
    if (bucket === state.lastProgressBucket) return;
    state.lastProgressBucket = bucket;

    const info = toTitleInfo(state.currentItemId ? this.library.get(state.currentItemId) : null);
    const percent = Math.round((positionMs / durationMs) * 100);
    logger.info(
      COMPONENT,
      `Playing: ${info.title} - ${info.artist} [${percent}% - ${formatDuration(positionMs)} / ${formatDuration(durationMs)}]`
    );
  }

  // ============================================
  // Queries
  // ============================================

  getMode(): PlaybackModeType {
    return this.state.mode;
  }

  getSnapshot(): PlaybackSnapshot {
    const state = this.state;
    return {
      mode: state.mode,
      isPlaying: state.isPlaying,
      currentItemId: state.currentItemId,
      currentItem: state.currentItemId ? this.library.get(state.currentItemId) ?? null : null,
      loopItemId: state.loopItemId,
      firstItemPlayed: state.firstItemPlayed,
      retryCount: state.retryCount,
      playedCount: state.playedSet.size,
      librarySize: this.library.size,
    };
  }

  getPlayedIds(): string[] {
    return [...this.state.playedSet];
  }

  clearPlayedIds(): void {
    this.state.playedSet.clear();
    logger.info(COMPONENT, 'Play history cleared');
  }

  isLoopRestartPending(): boolean {
    return this.state.loopRestartItemId !== null;
  }

  getOverlayOpacity(): number {
    return this.title.getOpacity();
  }
}
