import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MediaStatus, PlaybackError, PlaybackMode } from '@loopcast/shared';
import type { PlaybackModeType, StoppedEventData } from '@loopcast/shared';
import { PlaybackController } from './controller.js';
import { LibraryStore } from '../library/LibraryStore.js';
import { FakeHost, FakeMediaSource, FakeOverlay } from '../testing/fakes.js';

interface SetupOptions {
  mode?: PlaybackModeType;
  ids?: string[];
  continuousWhenHidden?: boolean;
  playedIds?: string[];
}

function pathOf(id: string): string {
  return `/cache/${id}.mp4`;
}

describe('PlaybackController', () => {
  let library: LibraryStore;
  let media: FakeMediaSource;
  let overlay: FakeOverlay;
  let host: FakeHost;
  let missing: Set<string>;
  let controller: PlaybackController;

  function setup(options: SetupOptions = {}): PlaybackController {
    library = new LibraryStore({ fileExists: (filePath) => !missing.has(filePath) });
    for (const id of options.ids ?? ['a', 'b', 'c']) {
      library.put(id, { localPath: pathOf(id), title: `Title ${id}`, artist: 'Artist', metadataDegraded: false });
    }
    controller = new PlaybackController({
      library,
      media,
      overlay,
      host,
      mode: options.mode ?? PlaybackMode.CONTINUOUS,
      continuousWhenHidden: options.continuousWhenHidden,
      playedIds: options.playedIds,
      // First unplayed id in library order
      random: () => 0,
    });
    return controller;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    media = new FakeMediaSource();
    overlay = new FakeOverlay();
    host = new FakeHost();
    missing = new Set();
  });

  afterEach(() => {
    controller.dispose();
    vi.useRealTimers();
  });

  describe('tick preconditions', () => {
    it('starts the first item when visible', () => {
      setup();
      const started = vi.fn();
      controller.on('itemStarted', started);

      controller.tick();

      expect(media.loads).toEqual([{ path: pathOf('a'), forceReload: false }]);
      expect(controller.getSnapshot().isPlaying).toBe(true);
      expect(controller.getSnapshot().currentItemId).toBe('a');
      expect(library.getCurrentItemId()).toBe('a');
      expect(started).toHaveBeenCalledTimes(1);
    });

    it('does nothing while the sinks are unavailable', () => {
      setup();
      media.available = false;
      controller.tick();
      overlay.available = false;
      media.available = true;
      controller.tick();
      expect(media.loads).toEqual([]);
    });

    it('waits for an empty library', () => {
      setup({ ids: [] });
      controller.tick();
      controller.tick();
      expect(media.loads).toEqual([]);
      expect(controller.getSnapshot().isPlaying).toBe(false);
    });

    it('restores the played set from a previous session', () => {
      setup({ playedIds: ['a', 'b'] });
      controller.tick();
      expect(media.loads[0]?.path).toBe(pathOf('c'));
    });

    it('catches errors and reports them', () => {
      setup();
      const failed = vi.fn();
      controller.on('tickFailed', failed);
      media.getStatus = () => {
        throw new Error('host gone');
      };

      expect(() => controller.tick()).not.toThrow();
      expect(failed).toHaveBeenCalledTimes(1);
      const [error] = failed.mock.calls[0] ?? [];
      expect(error).toBeInstanceOf(PlaybackError);
      expect(error).toMatchObject({ message: 'Playback tick failed: host gone', itemId: undefined, mode: 'continuous' });
    });
  });

  describe('first tick reconciliation', () => {
    it('adopts media the host is already playing', () => {
      setup();
      media.activePath = pathOf('b');
      media.report(MediaStatus.PLAYING, 10_000, 60_000);

      controller.tick();

      expect(media.loads).toEqual([]);
      expect(controller.getSnapshot().isPlaying).toBe(true);
      expect(controller.getSnapshot().currentItemId).toBe('b');
    });

    it('starts fresh when the playing media has no duration', () => {
      setup();
      media.report(MediaStatus.PLAYING, 0, 0);

      controller.tick();

      expect(media.loads).toEqual([{ path: pathOf('a'), forceReload: false }]);
    });

    it('pins an adopted item in loop mode', () => {
      setup({ mode: PlaybackMode.LOOP });
      media.activePath = pathOf('c');
      media.report(MediaStatus.PLAYING, 10_000, 60_000);

      controller.tick();

      expect(controller.getSnapshot().loopItemId).toBe('c');
      expect(controller.getSnapshot().firstItemPlayed).toBe(true);
    });
  });

  describe('continuous mode', () => {
    it('advances to the next item when one ends', () => {
      setup();
      controller.tick();
      media.report(MediaStatus.ENDED);
      controller.tick();

      expect(media.loads.map((load) => load.path)).toEqual([pathOf('a'), pathOf('b')]);
      expect(controller.getSnapshot().currentItemId).toBe('b');
    });

    it('keeps playing while hidden by default', () => {
      setup();
      controller.tick();
      host.visible = false;
      media.report(MediaStatus.PLAYING, 1000, 60_000);
      controller.tick();

      expect(media.stopCount).toBe(0);
      expect(controller.getSnapshot().isPlaying).toBe(true);
    });

    it('stops while hidden when configured to', () => {
      setup({ continuousWhenHidden: false });
      controller.tick();
      host.visible = false;
      controller.tick();

      expect(media.stopCount).toBe(1);
      expect(controller.getSnapshot().isPlaying).toBe(false);
    });

    it('skips and removes an item whose file is missing', () => {
      setup();
      missing.add(pathOf('a'));
      controller.tick();

      expect(media.loads).toEqual([{ path: pathOf('b'), forceReload: false }]);
      expect(library.has('a')).toBe(false);
    });

    it('retries a refused load and then stops', () => {
      setup();
      media.acceptLoads = false;
      controller.tick();

      expect(media.loads).toHaveLength(4);
      expect(controller.getSnapshot().isPlaying).toBe(false);
      expect(controller.getSnapshot().retryCount).toBe(0);
    });
  });

  describe('stopped status', () => {
    it('treats an unexpected stop as a manual stop', () => {
      setup();
      const stopped = vi.fn<[StoppedEventData], void>();
      controller.on('stopped', stopped);
      controller.tick();
      media.report(MediaStatus.PLAYING, 1000, 60_000);
      controller.tick();

      media.report(MediaStatus.STOPPED);
      controller.tick();

      expect(media.stopCount).toBe(1);
      expect(stopped).toHaveBeenCalledWith({ itemId: 'a', reason: 'manual stop' });
      expect(controller.getSnapshot().isPlaying).toBe(false);
    });

    it('retries when the host still reports stopped after a restart', () => {
      setup();
      controller.tick();
      media.report(MediaStatus.STOPPED);
      controller.tick();
      // Stopped cleared the host; the next tick starts again
      controller.tick();
      expect(media.loads.map((load) => load.path)).toEqual([pathOf('a'), pathOf('b')]);

      media.report(MediaStatus.STOPPED);
      controller.tick();

      expect(media.loads.map((load) => load.path)).toEqual([pathOf('a'), pathOf('b'), pathOf('c')]);
      expect(controller.getSnapshot().retryCount).toBe(1);
    });

    it('clears the loop pin on a manual stop in loop mode', () => {
      setup({ mode: PlaybackMode.LOOP });
      controller.tick();
      expect(controller.getSnapshot().loopItemId).toBe('a');

      media.report(MediaStatus.STOPPED);
      controller.tick();

      expect(controller.getSnapshot().loopItemId).toBeNull();
    });
  });

  describe('none status', () => {
    it('keeps playing within the grace period and resets after it', () => {
      setup();
      controller.tick();
      media.report(MediaStatus.NONE);

      vi.advanceTimersByTime(4000);
      controller.tick();
      expect(controller.getSnapshot().isPlaying).toBe(true);

      vi.advanceTimersByTime(1000);
      controller.tick();
      expect(controller.getSnapshot().isPlaying).toBe(false);
      expect(controller.getSnapshot().currentItemId).toBeNull();
    });
  });

  describe('single mode', () => {
    it('stops instead of advancing once its item ends', () => {
      setup({ mode: PlaybackMode.SINGLE });
      controller.tick();
      expect(controller.getSnapshot().firstItemPlayed).toBe(true);

      media.report(MediaStatus.ENDED);
      controller.tick();
      controller.tick();

      expect(media.loads).toHaveLength(1);
      expect(media.stopCount).toBe(1);
      expect(controller.getSnapshot().isPlaying).toBe(false);
    });

    it('does not start again when the output becomes visible again', () => {
      setup({ mode: PlaybackMode.SINGLE });
      controller.tick();
      host.visible = false;
      controller.tick();
      expect(media.stopCount).toBe(1);

      host.visible = true;
      controller.tick();
      controller.tick();

      expect(media.loads).toHaveLength(1);
    });

    it('marks the playing item as the only one on switch', () => {
      setup();
      controller.tick();
      expect(controller.getSnapshot().firstItemPlayed).toBe(false);

      controller.setMode(PlaybackMode.SINGLE);
      expect(controller.getSnapshot().firstItemPlayed).toBe(true);

      media.report(MediaStatus.ENDED);
      controller.tick();
      expect(media.loads).toHaveLength(1);
      expect(controller.getSnapshot().isPlaying).toBe(false);
    });

    it('re-arms when switched to while idle', () => {
      setup({ mode: PlaybackMode.SINGLE });
      controller.tick();
      media.report(MediaStatus.ENDED);
      controller.tick();

      controller.setMode(PlaybackMode.CONTINUOUS);
      controller.setMode(PlaybackMode.SINGLE);
      expect(controller.getSnapshot().firstItemPlayed).toBe(false);

      controller.tick();
      expect(media.loads).toHaveLength(2);
    });
  });

  describe('loop mode', () => {
    it('replays the ended item after the restart delay', () => {
      setup({ mode: PlaybackMode.LOOP });
      controller.tick();
      media.report(MediaStatus.PLAYING, 1000, 60_000);
      controller.tick();

      media.report(MediaStatus.ENDED);
      controller.tick();
      expect(controller.getSnapshot().loopItemId).toBe('a');
      expect(controller.isLoopRestartPending()).toBe(true);

      // Repeated Ended reports do not schedule another restart
      controller.tick();
      vi.advanceTimersByTime(999);
      expect(media.loads).toHaveLength(1);

      vi.advanceTimersByTime(1);
      expect(media.loads).toEqual([
        { path: pathOf('a'), forceReload: false },
        { path: pathOf('a'), forceReload: true },
      ]);
      expect(controller.isLoopRestartPending()).toBe(true);

      media.report(MediaStatus.PLAYING, 500, 60_000);
      controller.tick();
      expect(controller.isLoopRestartPending()).toBe(false);
    });

    it('ignores stopped reports while a restart is pending', () => {
      setup({ mode: PlaybackMode.LOOP });
      controller.tick();
      media.report(MediaStatus.ENDED);
      controller.tick();

      media.report(MediaStatus.STOPPED);
      controller.tick();

      expect(media.stopCount).toBe(0);
      expect(controller.isLoopRestartPending()).toBe(true);
    });

    it('picks another item when the looped file disappears', () => {
      setup({ mode: PlaybackMode.LOOP });
      controller.tick();
      media.report(MediaStatus.ENDED);
      controller.tick();

      missing.add(pathOf('a'));
      vi.advanceTimersByTime(1000);

      expect(media.loads.map((load) => load.path)).toEqual([pathOf('a'), pathOf('b')]);
      expect(controller.getSnapshot().loopItemId).toBe('b');
      expect(library.has('a')).toBe(false);
    });

    it('stops and clears the pin when hidden', () => {
      setup({ mode: PlaybackMode.LOOP });
      controller.tick();
      host.visible = false;
      controller.tick();

      expect(media.stopCount).toBe(1);
      expect(controller.getSnapshot().loopItemId).toBeNull();
      expect(controller.getSnapshot().firstItemPlayed).toBe(false);
    });

    it('pins the playing item on switch and clears it on leaving', () => {
      setup();
      controller.tick();

      controller.setMode(PlaybackMode.LOOP);
      expect(controller.getSnapshot().loopItemId).toBe('a');

      controller.setMode(PlaybackMode.CONTINUOUS);
      expect(controller.getSnapshot().loopItemId).toBeNull();
    });
  });

  describe('overlay', () => {
    it('shows the title of a started item', () => {
      setup();
      controller.tick();
      expect(overlay.text).toBe('');

      vi.advanceTimersByTime(2500);
      expect(overlay.text).toBe('Title a - Artist');
      expect(overlay.opacity).toBe(100);
    });

    it('re-aims the clear after a seek', () => {
      setup();
      media.durationMs = 60_000;
      controller.tick();
      vi.advanceTimersByTime(2500);

      media.report(MediaStatus.PLAYING, 1000, 60_000);
      controller.tick();
      media.report(MediaStatus.PLAYING, 50_000, 60_000);
      controller.tick();

      vi.advanceTimersByTime(6499);
      expect(overlay.opacity).toBe(100);
      vi.advanceTimersByTime(1001);
      expect(overlay.opacity).toBe(0);
    });

    it('swaps the title when the playing item is updated', () => {
      setup();
      controller.tick();
      vi.advanceTimersByTime(2500);

      library.put('a', { localPath: pathOf('a'), title: 'Better', artist: 'Artist', metadataDegraded: false });
      vi.advanceTimersByTime(1000);
      expect(overlay.text).toBe('Better - Artist');

      vi.advanceTimersByTime(1000);
      expect(overlay.opacity).toBe(100);
    });

    it('shows only the updated title when the update lands before the show', () => {
      setup();
      controller.tick();
      vi.advanceTimersByTime(500);

      library.put('a', { localPath: pathOf('a'), title: 'Better', artist: 'Artist', metadataDegraded: false });
      vi.advanceTimersByTime(3000);
      expect(overlay.text).toBe('Better - Artist');
      expect(overlay.texts).not.toContain('Title a - Artist');
    });

    it('does not bring the title back after the end-of-item clear', () => {
      setup();
      media.durationMs = 10_000;
      controller.tick();
      vi.advanceTimersByTime(8000);
      expect(overlay.opacity).toBe(0);

      library.put('a', { localPath: pathOf('a'), title: 'Better', artist: 'Artist', metadataDegraded: false });
      vi.advanceTimersByTime(1500);
      expect(overlay.opacity).toBe(0);
    });
  });

  describe('shutdown', () => {
    it('stops playback and cancels every timer', () => {
      setup();
      const modeChanged = vi.fn();
      controller.on('modeChanged', modeChanged);
      controller.tick();
      vi.advanceTimersByTime(2500);

      host.shutdownRequested = true;
      controller.tick();

      expect(media.stopCount).toBe(1);
      expect(overlay.text).toBe('');
      expect(overlay.opacity).toBe(0);
      expect(controller.getSnapshot().isPlaying).toBe(false);

      const writes = overlay.texts.length;
      vi.advanceTimersByTime(10_000);
      controller.tick();
      expect(overlay.texts).toHaveLength(writes);
      expect(modeChanged).not.toHaveBeenCalled();
    });
  });
});
