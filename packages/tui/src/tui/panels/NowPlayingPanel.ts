import blessed from 'blessed';
import type { PlaybackSnapshot } from '@loopcast/shared';
import { escapeBlessedMarkup, formatModeLabel, formatProgress, truncate } from '../utils/formatters.js';

export interface NowPlayingView {
  snapshot: PlaybackSnapshot;
  positionMs: number;
  durationMs: number;
  opacity: number;
  loopRestartPending: boolean;
}

export class NowPlayingPanel {
  screen: blessed.Widgets.Screen;
  box: blessed.Widgets.BoxElement;

  constructor(screen: blessed.Widgets.Screen) {
    this.screen = screen;

    this.box = blessed.box({
      parent: this.screen,
      label: ' Now Playing ',
      top: 4,
      left: 0,
      width: '100%',
      height: '50%-4',
      border: { type: 'line' },
      tags: true,
      padding: { left: 1, right: 1 },
      style: {
        border: { fg: 'cyan' },
        label: { fg: 'white', bold: true }
      }
    });
  }

  update(view: NowPlayingView): void {
    const { snapshot } = view;
    const width = typeof this.box.width === 'number' ? Math.max(20, this.box.width - 6) : 60;
    const lines: string[] = [];

    const item = snapshot.currentItem;
    if (item && snapshot.isPlaying) {
      lines.push(`{bold}${escapeBlessedMarkup(truncate(item.title, width))}{/bold}`);
      lines.push(`{gray-fg}${escapeBlessedMarkup(truncate(item.artist, width))}{/gray-fg}`);
      lines.push(formatProgress(view.positionMs, view.durationMs));
    } else if (view.loopRestartPending) {
      lines.push('{yellow-fg}Restarting loop...{/yellow-fg}');
    } else if (snapshot.librarySize === 0) {
      lines.push('{gray-fg}Waiting for items in the cache directory{/gray-fg}');
    } else {
      lines.push('{gray-fg}Stopped{/gray-fg}');
    }

    lines.push('');
    lines.push(
      `Mode: {yellow-fg}${formatModeLabel(snapshot.mode)}{/yellow-fg}` +
      `  Library: ${snapshot.librarySize}` +
      `  Played: ${snapshot.playedCount}` +
      `  Title: ${view.opacity}%`
    );
    if (snapshot.loopItemId) {
      lines.push(`{gray-fg}Loop pinned: ${escapeBlessedMarkup(snapshot.loopItemId)}{/gray-fg}`);
    }
    if (snapshot.retryCount > 0) {
      lines.push(`{red-fg}Retries: ${snapshot.retryCount}{/red-fg}`);
    }

    this.box.setContent(lines.join('\n'));
  }
}
