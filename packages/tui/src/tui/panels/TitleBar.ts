import blessed from 'blessed';
import type { PlaybackModeType } from '@loopcast/shared';
import { formatModeLabel } from '../utils/formatters.js';

export class TitleBar {
  screen: blessed.Widgets.Screen;
  box: blessed.Widgets.BoxElement;
  leftBox: blessed.Widgets.BoxElement;
  rightBox: blessed.Widgets.BoxElement;

  constructor(screen: blessed.Widgets.Screen) {
    this.screen = screen;

    this.box = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: 1,
      tags: true,
      style: {
        fg: 'white',
        bg: 'blue'
      }
    });

    this.leftBox = blessed.box({
      parent: this.box,
      top: 0,
      left: 0,
      width: '50%',
      height: 1,
      tags: true,
      content: '{bold} ♪ Loopcast{/bold}',
      style: {
        fg: 'white',
        bg: 'blue'
      }
    });

    // Right side: mode and visibility
    this.rightBox = blessed.box({
      parent: this.box,
      top: 0,
      right: 0,
      width: '50%',
      height: 1,
      tags: true,
      align: 'right',
      style: {
        fg: 'white',
        bg: 'blue'
      }
    });
  }

  setStatus(mode: PlaybackModeType, visible: boolean): void {
    const visibility = visible
      ? '{green-fg}●{/green-fg} Visible'
      : '{red-fg}○{/red-fg} {gray-fg}Hidden{/gray-fg}';
    this.rightBox.setContent(`{yellow-fg}${formatModeLabel(mode)}{/yellow-fg}  ${visibility} `);
  }
}
