import blessed from 'blessed';
import type { LogRecordLevel } from '@loopcast/core';
import { escapeBlessedMarkup } from '../utils/formatters.js';

interface LogPanelOptions {
  maxLines?: number;
}

const LEVEL_COLORS: Record<LogRecordLevel, string> = {
  debug: 'gray',
  info: 'white',
  warn: 'yellow',
  error: 'red',
};

export class LogPanel {
  screen: blessed.Widgets.Screen;
  maxLines: number;
  box: blessed.Widgets.BoxElement;
  log: blessed.Widgets.Log;
  destroyed: boolean;

  constructor(screen: blessed.Widgets.Screen, options: LogPanelOptions = {}) {
    this.screen = screen;
    this.maxLines = options.maxLines ?? 500;
    this.destroyed = false;

    this.box = blessed.box({
      parent: this.screen,
      label: ' Log ',
      top: '50%',
      left: 0,
      width: '100%',
      bottom: 3,
      border: { type: 'line' },
      padding: 0,
      style: {
        border: { fg: 'gray' },
        label: { fg: 'white', bold: true }
      }
    });

    this.log = blessed.log({
      parent: this.box,
      top: 0,
      left: 0,
      right: 0,
      bottom: 0,
      tags: true,
      keys: false,
      mouse: true,
      scrollable: true,
      alwaysScroll: true,
      scrollback: this.maxLines,
      scrollbar: {
        ch: '│',
        track: { bg: 'gray' },
        style: { bg: 'gray' }
      },
      style: {
        fg: 'gray',
        bg: 'default'
      }
    });
  }

  /** Logger sink: one formatted record per line */
  write(level: LogRecordLevel, line: string): void {
    if (this.destroyed) return;
    const color = LEVEL_COLORS[level];
    this.log.log(`{${color}-fg}${escapeBlessedMarkup(line)}{/${color}-fg}`);
    this.screen.render();
  }

  destroy(): void {
    this.destroyed = true;
  }
}
