import blessed from 'blessed';
import type { OverlayAdapter } from '@loopcast/shared';
import { escapeBlessedMarkup, opacityToColor } from '../utils/formatters.js';

/**
 * Title text slot on the terminal. Fades are rendered as grey levels.
 */
export class OverlayPanel implements OverlayAdapter {
  screen: blessed.Widgets.Screen;
  box: blessed.Widgets.BoxElement;
  destroyed: boolean;

  constructor(screen: blessed.Widgets.Screen) {
    this.screen = screen;
    this.destroyed = false;

    this.box = blessed.box({
      parent: this.screen,
      top: 1,
      left: 0,
      width: '100%',
      height: 3,
      tags: true,
      align: 'center',
      border: { type: 'line' },
      style: {
        fg: opacityToColor(0),
        bold: true,
        border: { fg: 'gray' }
      }
    });
  }

  isAvailable(): boolean {
    return !this.destroyed;
  }

  setText(text: string): boolean {
    if (this.destroyed) return false;
    this.box.setContent(escapeBlessedMarkup(text));
    this.screen.render();
    return true;
  }

  setOpacity(percent: number): void {
    if (this.destroyed) return;
    this.box.style.fg = opacityToColor(percent);
    this.screen.render();
  }

  destroy(): void {
    this.destroyed = true;
  }
}
