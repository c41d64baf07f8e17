import blessed from 'blessed';
import { ERROR_DISPLAY_DURATION, STATUS_MESSAGE_DURATION, UIConfig } from '@loopcast/shared';
import { getStatusBarText } from '../utils/keyBindings.js';
import { escapeBlessedMarkup } from '../utils/formatters.js';

export class StatusBar {
  screen: blessed.Widgets.Screen;
  messageTimeout: ReturnType<typeof setTimeout> | null;
  box: blessed.Widgets.BoxElement;
  content: blessed.Widgets.TextElement | null;

  constructor(screen: blessed.Widgets.Screen) {
    this.screen = screen;
    this.messageTimeout = null;

    this.box = blessed.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: '100%',
      height: UIConfig.STATUS_BAR_HEIGHT,
      border: { type: 'line' },
      style: {
        border: { fg: 'white' },
        bg: 'black'
      }
    });

    this.content = blessed.text({
      parent: this.box,
      top: 0,
      left: 1,
      width: '100%-4',
      height: 1,
      content: getStatusBarText(),
      tags: true,
      style: {
        fg: 'white'
      }
    });
  }

  showError(message: string): void {
    this.showMessageRaw(`{red-fg}Error: ${escapeBlessedMarkup(message)}{/red-fg}`, ERROR_DISPLAY_DURATION);
  }

  showSuccess(message: string): void {
    this.showMessageRaw(`{green-fg}${escapeBlessedMarkup(message)}{/green-fg}`);
  }

  showInfo(message: string): void {
    this.showMessageRaw(`{cyan-fg}${escapeBlessedMarkup(message)}{/cyan-fg}`);
  }

  private showMessageRaw(formattedMessage: string, duration = STATUS_MESSAGE_DURATION): void {
    if (this.messageTimeout) {
      clearTimeout(this.messageTimeout);
    }

    // Guard against destroyed elements
    if (!this.content) return;

    this.content.setContent(formattedMessage);
    this.screen.render();

    this.messageTimeout = setTimeout(() => {
      this.messageTimeout = null;
      if (!this.content) return;
      this.content.setContent(getStatusBarText());
      this.screen.render();
    }, duration);
  }

  destroy(): void {
    if (this.messageTimeout) {
      clearTimeout(this.messageTimeout);
      this.messageTimeout = null;
    }
    // Timeout callbacks check this before touching the element
    this.content = null;
  }
}
