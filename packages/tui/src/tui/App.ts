import blessed from 'blessed';
import {
  PlaybackMode,
  UIConfig,
  formatTitleText,
  getErrorMessage,
  toTitleInfo,
} from '@loopcast/shared';
import type {
  HostSignals,
  ItemStartedEventData,
  MediaSourceAdapter,
  ModeChangedEventData,
  PlaybackModeType,
  StoppedEventData,
} from '@loopcast/shared';
import type { PlaybackController } from '@loopcast/core';
import { LogPanel } from './panels/LogPanel.js';
import { NowPlayingPanel } from './panels/NowPlayingPanel.js';
import { OverlayPanel } from './panels/OverlayPanel.js';
import { StatusBar } from './panels/StatusBar.js';
import { TitleBar } from './panels/TitleBar.js';
import { formatModeLabel } from './utils/formatters.js';
import { helpText } from './utils/keyBindings.js';

type KeyHandler = () => void;

interface AppPanels {
  titleBar: TitleBar;
  overlay: OverlayPanel;
  nowPlaying: NowPlayingPanel;
  log: LogPanel;
  statusBar: StatusBar;
}

/** What the keys do outside the controller */
export interface AppActions {
  stopCurrent(): void;
  rescan(): Promise<number>;
  clearHistory(): Promise<void>;
  quit(): void;
}

interface AppOptions {
  media: MediaSourceAdapter;
  actions: AppActions;
  refreshIntervalMs?: number;
}

interface ControllerListeners {
  itemStarted: (data: ItemStartedEventData) => void;
  stopped: (data: StoppedEventData) => void;
  modeChanged: (data: ModeChangedEventData) => void;
  tickFailed: (error: Error) => void;
}

/**
 * Terminal host. Owns the screen, serves as the overlay slot and
 * the visibility / shutdown signals the controller reads every tick.
 */
export class App implements HostSignals {
  media: MediaSourceAdapter;
  actions: AppActions;
  screen: blessed.Widgets.Screen;
  panels: AppPanels;
  controller: PlaybackController | null;
  visible: boolean;
  shutdownRequested: boolean;
  dialogActive: boolean;
  refreshIntervalMs: number;
  private activeDialogCleanup: (() => void) | null;
  private keyHandlers: Array<[string[], KeyHandler]>;
  private controllerListeners: ControllerListeners | null;
  private refreshTimer: ReturnType<typeof setInterval> | null;

  constructor(options: AppOptions) {
    this.media = options.media;
    this.actions = options.actions;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 500;
    this.controller = null;
    this.visible = true;
    this.shutdownRequested = false;
    this.dialogActive = false;
    this.activeDialogCleanup = null;
    this.keyHandlers = [];
    this.controllerListeners = null;
    this.refreshTimer = null;

    this.screen = blessed.screen({
      smartCSR: true,
      title: 'Loopcast',
      fullUnicode: true,
      warnings: false
    });

    // Title bar on top, overlay under it, log above the status bar
    this.panels = {
      titleBar: new TitleBar(this.screen),
      overlay: new OverlayPanel(this.screen),
      nowPlaying: new NowPlayingPanel(this.screen),
      log: new LogPanel(this.screen),
      statusBar: new StatusBar(this.screen),
    };

    this.setupKeyBindings();
  }

  // ─────────────────────────────────────────────────────────────
  // HostSignals
  // ─────────────────────────────────────────────────────────────

  isVisible(): boolean {
    return this.visible;
  }

  isShutdownRequested(): boolean {
    return this.shutdownRequested;
  }

  // ─────────────────────────────────────────────────────────────
  // Controller wiring
  // ─────────────────────────────────────────────────────────────

  attachController(controller: PlaybackController): void {
    this.detachController();
    this.controller = controller;

    const listeners: ControllerListeners = {
      itemStarted: ({ item }) => {
        this.panels.statusBar.showInfo(`Playing: ${formatTitleText(toTitleInfo(item))}`);
        this.refresh();
      },
      stopped: ({ reason }) => {
        this.panels.statusBar.showInfo(`Stopped (${reason})`);
        this.refresh();
      },
      modeChanged: ({ mode }) => {
        this.panels.statusBar.showSuccess(`${formatModeLabel(mode)} mode`);
        this.refresh();
      },
      tickFailed: (error) => {
        this.panels.statusBar.showError(error.message);
      },
    };

    controller.on('itemStarted', listeners.itemStarted);
    controller.on('stopped', listeners.stopped);
    controller.on('modeChanged', listeners.modeChanged);
    controller.on('tickFailed', listeners.tickFailed);
    this.controllerListeners = listeners;
  }

  private detachController(): void {
    const controller = this.controller;
    const listeners = this.controllerListeners;
    if (!controller || !listeners) return;

    controller.off('itemStarted', listeners.itemStarted);
    controller.off('stopped', listeners.stopped);
    controller.off('modeChanged', listeners.modeChanged);
    controller.off('tickFailed', listeners.tickFailed);
    this.controllerListeners = null;
    this.controller = null;
  }

  // ─────────────────────────────────────────────────────────────
  // Keys
  // ─────────────────────────────────────────────────────────────

  private setupKeyBindings(): void {
    const bind = (keys: string[], handler: KeyHandler): void => {
      const guarded = (): void => {
        if (this.dialogActive) return;
        handler();
      };
      this.screen.key(keys, guarded);
      this.keyHandlers.push([keys, guarded]);
    };

    bind(['q', 'C-c'], () => this.requestShutdown());
    bind(['?'], () => this.showHelp());

    bind(['1'], () => this.setMode(PlaybackMode.CONTINUOUS));
    bind(['2'], () => this.setMode(PlaybackMode.SINGLE));
    bind(['3'], () => this.setMode(PlaybackMode.LOOP));

    bind(['v'], () => {
      this.visible = !this.visible;
      this.panels.statusBar.showInfo(this.visible ? 'Output shown' : 'Output hidden');
      this.refresh();
    });

    bind(['s'], () => this.actions.stopCurrent());

    bind(['r'], () => {
      this.actions.rescan()
        .then((added) => this.panels.statusBar.showSuccess(`Rescan done: ${added} new item(s)`))
        .catch((error: unknown) => this.panels.statusBar.showError(`Rescan failed: ${getErrorMessage(error)}`));
    });

    bind(['h'], () => {
      this.actions.clearHistory()
        .then(() => this.panels.statusBar.showSuccess('Play history cleared'))
        .catch((error: unknown) => this.panels.statusBar.showError(`Clear failed: ${getErrorMessage(error)}`));
    });
  }

  private setMode(mode: PlaybackModeType): void {
    if (!this.controller || this.controller.getMode() === mode) return;
    this.controller.setMode(mode);
  }

  requestShutdown(): void {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;
    this.actions.quit();
  }

  showHelp(): void {
    // Clean up any existing dialog first to prevent listener accumulation
    this.activeDialogCleanup?.();

    this.dialogActive = true;

    const helpBox = blessed.box({
      parent: this.screen,
      top: 'center',
      left: 'center',
      width: 56,
      height: 24,
      content: helpText,
      tags: true,
      border: { type: 'line' },
      style: {
        border: { fg: 'yellow' },
        bg: 'black'
      }
    });

    this.screen.render();

    let closed = false;
    const helpKeys = ['escape', 'q', '?', 'enter'];
    const closeHelp = (): void => {
      if (closed) return;
      closed = true;
      this.dialogActive = false;
      this.activeDialogCleanup = null;
      this.screen.unkey(helpKeys.join(','), closeHelp);
      helpBox.destroy();
      this.screen.render();
    };

    this.activeDialogCleanup = closeHelp;
    this.screen.onceKey(helpKeys.join(','), closeHelp);
  }

  // ─────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────

  refresh(): void {
    const controller = this.controller;
    if (!controller) return;

    const snapshot = controller.getSnapshot();
    this.panels.titleBar.setStatus(snapshot.mode, this.visible);
    this.panels.nowPlaying.update({
      snapshot,
      positionMs: this.media.getPositionMs(),
      durationMs: this.media.getDurationMs(),
      opacity: controller.getOverlayOpacity(),
      loopRestartPending: controller.isLoopRestartPending(),
    });
    this.screen.render();
  }

  run(): void {
    const width = Number(this.screen.width);
    const height = Number(this.screen.height);
    if (width < UIConfig.MIN_TERMINAL_WIDTH || height < UIConfig.MIN_TERMINAL_HEIGHT) {
      this.panels.statusBar.showError(
        `Terminal is ${width}x${height}, at least ${UIConfig.MIN_TERMINAL_WIDTH}x${UIConfig.MIN_TERMINAL_HEIGHT} recommended`
      );
    }

    this.refresh();
    this.refreshTimer = setInterval(() => this.refresh(), this.refreshIntervalMs);
    this.screen.render();
  }

  destroy(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }

    this.activeDialogCleanup?.();

    for (const [keys, handler] of this.keyHandlers) {
      this.screen.unkey(keys.join(','), handler);
    }
    this.keyHandlers = [];

    this.detachController();
    this.panels.statusBar.destroy();
    this.panels.overlay.destroy();
    this.panels.log.destroy();
    this.screen.destroy();
  }
}
