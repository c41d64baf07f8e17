import { clampPercent, formatTitleText } from '@loopcast/shared';
import type { FadeDirection, OverlayAdapter, TitleInfo } from '@loopcast/shared';
import type { OverlayTimerToken, Scheduler, TimerHandle } from './scheduler.js';
import type { PlaybackTimings } from '../config/index.js';
import { logger } from '../utils/logger.js';

const COMPONENT = 'TitleOverlay';

export type OverlayTimings = Pick<
  PlaybackTimings,
  | 'titleShowDelayMs'
  | 'titleClearLeadMs'
  | 'durationCheckDelayMs'
  | 'durationPollIntervalMs'
  | 'fadeDurationMs'
  | 'fadeSteps'
  | 'fadeEpsilon'
>;

export interface TitleOverlayOptions {
  adapter: OverlayAdapter;
  scheduler: Scheduler;
  /** Duration of the loaded media in ms, 0 while unknown */
  getDurationMs: () => number;
  timings: OverlayTimings;
}

/**
 * Title overlay timing: delayed show, clear ahead of the item's end and
 * an opacity ramp driven by a repeating timer.
 *
 * At most one show, one clear, one duration poll and one fade timer are
 * outstanding; scheduling any of them cancels its predecessor.
 */
export class TitleOverlay {
  private adapter: OverlayAdapter;
  private scheduler: Scheduler;
  private getDurationMs: () => number;
  private timings: OverlayTimings;

  private currentOpacity: number;
  private targetOpacity: number;
  private opacityStep: number;
  private fadeDirection: FadeDirection | null;

  // Title waiting for the show timer
  private pendingTitle: TitleInfo | null;
  // Title to swap in once a fade-out reaches 0
  private pendingSwap: TitleInfo | null;
  private clearScheduled: boolean;
  // Past the end-of-item clear; updates change the text but stay hidden
  private cleared: boolean;

  private showTimer: TimerHandle | null;
  private clearTimer: TimerHandle | null;
  private durationTimer: TimerHandle | null;
  private fadeTimer: TimerHandle | null;

  constructor(options: TitleOverlayOptions) {
    this.adapter = options.adapter;
    this.scheduler = options.scheduler;
    this.getDurationMs = options.getDurationMs;
    this.timings = options.timings;

    this.currentOpacity = 100;
    this.targetOpacity = 100;
    this.opacityStep = 0;
    this.fadeDirection = null;

    this.pendingTitle = null;
    this.pendingSwap = null;
    this.clearScheduled = false;
    this.cleared = false;

    this.showTimer = null;
    this.clearTimer = null;
    this.durationTimer = null;
    this.fadeTimer = null;
  }

  handleTimer(token: OverlayTimerToken): void {
    switch (token.kind) {
      case 'titleShow':
        this.onShow();
        break;
      case 'titleClear':
        this.onClear();
        break;
      case 'durationCheck':
        this.onDurationCheck();
        break;
      case 'fadeStep':
        this.onFadeStep();
        break;
    }
  }

  // ============================================
  // Show
  // ============================================

  /**
   * Blank the overlay now and show `title` after the show delay.
   */
  scheduleShow(title: TitleInfo): void {
    this.scheduler.cancel(this.showTimer);
    this.pendingTitle = title;
    this.cleared = false;

    // New item: jump to 0 without a fade
    this.cancelFade();
    this.pendingSwap = null;
    this.setOpacityNow(0);
    this.adapter.setText('');

    this.showTimer = this.scheduler.schedule(this.timings.titleShowDelayMs, { kind: 'titleShow' });
    logger.debug(COMPONENT, `Scheduled title show in ${this.timings.titleShowDelayMs / 1000}s`);
  }

  private onShow(): void {
    this.showTimer = null;
    const title = this.pendingTitle;
    this.pendingTitle = null;
    if (!title) return;

    const text = formatTitleText(title);
    logger.debug(COMPONENT, `Showing title: ${text}`);
    this.adapter.setText(text);
    this.fadeIn();
  }

  // ============================================
  // Clear
  // ============================================

  /**
   * Poll for the media duration, then schedule the clear from the start.
   */
  scheduleClearWhenDurationKnown(): void {
    this.scheduler.cancel(this.durationTimer);
    this.durationTimer = this.scheduler.schedule(this.timings.durationCheckDelayMs, { kind: 'durationCheck' });
  }

  private onDurationCheck(): void {
    this.durationTimer = null;
    const duration = this.getDurationMs();
    if (duration > 0) {
      logger.debug(COMPONENT, `Got duration after delay: ${(duration / 1000).toFixed(1)}s`);
      this.scheduleClear(duration);
      return;
    }
    this.durationTimer = this.scheduler.schedule(this.timings.durationPollIntervalMs, { kind: 'durationCheck' });
  }

  /**
   * Schedule the clear relative to the start of an item of `durationMs`.
   */
  scheduleClear(durationMs: number): void {
    this.scheduler.cancel(this.clearTimer);
    this.clearTimer = null;

    const clearInMs = durationMs - this.timings.titleClearLeadMs;
    if (clearInMs > 0) {
      this.clearTimer = this.scheduler.schedule(clearInMs, { kind: 'titleClear' });
      this.clearScheduled = true;
      logger.debug(COMPONENT, `Scheduled title fade out in ${(clearInMs / 1000).toFixed(1)}s`);
    }
  }

  /**
   * Re-aim the clear from the current remaining time. Fades out at once when
   * less than the lead time is left.
   */
  scheduleClearFromRemaining(remainingMs: number): void {
    this.scheduler.cancel(this.clearTimer);
    this.clearTimer = null;

    const clearInMs = remainingMs - this.timings.titleClearLeadMs;
    if (clearInMs > 0) {
      this.clearTimer = this.scheduler.schedule(clearInMs, { kind: 'titleClear' });
      this.clearScheduled = true;
      logger.debug(COMPONENT, `Scheduled title fade out in ${(clearInMs / 1000).toFixed(1)}s`, {
        remainingMs,
      });
      return;
    }

    this.clearScheduled = false;
    this.cleared = true;
    if (this.currentOpacity > 0) {
      logger.debug(COMPONENT, 'Time to fade out has passed, fading immediately');
      this.fadeOut();
    }
  }

  private onClear(): void {
    this.clearTimer = null;
    this.clearScheduled = false;
    this.cleared = true;
    logger.debug(COMPONENT, 'Fading out title before end');
    this.fadeOut();
  }

  isClearScheduled(): boolean {
    return this.clearScheduled;
  }

  // ============================================
  // Text swap
  // ============================================

  /**
   * Replace the visible title with a fade: out, swap, in.
   * Before the show delay has elapsed the pending title is replaced instead;
   * after the end-of-item clear the text changes without fading back in.
   */
  changeTitle(title: TitleInfo): void {
    if (this.showTimer !== null) {
      this.pendingTitle = title;
      return;
    }
    if (this.currentOpacity > 0) {
      this.pendingSwap = title;
      this.fadeOut();
      return;
    }
    const text = formatTitleText(title);
    this.adapter.setText(text);
    if (text && !this.cleared) {
      this.fadeIn();
    }
  }

  // ============================================
  // Fade
  // ============================================

  fadeIn(): void {
    this.startTransition(100, 'in');
  }

  fadeOut(): void {
    if (this.currentOpacity <= 0) return;
    if (this.fadeDirection === 'out' && this.fadeTimer !== null) return;
    this.startTransition(0, 'out');
  }

  private startTransition(target: number, direction: FadeDirection): void {
    this.cancelFade();
    this.targetOpacity = target;
    this.fadeDirection = direction;

    const range = Math.abs(target - this.currentOpacity);
    if (range <= 0) return;

    this.opacityStep = (direction === 'out' ? -range : range) / this.timings.fadeSteps;
    const interval = Math.max(1, Math.floor(this.timings.fadeDurationMs / this.timings.fadeSteps));
    this.fadeTimer = this.scheduler.scheduleRepeating(interval, { kind: 'fadeStep' });
    logger.debug(COMPONENT, `Starting title fade ${direction}`, {
      from: this.currentOpacity,
      to: target,
    });
  }

  private onFadeStep(): void {
    let next = this.currentOpacity + this.opacityStep;
    next = this.fadeDirection === 'in'
      ? Math.min(next, this.targetOpacity)
      : Math.max(next, this.targetOpacity);
    this.currentOpacity = next;
    this.adapter.setOpacity(clampPercent(next));

    if (Math.abs(next - this.targetOpacity) >= this.timings.fadeEpsilon) {
      return;
    }

    this.cancelFade();
    this.setOpacityNow(this.targetOpacity);

    if (this.fadeDirection === 'out' && this.currentOpacity === 0 && this.pendingSwap) {
      const swap = this.pendingSwap;
      this.pendingSwap = null;
      this.adapter.setText(formatTitleText(swap));
      if (!this.cleared) {
        this.fadeIn();
      }
    }
  }

  private cancelFade(): void {
    this.scheduler.cancel(this.fadeTimer);
    this.fadeTimer = null;
  }

  private setOpacityNow(percent: number): void {
    this.currentOpacity = percent;
    this.adapter.setOpacity(clampPercent(percent));
  }

  isFading(): boolean {
    return this.fadeTimer !== null;
  }

  getOpacity(): number {
    return this.currentOpacity;
  }

  getFadeDirection(): FadeDirection | null {
    return this.fadeDirection;
  }

  // ============================================
  // Teardown
  // ============================================

  /**
   * Cancel show, clear and duration timers. A running fade continues.
   */
  cancelTimers(): void {
    this.scheduler.cancel(this.showTimer);
    this.scheduler.cancel(this.clearTimer);
    this.scheduler.cancel(this.durationTimer);
    this.showTimer = null;
    this.clearTimer = null;
    this.durationTimer = null;
    this.pendingTitle = null;
    this.clearScheduled = false;
    this.cleared = false;
  }

  /**
   * Playback stopped: fade what is visible and empty the text.
   */
  clearForStop(): void {
    this.cancelTimers();
    this.pendingSwap = null;
    if (this.currentOpacity > 0) {
      this.fadeOut();
    }
    this.adapter.setText('');
  }

  /**
   * Shutdown: cancel everything, including the fade, and blank the overlay.
   */
  reset(): void {
    this.cancelTimers();
    this.cancelFade();
    this.pendingSwap = null;
    this.fadeDirection = null;
    this.setOpacityNow(0);
    this.adapter.setText('');
  }
}
