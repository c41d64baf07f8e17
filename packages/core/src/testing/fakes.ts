import { MediaStatus } from '@loopcast/shared';
import type { HostSignals, MediaSourceAdapter, MediaStatusType, OverlayAdapter } from '@loopcast/shared';

/**
 * In-memory host adapters for tests
 */

export class FakeMediaSource implements MediaSourceAdapter {
  available = true;
  status: MediaStatusType = MediaStatus.NONE;
  durationMs = 0;
  positionMs = 0;
  activePath = '';
  acceptLoads = true;
  loads: Array<{ path: string; forceReload: boolean }> = [];
  stopCount = 0;

  isAvailable(): boolean {
    return this.available;
  }

  getStatus(): MediaStatusType {
    return this.status;
  }

  getDurationMs(): number {
    return this.durationMs;
  }

  getPositionMs(): number {
    return this.positionMs;
  }

  setLocalFile(path: string, forceReload: boolean): boolean {
    this.loads.push({ path, forceReload });
    if (!this.acceptLoads) {
      return false;
    }
    this.activePath = path;
    return true;
  }

  stopAndClear(): void {
    this.stopCount++;
    this.activePath = '';
    this.status = MediaStatus.NONE;
  }

  getActiveLocalPath(): string {
    return this.activePath;
  }

  /** Host reports `status` for the loaded item at `positionMs` */
  report(status: MediaStatusType, positionMs = this.positionMs, durationMs = this.durationMs): void {
    this.status = status;
    this.positionMs = positionMs;
    this.durationMs = durationMs;
  }
}

export class FakeOverlay implements OverlayAdapter {
  available = true;
  text = '';
  opacity = 100;
  texts: string[] = [];

  isAvailable(): boolean {
    return this.available;
  }

  setText(text: string): boolean {
    this.text = text;
    this.texts.push(text);
    return true;
  }

  setOpacity(percent: number): void {
    this.opacity = percent;
  }
}

export class FakeHost implements HostSignals {
  visible = true;
  shutdownRequested = false;

  isVisible(): boolean {
    return this.visible;
  }

  isShutdownRequested(): boolean {
    return this.shutdownRequested;
  }
}
