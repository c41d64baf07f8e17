import { EventEmitter } from 'events';
import { execFile, spawn } from 'child_process';
import {
  DURATION_PROBE_TIMEOUT,
  MediaSourceError,
  MediaStatus,
  PROCESS_KILL_TIMEOUT,
  getErrorMessage,
  isFileNotFoundError,
} from '@loopcast/shared';
import type { MediaSourceAdapter, MediaStatusType } from '@loopcast/shared';
import { logger } from '@loopcast/core';

export interface PlayerCommand {
  cmd: string;
  args: string[];
}

/** The part of a ChildProcess the media source relies on */
export interface PlayerProcess extends EventEmitter {
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnPlayer = (cmd: string, args: string[]) => PlayerProcess;

/** Resolves the duration of a file in ms, 0 when unknown */
export type DurationProbe = (filePath: string) => Promise<number>;

export interface ProcessMediaSourceOptions {
  command?: PlayerCommand;
  spawnPlayer?: SpawnPlayer;
  probeDuration?: DurationProbe;
  now?: () => number;
  killTimeoutMs?: number;
}

interface ActivePlayer {
  process: PlayerProcess;
  path: string;
  startedAt: number;
  endedAt: number | null;
  closed: boolean;
}

/**
 * Pick the external player.
 * An explicit command line wins; otherwise afplay on macOS and ffplay elsewhere.
 */
export function resolvePlayerCommand(
  commandLine: string | null,
  platform: NodeJS.Platform = process.platform
): PlayerCommand {
  const parts = commandLine?.trim().split(/\s+/).filter((part) => part.length > 0) ?? [];
  const [cmd, ...args] = parts;
  if (cmd) {
    return { cmd, args };
  }
  if (platform === 'darwin') {
    return { cmd: 'afplay', args: [] };
  }
  return { cmd: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'quiet'] };
}

const spawnDetachedStdio: SpawnPlayer = (cmd, args) =>
  // 'ignore' keeps the player from filling a pipe nobody reads
  spawn(cmd, args, { stdio: ['ignore', 'ignore', 'ignore'] });

export const probeWithFfprobe: DurationProbe = (filePath) =>
  new Promise((resolve, reject) => {
    execFile(
      'ffprobe',
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      { timeout: DURATION_PROBE_TIMEOUT },
      (error, stdout) => {
        if (error) {
          reject(error);
          return;
        }
        const seconds = Number.parseFloat(stdout.trim());
        resolve(Number.isFinite(seconds) && seconds > 0 ? Math.round(seconds * 1000) : 0);
      }
    );
  });

/**
 * Media slot backed by one external player process per item.
 *
 * Status follows the process: PLAYING while it runs, ENDED when it exits
 * cleanly, STOPPED when it fails or is stopped by the user, NONE when
 * nothing is loaded. Position is wall-clock time since spawn.
 */
export class ProcessMediaSource implements MediaSourceAdapter {
  private readonly command: PlayerCommand;
  private readonly spawnPlayer: SpawnPlayer;
  private readonly probeDuration: DurationProbe;
  private readonly now: () => number;
  private readonly killTimeoutMs: number;
  private readonly durations = new Map<string, number>();
  private readonly probing = new Set<string>();

  private active: ActivePlayer | null = null;
  private status: MediaStatusType = MediaStatus.NONE;
  private available = true;

  constructor(options: ProcessMediaSourceOptions = {}) {
    this.command = options.command ?? resolvePlayerCommand(null);
    this.spawnPlayer = options.spawnPlayer ?? spawnDetachedStdio;
    this.probeDuration = options.probeDuration ?? probeWithFfprobe;
    this.now = options.now ?? Date.now;
    this.killTimeoutMs = options.killTimeoutMs ?? PROCESS_KILL_TIMEOUT;
  }

  isAvailable(): boolean {
    return this.available;
  }

  getStatus(): MediaStatusType {
    return this.status;
  }

  getDurationMs(): number {
    if (!this.active) return 0;
    return this.durations.get(this.active.path) ?? 0;
  }

  getPositionMs(): number {
    const active = this.active;
    if (!active) return 0;
    const elapsed = (active.endedAt ?? this.now()) - active.startedAt;
    const duration = this.getDurationMs();
    return duration > 0 ? Math.min(elapsed, duration) : elapsed;
  }

  getActiveLocalPath(): string {
    return this.active?.path ?? '';
  }

  setLocalFile(filePath: string, forceReload: boolean): boolean {
    if (!this.available) return false;

    if (!forceReload && this.active?.path === filePath && this.status === MediaStatus.PLAYING) {
      return true;
    }

    this.detach();

    let child: PlayerProcess;
    try {
      child = this.spawnPlayer(this.command.cmd, [...this.command.args, filePath]);
    } catch (error: unknown) {
      logger.error('Media', 'Failed to start player', error, { cmd: this.command.cmd, path: filePath });
      this.status = MediaStatus.NONE;
      return false;
    }

    const active: ActivePlayer = {
      process: child,
      path: filePath,
      startedAt: this.now(),
      endedAt: null,
      closed: false,
    };
    this.active = active;
    this.status = MediaStatus.PLAYING;

    // Listeners stay attached after a reload; events from a replaced process are ignored
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      active.closed = true;
      if (this.active !== active || this.status !== MediaStatus.PLAYING) return;
      active.endedAt = this.now();
      // Killed from outside counts as a stop, not a natural end
      const clean = code === 0 || (code === null && signal === null);
      this.status = clean ? MediaStatus.ENDED : MediaStatus.STOPPED;
      logger.debug('Media', 'Player exited', { code, signal, path: filePath });
    });

    child.once('error', (error: Error) => {
      active.closed = true;
      if (this.active !== active) return;
      active.endedAt = this.now();
      this.status = MediaStatus.STOPPED;
      if (isFileNotFoundError(error)) {
        this.available = false;
      }
      logger.error(
        'Media',
        'Player process failed',
        new MediaSourceError(`Player "${this.command.cmd}" failed: ${getErrorMessage(error)}`, {
          cause: error,
          localPath: filePath,
        })
      );
    });

    void this.probe(filePath);
    return true;
  }

  /** User-initiated stop; keeps the item loaded so the controller sees STOPPED */
  stop(): void {
    const active = this.active;
    if (!active || this.status !== MediaStatus.PLAYING) return;
    this.status = MediaStatus.STOPPED;
    active.endedAt = this.now();
    this.terminate(active);
  }

  stopAndClear(): void {
    this.detach();
    this.status = MediaStatus.NONE;
  }

  dispose(): void {
    this.stopAndClear();
    this.available = false;
  }

  private detach(): void {
    const active = this.active;
    this.active = null;
    if (active) {
      this.terminate(active);
    }
  }

  /** SIGTERM first, SIGKILL if the process outlives the kill timeout */
  private terminate(active: ActivePlayer): void {
    if (active.closed) return;
    try {
      active.process.kill('SIGTERM');
    } catch (error: unknown) {
      logger.debug('Media', 'SIGTERM failed', { error: getErrorMessage(error) });
      return;
    }

    const forceKill = setTimeout(() => {
      if (active.closed) return;
      try {
        active.process.kill('SIGKILL');
      } catch (error: unknown) {
        logger.debug('Media', 'SIGKILL failed', { error: getErrorMessage(error) });
      }
    }, this.killTimeoutMs);
    forceKill.unref();
    active.process.once('close', () => clearTimeout(forceKill));
  }

  private async probe(filePath: string): Promise<void> {
    if (this.durations.has(filePath) || this.probing.has(filePath)) return;
    this.probing.add(filePath);
    try {
      const duration = await this.probeDuration(filePath);
      if (duration > 0) {
        this.durations.set(filePath, duration);
      }
    } catch (error: unknown) {
      logger.warn('Media', 'Could not read duration', { path: filePath, error: getErrorMessage(error) });
    } finally {
      this.probing.delete(filePath);
    }
  }
}
