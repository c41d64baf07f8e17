import path from 'path';
import fs from 'fs-extra';
import { PLAY_HISTORY_FILENAME, isStringArray } from '@loopcast/shared';
import { logger } from '../utils/logger.js';

const COMPONENT = 'PlayHistory';

interface PlayHistoryFile {
  played_videos: string[];
}

function readPlayedIds(data: unknown): string[] | null {
  // Legacy files hold a bare array
  if (isStringArray(data)) {
    return data;
  }
  if (data && typeof data === 'object' && 'played_videos' in data && isStringArray(data.played_videos)) {
    return data.played_videos;
  }
  return null;
}

/**
 * Played-set persistence across restarts, stored as JSON in the cache directory.
 */
export class PlayHistory {
  readonly filePath: string;

  constructor(cacheDir: string) {
    this.filePath = path.join(cacheDir, PLAY_HISTORY_FILENAME);
  }

  /**
   * Missing or unreadable files load as an empty history.
   */
  async load(): Promise<string[]> {
    if (!(await fs.pathExists(this.filePath))) {
      return [];
    }
    try {
      const data: unknown = await fs.readJson(this.filePath);
      const ids = readPlayedIds(data);
      if (!ids) {
        logger.warn(COMPONENT, 'Play history has an unexpected shape, ignoring', { path: this.filePath });
        return [];
      }
      return ids;
    } catch (error: unknown) {
      logger.warn(COMPONENT, 'Could not load play history', { path: this.filePath, error: String(error) });
      return [];
    }
  }

  async save(ids: Iterable<string>): Promise<boolean> {
    const data: PlayHistoryFile = { played_videos: [...ids] };
    try {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.writeJson(this.filePath, data, { spaces: 2 });
      return true;
    } catch (error: unknown) {
      logger.error(COMPONENT, 'Could not save play history', error, { path: this.filePath });
      return false;
    }
  }

  async clear(): Promise<boolean> {
    return this.save([]);
  }
}
