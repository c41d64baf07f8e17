import path from 'path';
import fs from 'fs-extra';
import {
  FileSystemError,
  NORMALIZED_SUFFIX,
  PARTIAL_DOWNLOAD_EXTENSION,
  TEMP_MEDIA_SUFFIX,
  UNKNOWN_ARTIST,
  VIDEO_ID_PATTERN,
  getErrorMessage,
  isFileNotFoundError,
} from '@loopcast/shared';
import type { LibraryEntry, LibraryItem } from '@loopcast/shared';
import type { LibraryStore } from './LibraryStore.js';
import { logger } from '../utils/logger.js';

const COMPONENT = 'Cache';

export interface CachedFileInfo {
  id: string;
  entry: LibraryEntry;
}

/**
 * Parse a cache filename of the form `<title>_<artist>_<id>_normalized.mp4`.
 * Title and artist have their spaces stored as underscores; the id is the
 * last underscore-separated field before the suffix.
 */
export function parseCacheFilename(filePath: string): CachedFileInfo | null {
  const filename = path.basename(filePath);
  if (!filename.endsWith(NORMALIZED_SUFFIX)) {
    return null;
  }

  const stem = filename.slice(0, -NORMALIZED_SUFFIX.length);
  // Ids may contain underscores themselves, so take the fixed-length tail
  const idStart = stem.length - 11;
  if (idStart < 1 || stem[idStart - 1] !== '_') {
    return null;
  }
  const id = stem.slice(idStart);
  if (!VIDEO_ID_PATTERN.test(id)) {
    return null;
  }

  const metadata = stem.slice(0, idStart - 1);
  const separator = metadata.indexOf('_');
  const rawTitle = separator === -1 ? metadata : metadata.slice(0, separator);
  const rawArtist = separator === -1 ? '' : metadata.slice(separator + 1);

  return {
    id,
    entry: {
      localPath: filePath,
      title: rawTitle.replace(/_/g, ' ').trim(),
      artist: rawArtist.replace(/_/g, ' ').trim() || UNKNOWN_ARTIST,
      metadataDegraded: false,
    },
  };
}

export function identifyItemFromPath(library: LibraryStore, localPath: string): string | null {
  if (!localPath) return null;
  const byPath = library.findIdByLocalPath(localPath);
  if (byPath) return byPath;

  const parsed = parseCacheFilename(localPath);
  if (parsed && library.has(parsed.id)) {
    return parsed.id;
  }
  return null;
}

async function listCacheDir(cacheDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(cacheDir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (error: unknown) {
    if (isFileNotFoundError(error)) {
      return [];
    }
    throw new FileSystemError(`Cannot read cache directory: ${getErrorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
      path: cacheDir,
      operation: 'readdir',
    });
  }
}

/**
 * Add every normalized file in the cache directory to the library.
 * Items already present keep their (possibly richer) metadata.
 *
 * @returns number of newly added items
 */
export async function scanCache(cacheDir: string, library: LibraryStore): Promise<number> {
  const files = await listCacheDir(cacheDir);
  let added = 0;

  for (const filename of files) {
    const parsed = parseCacheFilename(path.join(cacheDir, filename));
    if (!parsed || library.has(parsed.id)) {
      continue;
    }
    library.put(parsed.id, parsed.entry);
    added++;
  }

  if (added > 0) {
    logger.info(COMPONENT, `Found ${added} existing item(s) in cache`, { cacheDir });
  }
  return added;
}

// Deferred ids per store that already wait for their removal
const awaitingRemoval = new WeakMap<LibraryStore, Set<string>>();

/**
 * Delete the file of a deferred removal once the store applies it.
 * Putting the item again cancels the wait.
 */
function deleteFileWhenRemoved(library: LibraryStore, id: string): void {
  let waiting = awaitingRemoval.get(library);
  if (!waiting) {
    waiting = new Set();
    awaitingRemoval.set(library, waiting);
  }
  if (waiting.has(id)) return;
  const pending = waiting;
  pending.add(id);

  const detach = (): void => {
    pending.delete(id);
    library.off('itemRemoved', onRemoved);
    library.off('itemUpdated', onUpdated);
  };
  const onUpdated = (item: LibraryItem): void => {
    if (item.id === id) detach();
  };
  const onRemoved = (item: LibraryItem): void => {
    if (item.id !== id) return;
    detach();
    fs.remove(item.localPath)
      .then(() => {
        logger.info(COMPONENT, `Removed: ${item.artist} - ${item.title}`, { itemId: id, deferred: true });
      })
      .catch((error: unknown) => {
        logger.error(COMPONENT, 'Error removing cached file', error, { itemId: id, path: item.localPath });
      });
  };

  library.on('itemRemoved', onRemoved);
  library.on('itemUpdated', onUpdated);
}

/**
 * Remove items that left the targeted playlist, deleting their files.
 * The current item is deferred by the store; its file goes once the
 * store applies the removal.
 *
 * Called by the ingestion side after it sets the targeted ids. With no
 * targets every item counts as untargeted.
 */
export async function cleanupRemovedItems(library: LibraryStore): Promise<string[]> {
  const removed: string[] = [];

  for (const id of library.getUntargetedIds()) {
    const item = library.get(id);
    if (!item) continue;

    const result = library.remove(id);
    if (result === 'deferred') {
      logger.info(COMPONENT, 'Skipping removal of currently playing item', { itemId: id });
      deleteFileWhenRemoved(library, id);
      continue;
    }
    if (result !== 'removed') continue;

    try {
      await fs.remove(item.localPath);
      removed.push(id);
      logger.info(COMPONENT, `Removed: ${item.artist} - ${item.title}`, { itemId: id });
    } catch (error: unknown) {
      logger.error(COMPONENT, 'Error removing cached file', error, { itemId: id, path: item.localPath });
    }
  }

  if (removed.length > 0) {
    logger.info(COMPONENT, `Cleaned up ${removed.length} removed item(s)`);
  }
  return removed;
}

/**
 * Delete leftovers of interrupted downloads and normalization runs.
 */
export async function cleanupTempFiles(cacheDir: string): Promise<string[]> {
  const files = await listCacheDir(cacheDir);
  const deleted: string[] = [];

  for (const filename of files) {
    if (!filename.endsWith(PARTIAL_DOWNLOAD_EXTENSION) && !filename.endsWith(TEMP_MEDIA_SUFFIX)) {
      continue;
    }
    try {
      await fs.remove(path.join(cacheDir, filename));
      deleted.push(filename);
      logger.debug(COMPONENT, `Removed temp file: ${filename}`);
    } catch (error: unknown) {
      logger.error(COMPONENT, `Error removing ${filename}`, error);
    }
  }
  return deleted;
}
