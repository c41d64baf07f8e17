import { EventEmitter } from 'events';
import path from 'path';
import fs from 'fs-extra';
import { ValidationError, isNonEmptyString } from '@loopcast/shared';
import type { LibraryEntry, LibraryItem, RemovalResult } from '@loopcast/shared';
import { logger } from '../utils/logger.js';

const COMPONENT = 'LibraryStore';

export interface LibraryStoreOptions {
  fileExists?: (filePath: string) => boolean;
}

/**
 * Shared map of ready-to-play items.
 *
 * The ingestion side only calls put/remove; the controller is the sole
 * authority on which item is current. Every mutation is a single synchronous
 * step on the event loop, and every accessor hands out copies so a caller
 * never iterates a structure that changes underneath it.
 *
 * Events: `itemAdded`, `itemUpdated`, `itemRemoved` (payload: LibraryItem).
 */
export class LibraryStore extends EventEmitter {
  private items: Map<string, LibraryEntry>;
  private targetIds: Set<string>;
  private deferredRemovals: Set<string>;
  private currentItemId: string | null;
  private fileExists: (filePath: string) => boolean;

  constructor(options: LibraryStoreOptions = {}) {
    super();
    this.items = new Map();
    this.targetIds = new Set();
    this.deferredRemovals = new Set();
    this.currentItemId = null;
    this.fileExists = options.fileExists ?? ((filePath) => fs.pathExistsSync(filePath));
  }

  put(id: string, entry: LibraryEntry): void {
    if (!isNonEmptyString(id)) {
      throw new ValidationError('Item id must not be empty', { field: 'id', value: id });
    }
    if (!isNonEmptyString(entry.localPath)) {
      throw new ValidationError('Item has no local path', { field: 'localPath', value: entry.localPath, context: { itemId: id } });
    }

    const existed = this.items.has(id);
    const stored: LibraryEntry = { ...entry };
    this.items.set(id, stored);
    // A re-added item is no longer pending removal
    this.deferredRemovals.delete(id);

    const item = { id, ...stored };
    this.emit(existed ? 'itemUpdated' : 'itemAdded', item);
  }

  /**
   * Remove an item. The item the controller has marked current is never
   * removed; its removal is deferred until it stops being current.
   */
  remove(id: string): RemovalResult {
    if (!this.items.has(id)) {
      return 'missing';
    }
    if (id === this.currentItemId) {
      this.deferredRemovals.add(id);
      logger.debug(COMPONENT, 'Deferring removal of current item', { itemId: id });
      return 'deferred';
    }
    return this.removeNow(id) ? 'removed' : 'missing';
  }

  private removeNow(id: string): boolean {
    const entry = this.items.get(id);
    if (!entry) return false;
    this.items.delete(id);
    this.deferredRemovals.delete(id);
    this.emit('itemRemoved', { id, ...entry });
    return true;
  }

  get(id: string): LibraryItem | undefined {
    const entry = this.items.get(id);
    return entry ? { id, ...entry } : undefined;
  }

  has(id: string): boolean {
    return this.items.has(id);
  }

  ids(): string[] {
    return [...this.items.keys()];
  }

  list(): LibraryItem[] {
    return [...this.items.entries()].map(([id, entry]) => ({ id, ...entry }));
  }

  get size(): number {
    return this.items.size;
  }

  /**
   * Existence check the controller runs before trusting an entry.
   */
  containsValidFile(id: string): boolean {
    const entry = this.items.get(id);
    if (!entry || !entry.localPath) {
      return false;
    }
    try {
      return this.fileExists(entry.localPath);
    } catch (error: unknown) {
      logger.warn(COMPONENT, 'File check failed', { itemId: id, path: entry.localPath, error: String(error) });
      return false;
    }
  }

  findIdByLocalPath(localPath: string): string | null {
    if (!localPath) return null;
    const wanted = path.resolve(localPath);
    for (const [id, entry] of this.items) {
      if (path.resolve(entry.localPath) === wanted) {
        return id;
      }
    }
    return null;
  }

  /**
   * Called by the controller only. Flushes removals that were deferred while
   * the previous item was playing.
   */
  setCurrentItem(id: string | null): void {
    const previous = this.currentItemId;
    this.currentItemId = id;
    if (previous && previous !== id && this.deferredRemovals.has(previous)) {
      logger.debug(COMPONENT, 'Applying deferred removal', { itemId: previous });
      this.removeNow(previous);
    }
  }

  getCurrentItemId(): string | null {
    return this.currentItemId;
  }

  isRemovalDeferred(id: string): boolean {
    return this.deferredRemovals.has(id);
  }

  // Ids of the playlist the ingestion side is currently targeting
  setTargetIds(ids: Iterable<string>): void {
    this.targetIds = new Set(ids);
  }

  getTargetIds(): Set<string> {
    return new Set(this.targetIds);
  }

  /**
   * Ids present in the library but no longer targeted.
   */
  getUntargetedIds(): string[] {
    return this.ids().filter((id) => !this.targetIds.has(id));
  }
}
