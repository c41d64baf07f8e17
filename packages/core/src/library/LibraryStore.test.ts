import { describe, it, expect, vi } from 'vitest';
import { LibraryStore } from './LibraryStore.js';
import { ValidationError } from '@loopcast/shared';
import type { LibraryEntry } from '@loopcast/shared';

function entry(name: string): LibraryEntry {
  return { localPath: `/cache/${name}.mp4`, title: name, artist: 'Artist', metadataDegraded: false };
}

describe('LibraryStore', () => {
  it('adds, reads and lists items', () => {
    const store = new LibraryStore({ fileExists: () => true });
    store.put('a', entry('a'));
    store.put('b', entry('b'));

    expect(store.size).toBe(2);
    expect(store.get('a')).toEqual({ id: 'a', ...entry('a') });
    expect(store.ids()).toEqual(['a', 'b']);
    expect(store.list().map((item) => item.id)).toEqual(['a', 'b']);
  });

  it('hands out copies', () => {
    const store = new LibraryStore({ fileExists: () => true });
    store.put('a', entry('a'));

    const item = store.get('a');
    if (item) item.title = 'changed';
    store.ids().push('x');

    expect(store.get('a')?.title).toBe('a');
    expect(store.size).toBe(1);
  });

  it('emits added and updated events', () => {
    const store = new LibraryStore({ fileExists: () => true });
    const added = vi.fn();
    const updated = vi.fn();
    store.on('itemAdded', added);
    store.on('itemUpdated', updated);

    store.put('a', entry('a'));
    store.put('a', { ...entry('a'), title: 'Renamed' });

    expect(added).toHaveBeenCalledTimes(1);
    expect(updated).toHaveBeenCalledWith({ id: 'a', ...entry('a'), title: 'Renamed' });
  });

  it('rejects items without an id or a path', () => {
    const store = new LibraryStore({ fileExists: () => true });
    expect(() => store.put('', entry('a'))).toThrow(ValidationError);
    expect(() => store.put('a', { ...entry('a'), localPath: '  ' })).toThrow('Item has no local path');
    expect(store.size).toBe(0);
  });

  describe('remove', () => {
    it('removes an item that is not current', () => {
      const store = new LibraryStore({ fileExists: () => true });
      const removed = vi.fn();
      store.on('itemRemoved', removed);
      store.put('a', entry('a'));

      expect(store.remove('a')).toBe('removed');
      expect(store.has('a')).toBe(false);
      expect(removed).toHaveBeenCalledTimes(1);
      expect(store.remove('a')).toBe('missing');
    });

    it('defers removal of the current item until it changes', () => {
      const store = new LibraryStore({ fileExists: () => true });
      store.put('a', entry('a'));
      store.put('b', entry('b'));
      store.setCurrentItem('a');

      expect(store.remove('a')).toBe('deferred');
      expect(store.has('a')).toBe(true);
      expect(store.isRemovalDeferred('a')).toBe(true);

      store.setCurrentItem('b');
      expect(store.has('a')).toBe(false);
      expect(store.isRemovalDeferred('a')).toBe(false);
    });

    it('cancels a deferred removal when the item is put again', () => {
      const store = new LibraryStore({ fileExists: () => true });
      store.put('a', entry('a'));
      store.setCurrentItem('a');
      store.remove('a');
      store.put('a', entry('a'));

      store.setCurrentItem(null);
      expect(store.has('a')).toBe(true);
    });
  });

  describe('containsValidFile', () => {
    it('checks the file of a known item', () => {
      const store = new LibraryStore({ fileExists: (filePath) => filePath === '/cache/a.mp4' });
      store.put('a', entry('a'));
      store.put('b', entry('b'));

      expect(store.containsValidFile('a')).toBe(true);
      expect(store.containsValidFile('b')).toBe(false);
      expect(store.containsValidFile('missing')).toBe(false);
    });

    it('treats a failing check as missing', () => {
      const store = new LibraryStore({
        fileExists: () => {
          throw new Error('EACCES');
        },
      });
      store.put('a', entry('a'));
      expect(store.containsValidFile('a')).toBe(false);
    });
  });

  it('finds an item by its local path', () => {
    const store = new LibraryStore({ fileExists: () => true });
    store.put('a', entry('a'));
    expect(store.findIdByLocalPath('/cache/../cache/a.mp4')).toBe('a');
    expect(store.findIdByLocalPath('/cache/b.mp4')).toBeNull();
    expect(store.findIdByLocalPath('')).toBeNull();
  });

  it('reports ids outside the targeted playlist', () => {
    const store = new LibraryStore({ fileExists: () => true });
    store.put('a', entry('a'));
    store.put('b', entry('b'));
    store.setTargetIds(['b', 'c']);

    expect(store.getUntargetedIds()).toEqual(['a']);
    expect([...store.getTargetIds()]).toEqual(['b', 'c']);
  });
});
