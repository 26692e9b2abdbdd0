import { describe, it, expect, beforeEach } from 'vitest';

import { InvalidCommandError } from '../../../../src/kernel/errors.js';
import { StateStore } from '../../../../src/kernel/state-store.js';
import { ShortcutBook, TRAIN_STATE_SPEC } from '../../../../src/plugins/trains/shortcuts.js';
import { ManualClock } from '../../../helpers/manual-clock.js';
import { MemoryBacking } from '../../../helpers/memory-backing.js';

describe('ShortcutBook', () => {
  let backing: MemoryBacking;
  let book: ShortcutBook;

  beforeEach(async () => {
    backing = new MemoryBacking();
    const store = new StateStore({ backing, clock: new ManualClock('2026-03-02T08:00:00Z') });
    book = new ShortcutBook(store.domain('trains', TRAIN_STATE_SPEC));
    await book.load();
  });

  it('should persist an empty record on load', () => {
    expect(backing.stateOf('trains')).toEqual({ shortcuts: {} });
  });

  it('should store names lower-cased and codes upper-cased', async () => {
    expect(await book.add(' Home ', 'wat')).toEqual({ name: 'home', crs: 'WAT' });
    expect(backing.stateOf('trains')).toEqual({ shortcuts: { home: 'WAT' } });
  });

  it('should not rewrite an identical shortcut', async () => {
    await book.add('home', 'WAT');
    const writes = backing.writes;

    await book.add('home', 'wat');

    expect(backing.writes).toBe(writes);
  });

  it('should reject bad names and codes', async () => {
    await expect(book.add('2home', 'WAT')).rejects.toBeInstanceOf(InvalidCommandError);
    await expect(book.add('home', 'WATERLOO')).rejects.toThrow('"WATERLOO" is not a 3-letter station code.');
  });

  it('should list shortcuts by name', async () => {
    await book.add('work', 'VIC');
    await book.add('home', 'WAT');

    expect(await book.list()).toEqual([
      { name: 'home', crs: 'WAT' },
      { name: 'work', crs: 'VIC' },
    ]);
  });

  it('should remove a shortcut', async () => {
    await book.add('home', 'WAT');

    expect(await book.remove('HOME')).toBe(true);
    expect(await book.remove('home')).toBe(false);
    expect(await book.list()).toEqual([]);
  });

  it('should resolve names, then bare codes', async () => {
    await book.add('home', 'WAT');

    expect(await book.resolve('Home')).toBe('WAT');
    expect(await book.resolve('vic')).toBe('VIC');
    await expect(book.resolve('Waterloo')).rejects.toThrow(
      'Unknown station "Waterloo". Use a 3-letter code or add a shortcut.',
    );
  });

  it('should not treat built-in object keys as shortcuts', async () => {
    await expect(book.resolve('constructor')).rejects.toBeInstanceOf(InvalidCommandError);
    await expect(book.resolve('toString')).rejects.toBeInstanceOf(InvalidCommandError);
    expect(await book.remove('constructor')).toBe(false);
  });
});
