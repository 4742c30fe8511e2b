import { beforeEach, describe, expect, it } from 'vitest';

import { PersistenceError } from '../core/errors.js';
import type { Note } from '../types/index.js';
import { MemoryNoteStore } from './memory-note-store.js';

function createNote(partial?: Partial<Note>): Note {
  const base: Note = {
    id: 'note-id',
    title: 'Title',
    content: 'Hello world',
    category: 'General',
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    isFavorite: false,
    colorHex: '#4ECDC4',
  };
  return { ...base, ...partial };
}

describe('MemoryNoteStore', () => {
  let store: MemoryNoteStore;

  beforeEach(() => {
    store = new MemoryNoteStore();
  });

  it('inserts notes and returns them from query', async () => {
    const note = createNote();
    await store.insert(note);

    expect(await store.query()).toEqual([note]);
    expect(store.count()).toBe(1);
  });

  it('rejects a second insert with the same id', async () => {
    await store.insert(createNote());
    await expect(store.insert(createNote({ title: 'again' }))).rejects.toBeInstanceOf(
      PersistenceError
    );
  });

  it('hands out copies that do not alias stored records', async () => {
    const note = createNote();
    await store.insert(note);
    note.title = 'changed by caller';

    const [stored] = await store.query();
    stored.updatedAt.setTime(0);

    const [again] = await store.query();
    expect(again.title).toBe('Title');
    expect(again.updatedAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('updates existing records and reports missing ones', async () => {
    await store.insert(createNote());

    expect(await store.update(createNote({ title: 'new' }))).toBe(true);
    expect(await store.update(createNote({ id: 'missing' }))).toBe(false);

    const [stored] = await store.query();
    expect(stored.title).toBe('new');
  });

  it('deletes records and reports whether anything was removed', async () => {
    await store.insert(createNote());

    expect(await store.delete('note-id')).toBe(true);
    expect(await store.delete('note-id')).toBe(false);
    expect(store.count()).toBe(0);
  });

  it('applies filter and multi-key sort', async () => {
    await store.insert(createNote({ id: 'a', title: 'alpha', updatedAt: new Date(1000) }));
    await store.insert(createNote({ id: 'b', title: 'beta', updatedAt: new Date(3000) }));
    await store.insert(createNote({ id: 'c', title: 'gamma', updatedAt: new Date(3000) }));

    const results = await store.query({
      filter: (note) => note.title !== 'alpha',
      sort: [
        { field: 'updatedAt', direction: 'desc' },
        { field: 'id', direction: 'desc' },
      ],
    });

    expect(results.map((n) => n.id)).toEqual(['c', 'b']);
  });

  it('tracks pending changes until flush', async () => {
    expect(store.hasPendingChanges()).toBe(false);
    await store.insert(createNote());
    expect(store.hasPendingChanges()).toBe(true);

    expect(await store.flush()).toBe(true);
    expect(store.hasPendingChanges()).toBe(false);
    expect(await store.flush()).toBe(true);
  });

  it('can be seeded with initial notes', async () => {
    const seeded = new MemoryNoteStore([createNote({ id: 'x' }), createNote({ id: 'y' })]);
    expect(seeded.count()).toBe(2);
    expect(seeded.hasPendingChanges()).toBe(false);
  });
});
