import type { NoteStore, StoreQuery } from '../core/interfaces.js';
import { PersistenceError } from '../core/errors.js';
import type { Note } from '../types/index.js';
import { applyQuery, cloneNote } from './query.js';

/**
 * In-memory NoteStore implementation.
 * Records live for the lifetime of the instance; flush() only clears the pending count.
 */
export class MemoryNoteStore implements NoteStore {
  private notes = new Map<string, Note>();
  private pending = 0;

  constructor(initial: Note[] = []) {
    for (const note of initial) {
      this.notes.set(note.id, cloneNote(note));
    }
  }

  async insert(note: Note): Promise<Note> {
    if (this.notes.has(note.id)) {
      throw new PersistenceError('insert', `Note ${note.id} already exists`);
    }
    this.notes.set(note.id, cloneNote(note));
    this.pending++;
    return cloneNote(note);
  }

  async query(query?: StoreQuery): Promise<Note[]> {
    return applyQuery(this.notes.values(), query);
  }

  async update(note: Note): Promise<boolean> {
    if (!this.notes.has(note.id)) {
      return false;
    }
    this.notes.set(note.id, cloneNote(note));
    this.pending++;
    return true;
  }

  async delete(id: string): Promise<boolean> {
    const removed = this.notes.delete(id);
    if (removed) {
      this.pending++;
    }
    return removed;
  }

  async flush(): Promise<boolean> {
    this.pending = 0;
    return true;
  }

  hasPendingChanges(): boolean {
    return this.pending > 0;
  }

  count(): number {
    return this.notes.size;
  }
}
