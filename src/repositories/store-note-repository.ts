import { randomUUID } from 'crypto';

import type { NoteStore, SortKey } from '../core/interfaces.js';
import { DEFAULT_CATEGORY, type Note } from '../types/index.js';
import logger from '../utils/logger.js';
import { pickNoteColor } from '../utils/note-colors.js';
import type { NoteRepository } from './note-repository.js';

export interface StoreNoteRepositoryOptions {
  now?: () => Date;
  random?: () => number;
  generateId?: () => string;
}

const LISTING_ORDER: SortKey[] = [
  { field: 'updatedAt', direction: 'desc' },
  { field: 'createdAt', direction: 'desc' },
  { field: 'id', direction: 'asc' },
];

/**
 * NoteRepository backed by a NoteStore.
 * Clock, random source and id generator are injectable for tests.
 */
export class StoreNoteRepository implements NoteRepository {
  private readonly store: NoteStore;
  private readonly now: () => Date;
  private readonly random: () => number;
  private readonly generateId: () => string;

  constructor(store: NoteStore, options: StoreNoteRepositoryOptions = {}) {
    this.store = store;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.generateId = options.generateId ?? randomUUID;
  }

  async fetchAll(): Promise<Note[]> {
    try {
      return await this.store.query({ sort: LISTING_ORDER });
    } catch (error) {
      logger.warn({ error }, 'Failed to fetch notes, returning empty list');
      return [];
    }
  }

  async search(query: string): Promise<Note[]> {
    const needle = query.toLowerCase();
    try {
      return await this.store.query({
        filter: (note) =>
          note.title.toLowerCase().includes(needle) ||
          note.content.toLowerCase().includes(needle),
        sort: LISTING_ORDER,
      });
    } catch (error) {
      logger.warn({ error, query }, 'Failed to search notes, returning empty list');
      return [];
    }
  }

  async findById(id: string): Promise<Note | undefined> {
    try {
      const [note] = await this.store.query({ filter: (candidate) => candidate.id === id });
      return note;
    } catch (error) {
      logger.warn({ error, id }, 'Failed to look up note');
      return undefined;
    }
  }

  async create(title: string, content: string, category: string = DEFAULT_CATEGORY): Promise<Note> {
    const timestamp = this.now();
    const note: Note = {
      id: this.generateId(),
      title: title.trim(),
      content: content.trim(),
      category,
      createdAt: timestamp,
      updatedAt: new Date(timestamp.getTime()),
      isFavorite: false,
      colorHex: pickNoteColor(this.random),
    };

    // Creation is reported as done either way; a failed write only shows up in the log
    try {
      await this.store.insert(note);
      if (!(await this.store.flush())) {
        logger.error({ id: note.id }, 'Created note was not flushed');
      }
    } catch (error) {
      logger.error({ error, id: note.id }, 'Failed to persist created note');
    }
    return note;
  }

  async update(note: Note, title: string, content: string, category?: string): Promise<boolean> {
    const updated: Note = {
      ...note,
      title: title.trim(),
      content: content.trim(),
      category: category ?? note.category,
      updatedAt: this.now(),
    };

    try {
      if (!(await this.store.update(updated))) {
        logger.warn({ id: note.id }, 'Note to update no longer exists');
        return false;
      }
      return await this.store.flush();
    } catch (error) {
      logger.error({ error, id: note.id }, 'Failed to update note');
      return false;
    }
  }

  async delete(note: Note): Promise<boolean> {
    try {
      if (!(await this.store.delete(note.id))) {
        logger.warn({ id: note.id }, 'Note to delete no longer exists');
        return false;
      }
      return await this.store.flush();
    } catch (error) {
      logger.error({ error, id: note.id }, 'Failed to delete note');
      return false;
    }
  }

  async flush(): Promise<boolean> {
    try {
      return await this.store.flush();
    } catch (error) {
      logger.error({ error }, 'Failed to flush note store');
      return false;
    }
  }
}
