import type { Note } from '../types/index.js';

/**
 * Gateway between application logic and the note store.
 * Store failures never escape: reads degrade to empty results, writes to false.
 */
export interface NoteRepository {
  /**
   * All notes, most recently updated first.
   */
  fetchAll(): Promise<Note[]>;

  /**
   * Case-insensitive search on note title/content, most recently updated first.
   */
  search(query: string): Promise<Note[]>;

  /**
   * Return a single note by id.
   */
  findById(id: string): Promise<Note | undefined>;

  /**
   * Create and persist a note with trimmed title and content.
   */
  create(title: string, content: string, category?: string): Promise<Note>;

  /**
   * Replace title/content and refresh updatedAt. Category changes only when given.
   */
  update(note: Note, title: string, content: string, category?: string): Promise<boolean>;

  /**
   * Remove a note.
   */
  delete(note: Note): Promise<boolean>;

  /**
   * Commit anything the store still holds pending.
   */
  flush(): Promise<boolean>;
}
