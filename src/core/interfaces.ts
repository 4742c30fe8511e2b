/**
 * Core interfaces for note persistence
 * These interfaces allow for different store implementations (in-memory, JSON file)
 */

import type { Note } from '../types/index.js';

export type SortDirection = 'asc' | 'desc';

export interface SortKey {
  field: 'createdAt' | 'updatedAt' | 'title' | 'id';
  direction: SortDirection;
}

/**
 * Filter and ordering applied by the store when listing records.
 * Sort keys are applied in order; later keys break ties of earlier ones.
 */
export interface StoreQuery {
  filter?: (note: Note) => boolean;
  sort?: SortKey[];
}

/**
 * Interface for the durable note store
 *
 * A mutation that resolves has been committed, or will be by the time
 * flush() resolves. A mutation that rejects leaves the records as they were.
 * Any call may reject with a PersistenceError; callers decide whether to
 * surface or absorb it.
 */
export interface NoteStore {
  /**
   * Add a new record. Rejects if the id is already taken.
   */
  insert(note: Note): Promise<Note>;

  /**
   * List records matching the filter, in the requested order.
   */
  query(query?: StoreQuery): Promise<Note[]>;

  /**
   * Replace a stored record. Resolves false when no record has that id.
   */
  update(note: Note): Promise<boolean>;

  /**
   * Remove a record by id. Resolves false when no record has that id.
   */
  delete(id: string): Promise<boolean>;

  /**
   * Commit pending changes and wait for writes in flight. Idempotent;
   * resolves true when nothing is pending.
   */
  flush(): Promise<boolean>;
}
