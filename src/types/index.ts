/**
 * Core type definitions for notes-core
 */

export interface StorageConfig {
  dataDir: string;
  fileName: string;
}

export interface AppConfig {
  storage: StorageConfig;
  server: {
    port: number;
    host: string;
  };
  logLevel: string;
}

export interface Note {
  id: string;
  title: string;
  content: string;
  category: string;
  createdAt: Date;
  updatedAt: Date;
  isFavorite: boolean;
  colorHex: string; // Display tag from NOTE_COLOR_PALETTE
}

export const DEFAULT_CATEGORY = 'General';

/**
 * Detail screen session.
 * A new note has nothing bound yet; an edit session always carries the note it edits.
 */
export type NoteSession =
  | { kind: 'creating' }
  | { kind: 'editing'; note: Note };

export type SaveOutcome =
  | { status: 'created'; note: Note }
  | { status: 'updated' }
  | { status: 'rejected'; cause: 'validation' | 'persistence'; reason: string };

export interface NotesListEvents {
  listChanged: readonly Note[];
  error: string;
  showDetail: NoteSession;
}

export interface NoteDetailEvents {
  saved: void;
  error: string;
}
