import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

import type { NoteStore, StoreQuery } from '../core/interfaces.js';
import { PersistenceError } from '../core/errors.js';
import type { Note, StorageConfig } from '../types/index.js';
import logger from '../utils/logger.js';
import { applyQuery, cloneNote } from './query.js';

const FILE_VERSION = 1;

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const storedNoteSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string(),
  category: z.string(),
  createdAt: isoDate,
  updatedAt: isoDate,
  isFavorite: z.boolean(),
  colorHex: z.string(),
});

const storeFileSchema = z.object({
  version: z.literal(FILE_VERSION),
  notes: z.array(storedNoteSchema),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON file-based note store
 * Loads the whole file on first access. Each mutation rewrites the file on a
 * copy of the records, one write at a time, and the copy replaces the
 * in-memory records only once the write has landed.
 */
export class JsonFileNoteStore implements NoteStore {
  private readonly baseDir: string;
  private readonly fileName: string;
  private records?: Map<string, Note>;
  private loading?: Promise<Map<string, Note>>;
  private writing: Promise<void> = Promise.resolve();
  private inFlight = 0;

  constructor(config: Partial<StorageConfig> = {}) {
    this.baseDir = config.dataDir ?? '.';
    this.fileName = config.fileName ?? 'notes.json';
  }

  /**
   * Get the full file path for the notes file
   */
  getFilePath(): string {
    return path.join(this.baseDir, this.fileName);
  }

  async insert(note: Note): Promise<Note> {
    return this.enqueue(async () => {
      const records = await this.load();
      if (records.has(note.id)) {
        throw new PersistenceError('insert', `Note ${note.id} already exists`);
      }
      const next = new Map(records);
      next.set(note.id, cloneNote(note));
      await this.write('insert', next);
      logger.debug({ id: note.id }, 'Note inserted');
      return cloneNote(note);
    });
  }

  async query(query?: StoreQuery): Promise<Note[]> {
    const records = await this.load();
    return applyQuery(records.values(), query);
  }

  async update(note: Note): Promise<boolean> {
    return this.enqueue(async () => {
      const records = await this.load();
      if (!records.has(note.id)) {
        logger.debug({ id: note.id }, 'Note update skipped, record not found');
        return false;
      }
      const next = new Map(records);
      next.set(note.id, cloneNote(note));
      await this.write('update', next);
      logger.debug({ id: note.id }, 'Note updated');
      return true;
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.enqueue(async () => {
      const records = await this.load();
      if (!records.has(id)) {
        return false;
      }
      const next = new Map(records);
      next.delete(id);
      await this.write('delete', next);
      logger.debug({ id }, 'Note deleted');
      return true;
    });
  }

  /**
   * Wait for writes already queued. A failed write rejects its own mutation,
   * so there is never anything left over to commit here.
   */
  async flush(): Promise<boolean> {
    await this.writing;
    return true;
  }

  hasPendingChanges(): boolean {
    return this.inFlight > 0;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.inFlight++;
    const run = this.writing.then(task).finally(() => {
      this.inFlight--;
    });
    this.writing = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Write through a temp file and rename, then swap in the new records.
   */
  private async write(operation: string, next: Map<string, Note>): Promise<void> {
    const filePath = this.getFilePath();
    const tempPath = `${filePath}.tmp`;
    const notes = Array.from(next.values());
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      const json = JSON.stringify({ version: FILE_VERSION, notes }, null, 2);
      await fs.writeFile(tempPath, json, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      logger.error({ error, filePath, operation }, 'Failed to write notes file');
      throw new PersistenceError(operation, `Failed to write ${filePath}`, { cause: error });
    }
    this.records = next;
    logger.debug({ filePath, count: notes.length }, 'Notes written successfully');
  }

  private load(): Promise<Map<string, Note>> {
    if (this.records) {
      return Promise.resolve(this.records);
    }
    if (!this.loading) {
      this.loading = this.readFile().then(
        (records) => {
          this.records = records;
          return records;
        },
        (error: unknown) => {
          // Allow a later call to retry the read
          this.loading = undefined;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async readFile(): Promise<Map<string, Note>> {
    const filePath = this.getFilePath();
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug({ filePath }, 'Notes file not found, starting empty');
        return new Map();
      }
      logger.error({ error, filePath }, 'Failed to read notes file');
      throw new PersistenceError('load', `Failed to read ${filePath}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError('load', `Notes file ${filePath} is not valid JSON`, {
        cause: error,
      });
    }

    const parsed = storeFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError('load', `Notes file ${filePath} has an invalid layout`, {
        cause: parsed.error,
      });
    }

    const records = new Map<string, Note>();
    for (const note of parsed.data.notes) {
      records.set(note.id, note);
    }
    logger.debug({ filePath, count: records.size }, 'Notes loaded successfully');
    return records;
  }
}
