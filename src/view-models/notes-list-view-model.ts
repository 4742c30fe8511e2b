import { type IStateEmitter, StateEmitter, type StateListener } from '../core/state-emitter.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import type { Note, NotesListEvents } from '../types/index.js';
import logger from '../utils/logger.js';

export const DELETE_FAILED_MESSAGE = 'Failed to delete note';

/**
 * State behind the notes list screen.
 * Every assignment of `notes` emits `listChanged`, whether or not the content changed.
 */
export class NotesListViewModel implements IStateEmitter<NotesListEvents> {
  private readonly repository: NoteRepository;
  private readonly events = new StateEmitter<NotesListEvents>();
  private currentNotes: readonly Note[] = [];
  private activeQuery: string | null = null;

  constructor(repository: NoteRepository) {
    this.repository = repository;
  }

  get notes(): readonly Note[] {
    return this.currentNotes;
  }

  /**
   * Search text currently applied to the list, or null when showing everything.
   */
  get query(): string | null {
    return this.activeQuery;
  }

  on<K extends keyof NotesListEvents>(
    type: K,
    listener: StateListener<NotesListEvents[K]>
  ): () => void {
    return this.events.on(type, listener);
  }

  off<K extends keyof NotesListEvents>(type: K, listener: StateListener<NotesListEvents[K]>): void {
    this.events.off(type, listener);
  }

  async load(): Promise<void> {
    this.activeQuery = null;
    this.setNotes(await this.repository.fetchAll());
  }

  async search(query: string): Promise<void> {
    this.activeQuery = query;
    this.setNotes(await this.repository.search(query));
  }

  /**
   * Re-run the active search, or reload everything when there is none.
   */
  async refresh(): Promise<void> {
    if (this.activeQuery === null) {
      await this.load();
      return;
    }
    await this.search(this.activeQuery);
  }

  requestCreate(): void {
    this.events.emit('showDetail', { kind: 'creating' });
  }

  select(index: number): void {
    const note = this.noteAt(index);
    if (!note) {
      return;
    }
    this.events.emit('showDetail', { kind: 'editing', note });
  }

  async delete(index: number): Promise<void> {
    const note = this.noteAt(index);
    if (!note) {
      return;
    }

    if (await this.repository.delete(note)) {
      await this.load();
    } else {
      logger.debug({ id: note.id }, 'Delete rejected by repository');
      this.events.emit('error', DELETE_FAILED_MESSAGE);
    }
  }

  private noteAt(index: number): Note | undefined {
    // Stale indexes from an earlier render are ignored
    if (!Number.isInteger(index) || index < 0 || index >= this.currentNotes.length) {
      return undefined;
    }
    return this.currentNotes[index];
  }

  private setNotes(notes: readonly Note[]): void {
    this.currentNotes = notes;
    this.events.emit('listChanged', notes);
  }
}
