import { EmptyNoteError } from '../core/errors.js';
import { type IStateEmitter, StateEmitter, type StateListener } from '../core/state-emitter.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import {
  DEFAULT_CATEGORY,
  type NoteDetailEvents,
  type NoteSession,
  type SaveOutcome,
} from '../types/index.js';
import logger from '../utils/logger.js';

export const UPDATE_FAILED_MESSAGE = 'Failed to update note';

/**
 * Edit/create session for a single note.
 */
export class NoteDetailViewModel implements IStateEmitter<NoteDetailEvents> {
  readonly session: NoteSession;
  private readonly repository: NoteRepository;
  private readonly events = new StateEmitter<NoteDetailEvents>();

  constructor(session: NoteSession, repository: NoteRepository) {
    this.session = session;
    this.repository = repository;
  }

  get isCreatingNew(): boolean {
    return this.session.kind === 'creating';
  }

  on<K extends keyof NoteDetailEvents>(
    type: K,
    listener: StateListener<NoteDetailEvents[K]>
  ): () => void {
    return this.events.on(type, listener);
  }

  off<K extends keyof NoteDetailEvents>(
    type: K,
    listener: StateListener<NoteDetailEvents[K]>
  ): void {
    this.events.off(type, listener);
  }

  /**
   * Validate and persist the edited fields.
   * Emits `saved` or `error`; the returned outcome mirrors what was emitted.
   */
  async save(title: string, content: string): Promise<SaveOutcome> {
    const trimmedTitle = title.trim();
    const trimmedContent = content.trim();

    if (!trimmedTitle && !trimmedContent) {
      const error = new EmptyNoteError();
      logger.debug({ session: this.session.kind }, 'Rejected empty note');
      return this.reject('validation', error.message);
    }

    if (this.session.kind === 'creating') {
      const note = await this.repository.create(trimmedTitle, trimmedContent, DEFAULT_CATEGORY);
      this.events.emit('saved', undefined);
      return { status: 'created', note };
    }

    const updated = await this.repository.update(this.session.note, trimmedTitle, trimmedContent);
    if (!updated) {
      return this.reject('persistence', UPDATE_FAILED_MESSAGE);
    }
    this.events.emit('saved', undefined);
    return { status: 'updated' };
  }

  private reject(cause: 'validation' | 'persistence', reason: string): SaveOutcome {
    this.events.emit('error', reason);
    return { status: 'rejected', cause, reason };
  }
}
