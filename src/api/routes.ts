import type { FastifyInstance } from 'fastify';

import type { NoteRepository } from '../repositories/note-repository.js';
import type { NoteSession } from '../types/index.js';
import { NoteDetailViewModel } from '../view-models/note-detail-view-model.js';

interface NoteBody {
  title?: string;
  content?: string;
}

const notesQuerySchema = {
  type: 'object',
  properties: {
    q: { type: 'string' },
  },
} as const;

const noteBodySchema = {
  type: 'object',
  properties: {
    title: { type: 'string' },
    content: { type: 'string' },
  },
  additionalProperties: false,
} as const;

export async function registerRoutes(app: FastifyInstance, repository: NoteRepository) {
  const openSession = (session: NoteSession) => new NoteDetailViewModel(session, repository);

  // Health check
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // List notes, optionally filtered by ?q=
  app.get<{ Querystring: { q?: string } }>(
    '/notes',
    { schema: { querystring: notesQuerySchema } },
    async (request) => {
      const query = request.query.q;
      if (query === undefined) {
        return repository.fetchAll();
      }
      return repository.search(query);
    }
  );

  // Get specific note
  app.get<{ Params: { id: string } }>('/notes/:id', async (request, reply) => {
    const note = await repository.findById(request.params.id);
    if (!note) {
      reply.code(404);
      return { error: 'Note not found' };
    }
    return note;
  });

  // Create note
  app.post<{ Body: NoteBody | undefined }>(
    '/notes',
    { schema: { body: noteBodySchema } },
    async (request, reply) => {
      const { title = '', content = '' } = request.body ?? {};
      const outcome = await openSession({ kind: 'creating' }).save(title, content);
      if (outcome.status === 'created') {
        reply.code(201);
        return outcome.note;
      }
      // A creating session only ever reports created or rejected
      const rejected = outcome.status === 'rejected' ? outcome : undefined;
      reply.code(rejected?.cause === 'validation' ? 400 : 500);
      return { error: rejected?.reason ?? 'Failed to create note' };
    }
  );

  // Update note
  app.put<{ Params: { id: string }; Body: NoteBody | undefined }>(
    '/notes/:id',
    { schema: { body: noteBodySchema } },
    async (request, reply) => {
      const note = await repository.findById(request.params.id);
      if (!note) {
        reply.code(404);
        return { error: 'Note not found' };
      }

      const { title = note.title, content = note.content } = request.body ?? {};
      const outcome = await openSession({ kind: 'editing', note }).save(title, content);
      if (outcome.status === 'rejected') {
        reply.code(outcome.cause === 'validation' ? 400 : 500);
        return { error: outcome.reason };
      }
      return (await repository.findById(note.id)) ?? note;
    }
  );

  // Delete note
  app.delete<{ Params: { id: string } }>('/notes/:id', async (request, reply) => {
    const note = await repository.findById(request.params.id);
    if (!note) {
      reply.code(404);
      return { error: 'Note not found' };
    }
    if (!(await repository.delete(note))) {
      reply.code(500);
      return { error: 'Failed to delete note' };
    }
    return reply.code(204).send();
  });
}
