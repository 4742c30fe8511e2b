import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { StoreNoteRepository } from '../repositories/store-note-repository.js';
import { MemoryNoteStore } from '../storage/memory-note-store.js';
import { buildApp } from './app.js';

describe('routes', () => {
  let store: MemoryNoteStore;
  let repository: StoreNoteRepository;
  let app: FastifyInstance;

  beforeEach(async () => {
    store = new MemoryNoteStore();
    let tick = Date.parse('2024-05-01T12:00:00.000Z');
    let id = 0;
    repository = new StoreNoteRepository(store, {
      now: () => new Date((tick += 1000)),
      random: () => 0,
      generateId: () => `note-${++id}`,
    });
    app = await buildApp(repository);
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('ok');
  });

  it('creates a note from the request body', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/notes',
      payload: { title: ' Shopping ', content: 'Milk, eggs' },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toEqual({
      id: 'note-1',
      title: 'Shopping',
      content: 'Milk, eggs',
      category: 'General',
      createdAt: '2024-05-01T12:00:01.000Z',
      updatedAt: '2024-05-01T12:00:01.000Z',
      isFavorite: false,
      colorHex: '#4ECDC4',
    });
    expect(store.count()).toBe(1);
  });

  it('rejects an empty note with 400', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/notes',
      payload: { title: '  ', content: '' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Note must have either a title or content' });
    expect(store.count()).toBe(0);
  });

  it('lists notes newest first and filters with q', async () => {
    await repository.create('Groceries', 'Milk');
    await repository.create('Workout', 'Leg day');
    await repository.create('Work notes', 'Quarterly plan');

    const all = await app.inject({ method: 'GET', url: '/notes' });
    const filtered = await app.inject({ method: 'GET', url: '/notes?q=WORK' });

    expect(all.json().map((n: { title: string }) => n.title)).toEqual([
      'Work notes',
      'Workout',
      'Groceries',
    ]);
    expect(filtered.json().map((n: { title: string }) => n.title)).toEqual([
      'Work notes',
      'Workout',
    ]);
  });

  it('rejects a repeated q parameter with 400', async () => {
    await repository.create('Groceries', 'Milk');
    const searchSpy = vi.spyOn(repository, 'search');

    const response = await app.inject({ method: 'GET', url: '/notes?q=a&q=b' });

    expect(response.statusCode).toBe(400);
    expect(searchSpy).not.toHaveBeenCalled();
  });

  it('returns a single note or 404', async () => {
    const note = await repository.create('Find me', '');

    const found = await app.inject({ method: 'GET', url: `/notes/${note.id}` });
    const missing = await app.inject({ method: 'GET', url: '/notes/nope' });

    expect(found.json().title).toBe('Find me');
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'Note not found' });
  });

  it('updates a note and keeps fields left out of the body', async () => {
    const note = await repository.create('Draft', 'Body', 'Work');

    const response = await app.inject({
      method: 'PUT',
      url: `/notes/${note.id}`,
      payload: { title: 'Final' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      id: note.id,
      title: 'Final',
      content: 'Body',
      category: 'Work',
      createdAt: '2024-05-01T12:00:01.000Z',
      updatedAt: '2024-05-01T12:00:02.000Z',
    });
  });

  it('rejects an update that would empty the note', async () => {
    const note = await repository.create('Draft', '');

    const response = await app.inject({
      method: 'PUT',
      url: `/notes/${note.id}`,
      payload: { title: '' },
    });

    expect(response.statusCode).toBe(400);
    expect((await repository.findById(note.id))?.title).toBe('Draft');
  });

  it('maps a failed update to 500', async () => {
    const note = await repository.create('Draft', '');
    vi.spyOn(store, 'flush').mockResolvedValue(false);

    const response = await app.inject({
      method: 'PUT',
      url: `/notes/${note.id}`,
      payload: { title: 'Final' },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Failed to update note' });
  });

  it('returns 404 when updating an unknown note', async () => {
    const response = await app.inject({
      method: 'PUT',
      url: '/notes/nope',
      payload: { title: 'x' },
    });

    expect(response.statusCode).toBe(404);
  });

  it('deletes a note', async () => {
    const note = await repository.create('Doomed', '');

    const response = await app.inject({ method: 'DELETE', url: `/notes/${note.id}` });
    const again = await app.inject({ method: 'DELETE', url: `/notes/${note.id}` });

    expect(response.statusCode).toBe(204);
    expect(response.body).toBe('');
    expect(again.statusCode).toBe(404);
    expect(store.count()).toBe(0);
  });

  it('maps a failed delete to 500', async () => {
    const note = await repository.create('Stuck', '');
    vi.spyOn(store, 'delete').mockRejectedValue(new Error('locked'));

    const response = await app.inject({ method: 'DELETE', url: `/notes/${note.id}` });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Failed to delete note' });
  });
});
