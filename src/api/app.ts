import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import type { NoteRepository } from '../repositories/note-repository.js';
import { registerRoutes } from './routes.js';

export async function buildApp(repository: NoteRepository): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  });

  await registerRoutes(app, repository);
  return app;
}
