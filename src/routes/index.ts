import type { FastifyInstance } from 'fastify';
import type { LargeObjectStore } from '../largeObjects/store.js';
import { registerObjectRoutes } from './objects.js';
import { registerUploadRoutes } from './uploads.js';

export interface RouteDependencies {
  store: LargeObjectStore;
}

export const registerRoutes = async (app: FastifyInstance, deps: RouteDependencies) => {
  app.get('/api/health', async () => ({ ok: true }));

  await registerObjectRoutes(app, deps.store);
  await registerUploadRoutes(app, deps.store);
};
