import { PassThrough } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import type { LargeObjectStore } from '../largeObjects/store.js';
import { parseObjectId, requireBinaryBody } from './helpers.js';
import type { ObjectParams } from './helpers.js';

export const registerObjectRoutes = async (app: FastifyInstance, store: LargeObjectStore) => {
  app.post('/api/objects', async (request, reply) => {
    const objectId = await store.importObject(requireBinaryBody(request.body));
    request.log.info({ objectId }, 'large object imported');
    return reply.code(201).send({ objectId });
  });

  app.get<{ Params: ObjectParams }>('/api/objects/:objectId', async (request, reply) => {
    const objectId = parseObjectId(request.params.objectId);
    // Resolving the size first sends a missing object through the error handler
    // before any header is written.
    const size = await store.sizeOf(objectId);
    const body = new PassThrough();
    void store.exportObject(objectId, { sink: body }).catch((error: unknown) => {
      request.log.error({ err: error, objectId }, 'large object export failed');
      body.destroy(error instanceof Error ? error : new Error(String(error)));
    });
    return reply.type('application/octet-stream').header('content-length', size).send(body);
  });

  app.get<{ Params: ObjectParams }>('/api/objects/:objectId/size', async (request) => {
    const objectId = parseObjectId(request.params.objectId);
    const size = await store.sizeOf(objectId);
    return { objectId, size };
  });

  app.delete<{ Params: ObjectParams }>('/api/objects/:objectId', async (request, reply) => {
    const objectId = parseObjectId(request.params.objectId);
    await store.removeObject(objectId);
    return reply.code(204).send();
  });
};
