import type { FastifyInstance } from 'fastify';
import { collect, iterateChunks } from '../largeObjects/streams.js';
import type { LargeObjectStore } from '../largeObjects/store.js';
import { LargeObjectUploadWriter } from '../largeObjects/uploadWriter.js';
import { parseNonNegativeInt, parseObjectId, requireBinaryBody } from './helpers.js';
import type { ObjectParams } from './helpers.js';

export const registerUploadRoutes = async (app: FastifyInstance, store: LargeObjectStore) => {
  const writer = new LargeObjectUploadWriter(store);

  app.post('/api/uploads', async (_request, reply) => {
    const state = await writer.init();
    return reply.code(201).send(writer.meta(state));
  });

  app.put<{ Params: ObjectParams; Querystring: { offset?: string } }>(
    '/api/uploads/:objectId/chunks',
    async (request) => {
      const objectId = parseObjectId(request.params.objectId);
      const offset = parseNonNegativeInt(request.query.offset, 'offset');
      const data = await collect(iterateChunks(requireBinaryBody(request.body), store.defaults.transferBufferSize));
      const state = await writer.writeChunkAt(data, { objectId, bytesWritten: offset });
      return writer.meta(state);
    },
  );

  app.delete<{ Params: ObjectParams }>('/api/uploads/:objectId', async (request, reply) => {
    const objectId = parseObjectId(request.params.objectId);
    await writer.close({ objectId, bytesWritten: 0 }, 'cancel');
    return reply.code(204).send();
  });
};
