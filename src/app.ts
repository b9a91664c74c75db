import Fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { TransactionTimeoutError } from './db/transaction.js';
import { LargeObjectError } from './largeObjects/errors.js';
import type { LargeObjectErrorKind } from './largeObjects/errors.js';
import type { LargeObjectStore } from './largeObjects/store.js';
import { UploadOffsetError } from './largeObjects/uploadWriter.js';
import { registerRoutes } from './routes/index.js';

export interface AppOptions {
  store: LargeObjectStore;
  apiAdminToken?: string;
  logger?: boolean;
  production?: boolean;
}

const KIND_STATUS: Record<LargeObjectErrorKind, number> = {
  NotFound: 404,
  AlreadyExists: 409,
  ReadOnly: 409,
  InvalidOffset: 400,
  InvalidMode: 400,
  InvalidArgument: 400,
};

const getRequestPathname = (url: string) => {
  try {
    return new URL(url, 'http://localhost').pathname;
  } catch {
    return String(url || '/').split('?')[0] || '/';
  }
};

const isPublicRoute = (path: string) => path === '/api/health';

const extractToken = (request: FastifyRequest) => {
  const authHeader = request.headers.authorization;
  if (typeof authHeader === 'string' && authHeader.toLowerCase().startsWith('bearer ')) {
    return authHeader.slice(7).trim();
  }
  const headerValue = request.headers['x-api-key'];
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
};

const resolveStatus = (error: FastifyError | LargeObjectError | TransactionTimeoutError | UploadOffsetError) => {
  if (error instanceof UploadOffsetError) {
    return 409;
  }
  if (error instanceof LargeObjectError) {
    return KIND_STATUS[error.kind];
  }
  if (error instanceof TransactionTimeoutError) {
    return 504;
  }
  return typeof error.statusCode === 'number' ? error.statusCode : 500;
};

export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = Fastify({
    logger: options.logger ?? false,
  });

  // Bodies are streamed straight into large objects, so they are not buffered here.
  app.addContentTypeParser('application/octet-stream', (_request, payload, done) => {
    done(null, payload);
  });

  app.addHook('onRequest', async (request, reply) => {
    if (!options.apiAdminToken || isPublicRoute(getRequestPathname(request.url))) {
      return;
    }
    if (extractToken(request) !== options.apiAdminToken) {
      return reply.code(401).send({ error: 'unauthorized' });
    }
  });

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('Referrer-Policy', 'no-referrer');
    if (options.production) {
      reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    return payload;
  });

  app.setErrorHandler((error, request: FastifyRequest, reply: FastifyReply) => {
    const resolvedStatus = resolveStatus(error);
    if (resolvedStatus >= 500) {
      request.log.error(error);
    } else {
      request.log.info({ err: error }, 'request rejected');
    }
    const exposeMessage = resolvedStatus < 500 || error instanceof TransactionTimeoutError;
    const body: { error: string; kind?: LargeObjectErrorKind; size?: number } = {
      error: exposeMessage ? error.message : 'internal server error',
    };
    if (error instanceof LargeObjectError) {
      body.kind = error.kind;
    }
    if (error instanceof UploadOffsetError) {
      body.size = error.size;
    }
    reply.code(resolvedStatus).send(body);
  });

  await registerRoutes(app, { store: options.store });
  return app;
};
