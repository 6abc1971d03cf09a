/**
 * Switchboard Gateway Server
 * Fastify app exposing A2A, JSON-RPC, OpenAI-compatible and private adapter routes
 */

import fastify from 'fastify';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { v4 as uuidv4 } from 'uuid';
import type { GatewayConfig } from './config';
import type { GatewayContext } from './context';
import { JSONRPC_PARSE_ERROR, rpcError } from './a2a';
import { sendProblem } from './problem';
import { registerA2ARoutes } from './routes/a2a';
import { registerMetaRoutes } from './routes/meta';
import { registerOpenAIRoutes } from './routes/openai';
import { registerPrivateAdapterRoute } from './routes/private-adapter';

export const JSON_REQUIRED = 'Content-Type must be application/json';

const JSON_CONTENT_TYPE = /^application\/([\w.+-]+\+)?json\b/i;

export interface ServerOptions extends GatewayContext {
  /** Fastify request logging; off in tests */
  logger?: boolean;
}

/**
 * Body that could not be parsed as JSON
 */
export class BodyParseError extends Error {
  readonly statusCode = 400;
  readonly code = 'INVALID_JSON_BODY';
}

function pathOf(request: FastifyRequest): string {
  return request.url.split('?', 1)[0];
}

function corsOptions(config: GatewayConfig['cors']) {
  const anyOrigin = config.origins.includes('*');
  return {
    // '*' cannot be combined with credentials; reflect the caller's origin instead
    origin: anyOrigin ? (config.credentials ? true : '*') : config.origins,
    methods: config.methods.includes('*') ? undefined : config.methods,
    allowedHeaders: config.headers.includes('*') ? undefined : config.headers,
    credentials: config.credentials
  };
}

/**
 * Create and configure Fastify server
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { config } = options;

  const app = fastify({
    requestIdHeader: 'x-request-id',
    genReqId: () => uuidv4(),
    logger: options.logger === false ? false : {
      level: config.logLevel,
      serializers: {
        req(request) {
          return {
            method: request.method,
            url: request.url,
            headers: {
              ...request.headers,
              authorization: request.headers.authorization ? '[REDACTED]' : undefined,
              'x-api-key': request.headers['x-api-key'] ? '[REDACTED]' : undefined
            }
          };
        }
      }
    }
  });

  await app.register(cors, corsOptions(config.cors));
  await app.register(helmet);

  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    const text = String(body);
    if (!text.trim()) {
      done(new BodyParseError('Empty JSON body'), undefined);
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch (error) {
      done(new BodyParseError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`), undefined);
    }
  });

  app.addHook('onSend', async (request, reply, payload) => {
    reply.header('X-Request-ID', request.id);
    reply.header('Cache-Control', 'no-store');
    return payload;
  });

  app.addHook('preValidation', async (request, reply) => {
    if (request.method !== 'POST' || request.is404) {
      return;
    }
    const contentType = request.headers['content-type'] ?? '';
    if (!JSON_CONTENT_TYPE.test(contentType)) {
      return sendProblem(request, reply, 415, JSON_REQUIRED);
    }
  });

  registerMetaRoutes(app, options);
  registerA2ARoutes(app, options);
  registerOpenAIRoutes(app, options);
  registerPrivateAdapterRoute(app, options);

  // Error handler
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof BodyParseError && pathOf(request) === '/rpc') {
      request.log.warn({ err: error }, 'JSON-RPC parse error');
      return reply.status(200).send(rpcError(null, JSONRPC_PARSE_ERROR, 'Parse error'));
    }

    const status = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
    if (status >= 500) {
      request.log.error({ err: error, url: request.url, method: request.method }, 'Request failed');
      return sendProblem(request, reply, status, 'internal_error');
    }

    request.log.warn({ err: error, url: request.url }, 'Request rejected');
    return sendProblem(request, reply, status, status === 415 ? JSON_REQUIRED : error.message);
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) =>
    sendProblem(request, reply, 404, `Route ${request.method} ${pathOf(request)} not found`)
  );

  return app;
}

/**
 * Start the server
 */
export async function startServer(options: ServerOptions): Promise<FastifyInstance> {
  const app = await createServer(options);
  const address = await app.listen({ host: options.config.host, port: options.config.port });
  app.log.info(
    { provider: options.provider.id, framework: options.framework.id },
    `Switchboard gateway listening on ${address}`
  );
  return app;
}
