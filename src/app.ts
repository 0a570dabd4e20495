import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';
import { env, type Env } from './config/env.js';
import { AppError } from './common/errors.js';
import { ModelConfig, registerClassifierModule, type ArtifactLoader } from './modules/classifier/index.js';

export interface BuildAppOptions {
  modelConfig?: ModelConfig;
  loader?: ArtifactLoader;
  logLevel?: Env['LOG_LEVEL'];
  nodeEnv?: Env['NODE_ENV'];
  corsOrigins?: string;
  predictTimeoutMs?: number;
  bodyLimit?: number;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const nodeEnv = options.nodeEnv ?? env.NODE_ENV;
  const corsOrigins = options.corsOrigins ?? env.CORS_ORIGINS;
  const modelConfig = options.modelConfig ?? ModelConfig.fromFile(env.MODEL_CONFIG_PATH);

  const app = Fastify({
    logger: {
      level: options.logLevel ?? env.LOG_LEVEL,
    },
    trustProxy: true,
    bodyLimit: options.bodyLimit ?? env.BODY_LIMIT_BYTES,
    requestIdHeader: 'x-request-id',
    genReqId: () => uuidv4(),
  });

  // CORS
  app.register(cors, {
    origin: corsOrigins === '*' ? true : corsOrigins.split(',').map((o) => o.trim()),
  });

  // Global error handler
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      if (err.code === 'InternalInvariantViolation' && nodeEnv !== 'production') {
        request.log.fatal({ err }, 'Internal invariant violated');
      } else if (err.isClientError) {
        request.log.warn({ err: { code: err.code, message: err.message } }, 'Request rejected');
      } else {
        request.log.error({ err }, 'Request failed');
      }

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      });
    }

    // Body parser and schema errors from Fastify itself
    const statusCode = err.statusCode ?? 500;
    if (err.validation || (statusCode >= 400 && statusCode < 500)) {
      request.log.warn({ err: { code: err.code, message: err.message } }, 'Request rejected');
      return reply.status(err.validation ? 400 : statusCode).send({
        ok: false,
        error: 'MalformedInput',
        message: err.message,
      });
    }

    // Unknown errors
    request.log.error({ err }, 'Unexpected error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalError',
      message: nodeEnv === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NotFound',
      message: 'Route not found',
    });
  });

  app.register(async (fastify) => {
    await registerClassifierModule(fastify, {
      config: modelConfig,
      loader: options.loader,
      predictTimeoutMs: options.predictTimeoutMs ?? env.PREDICT_TIMEOUT_MS,
    });
  });

  return app;
}
