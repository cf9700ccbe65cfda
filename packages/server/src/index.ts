import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { ErrorResponse, HealthResponse } from '@clinical-scribe/shared';
import { loadConfig, ServerConfig } from './config/env';
import {
  BadRequestError,
  CancelledError,
  ConfigurationError,
  describeError,
  JobFailedError,
  PollTimeoutError,
  TransportError
} from './domain/errors';
import { noteRoutes } from './routes/notes';
import { scribeRoutes } from './routes/scribe';
import { createPipeline, ScribePipeline } from './services';

const MAX_AUDIO_BYTES = 1048576 * 500; // 500MB

export interface BuildServerOptions {
  config?: ServerConfig;
  pipeline?: ScribePipeline;
}

// Non-standard, borrowed from nginx: the client closed the request.
const CLIENT_CLOSED_REQUEST = 499;

export function statusForError(error: unknown): number {
  if (error instanceof BadRequestError) return 400;
  if (error instanceof JobFailedError) return 422;
  if (error instanceof CancelledError) return CLIENT_CLOSED_REQUEST;
  if (error instanceof TransportError) return 502;
  if (error instanceof ConfigurationError) return 503;
  if (error instanceof PollTimeoutError) return 504;
  return 500;
}

export function buildServer(options: BuildServerOptions = {}): FastifyInstance {
  const config = options.config ?? loadConfig();
  const pipeline = options.pipeline ?? createPipeline(config);
  const apiKey = config.apiKey;

  const server = Fastify({
    logger: false,
    bodyLimit: MAX_AUDIO_BYTES,
  });

  server.register(cors, { origin: '*' });
  server.register(multipart, { limits: { fileSize: MAX_AUDIO_BYTES, files: 1 } });

  // --- AUTHENTICATION ---
  server.addHook('onRequest', async (request, reply) => {
    if (apiKey) {
      const clientKey = request.headers['x-api-key'];
      if (!clientKey || clientKey !== apiKey) {
        console.warn(`🔒 Unauthorized access attempt from ${request.ip}`);
        return reply.code(401).send({ error: 'Unauthorized: Invalid or missing API Key' });
      }
    }
  });

  server.setErrorHandler((error: FastifyError, request, reply) => {
    let status = statusForError(error);
    // Fastify's own 4xx (bad JSON, oversized body, bad content type)
    if (status === 500 && typeof error.statusCode === 'number' && error.statusCode < 500) {
      status = error.statusCode;
    }

    const message = describeError(error);
    if (status >= 500) {
      console.error(`❌ ${request.method} ${request.url} → ${status}: ${message}`);
    } else {
      console.warn(`⚠️ ${request.method} ${request.url} → ${status}: ${message}`);
    }

    const body: ErrorResponse = { error: message };
    return reply.status(status).send(body);
  });

  server.get<{ Reply: HealthResponse }>('/', async () => ({
    status: 'online',
    service: 'Clinical Scribe Server',
    generation: pipeline.canGenerate,
  }));

  server.register(scribeRoutes, { pipeline });
  server.register(noteRoutes, { pipeline });

  return server;
}
