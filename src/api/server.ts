import Fastify from 'fastify';
import cors from '@fastify/cors';
import { isScaffoldError, MetadataParseError, ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createScaffolder, type Scaffolder } from '../scaffolding/factory.js';
import { resolveSettings } from '../workspace/settings.js';
import { statusForError, type ErrorBody } from './errors.js';
import { registerTemplateRoutes } from './routes/templates.js';
import { registerArtifactRoutes } from './routes/artifacts.js';
import { registerScaffoldRoutes } from './routes/scaffold.js';
import { registerMetadataRoutes } from './routes/metadata.js';
import { registerValidateRoutes } from './routes/validate.js';
import { registerDoctorRoutes } from './routes/doctor.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
  /** Prebuilt collaborators; tests pass one wired to a temp directory. */
  scaffolder?: Scaffolder;
}

export async function createServer(opts: ServerOptions = {}) {
  const host = opts.host ?? process.env['TIERFORGE_API_HOST'] ?? '127.0.0.1';
  const port = opts.port ?? parseInt(process.env['TIERFORGE_API_PORT'] ?? '7810', 10);

  // Enforce loopback bind by default
  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback) {
    logger.warn('Non-loopback bind requested. The API has no authentication.', { host });
  }

  const scaffolder = opts.scaffolder ?? createScaffolder(resolveSettings(opts.cwd ?? process.cwd()));

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  // CORS – restrict to loopback origins
  await fastify.register(cors, {
    origin: ['http://localhost', 'http://127.0.0.1', 'http://[::1]'],
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
  });

  fastify.setErrorHandler((err, req, reply) => {
    if (isScaffoldError(err)) {
      const body: ErrorBody = { error: err.message, code: err.code, hints: err.hints };
      if (err instanceof ValidationError) body.missing = err.missing;
      if (err instanceof MetadataParseError && err.field !== undefined) body.field = err.field;
      const status = statusForError(err);
      if (status >= 500) logger.error('Request failed', { url: req.url, code: err.code, error: err.message });
      return reply.status(status).send(body);
    }
    logger.error('Unhandled error', { url: req.url, error: err.message });
    return reply.status(err.statusCode ?? 500).send({ error: err.message });
  });

  // Routes under /v1
  const routeOpts = { scaffolder };
  await registerTemplateRoutes(fastify, routeOpts);
  await registerArtifactRoutes(fastify, routeOpts);
  await registerScaffoldRoutes(fastify, routeOpts);
  await registerMetadataRoutes(fastify, routeOpts);
  await registerValidateRoutes(fastify, routeOpts);
  await registerDoctorRoutes(fastify, routeOpts);

  return { fastify, host, port };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  try {
    await fastify.listen({ host, port });
    logger.info('tierforge API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  }
}
