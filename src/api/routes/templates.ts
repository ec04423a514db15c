import type { FastifyInstance } from 'fastify';
import { parseConflictPolicy } from '../../introspection/classifier.js';
import type { RouteOpts } from '../types.js';

export async function registerTemplateRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { engine, introspector } = opts.scaffolder;

  fastify.get('/v1/templates', async () => {
    const templates = engine.listTemplates().map((name) => {
      const header = engine.load(name).header;
      return {
        name,
        tier: header?.tier ?? null,
        version: header?.version ?? '0.0.0',
        description: header?.description ?? null,
      };
    });
    return { templates };
  });

  fastify.get<{ Querystring: { name?: string; policy?: string } }>('/v1/templates/schema', async (req, reply) => {
    const name = req.query.name;
    if (!name) {
      return reply.status(400).send({ error: 'Query parameter "name" is required' });
    }
    const policy = parseConflictPolicy(req.query.policy ?? 'permissive');
    return introspector.introspect(name, policy);
  });
}
