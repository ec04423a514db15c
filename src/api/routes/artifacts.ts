import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';

export async function registerArtifactRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { artifacts, pipeline } = opts.scaffolder;

  fastify.get('/v1/artifacts', async () => {
    return { artifacts: artifacts.definitions() };
  });

  fastify.get<{ Params: { type: string } }>('/v1/artifacts/:type/schema', async (req) => {
    return pipeline.describe(req.params.type);
  });
}
