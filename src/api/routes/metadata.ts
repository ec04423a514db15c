import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { formatZodIssues } from '../../shared/schemas.js';
import type { RouteOpts } from '../types.js';

const ParseBodySchema = z.object({
  content: z.string(),
  extension: z.string().min(1),
});

export async function registerMetadataRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { parser } = opts.scaffolder;

  fastify.post('/v1/metadata/parse', async (req, reply) => {
    const body = ParseBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.status(400).send({ error: formatZodIssues(body.error) });
    }
    return { metadata: parser.parse(body.data.content, body.data.extension) };
  });
}
