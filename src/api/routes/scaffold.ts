import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { formatZodIssues } from '../../shared/schemas.js';
import type { RouteOpts } from '../types.js';

const ScaffoldBodySchema = z.object({
  artifact_type: z.string().min(1),
  context: z.record(z.unknown()).default({}),
  output_path: z.string().optional(),
  write: z.boolean().default(false),
  overwrite: z.boolean().default(false),
});

export async function registerScaffoldRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { pipeline } = opts.scaffolder;

  fastify.post('/v1/scaffold', async (req, reply) => {
    const body = ScaffoldBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.status(400).send({ error: formatZodIssues(body.error) });
    }
    const result = pipeline.scaffold({
      artifactType: body.data.artifact_type,
      context: body.data.context,
      outputPath: body.data.output_path,
      write: body.data.write,
      overwrite: body.data.overwrite,
    });
    return {
      artifact_type: result.artifactType,
      template: result.templateName,
      version_hash: result.versionHash,
      output_path: result.outputPath,
      written: result.written,
      states: result.states,
      content: result.content,
    };
  });
}
