import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { formatZodIssues } from '../../shared/schemas.js';
import type { RouteOpts } from '../types.js';

const ValidateBodySchema = z.object({
  content: z.string(),
  extension: z.string().min(1),
});

export async function registerValidateRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { validator } = opts.scaffolder;

  fastify.post('/v1/validate', async (req, reply) => {
    const body = ValidateBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.status(400).send({ error: formatZodIssues(body.error) });
    }
    const result = validator.validate(body.data.content, body.data.extension);
    return {
      artifact_type: result.artifactType,
      template: result.templateName,
      passed: result.passed,
      score: result.score,
      issues: result.issues,
      layers_checked: result.layersChecked,
      current_version: result.currentVersion,
      recorded: result.recorded,
    };
  });
}
