import type { FastifyInstance } from 'fastify';
import { runTemplateDoctor } from '../../templates/doctor.js';
import type { RouteOpts } from '../types.js';

export async function registerDoctorRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/doctor', async () => {
    const { engine, artifacts, settings } = opts.scaffolder;
    return runTemplateDoctor({ engine, artifacts, metadataConfigPath: settings.metadataConfigPath });
  });
}
