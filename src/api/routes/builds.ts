import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOpts } from '../types.js';

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  repository: z.string().min(1).optional(),
});

export async function registerBuildRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/builds', async (req, reply) => {
    const query = ListQuerySchema.safeParse(req.query);
    if (!query.success) {
      const issue = query.error.issues[0];
      return reply.status(400).send({ error: `${issue?.path.join('.') ?? 'query'}: ${issue?.message ?? 'invalid'}` });
    }
    const { limit, offset, repository } = query.data;
    const builds = opts.store.list({ limit, offset, repository });
    return { builds, limit, offset, total: opts.store.count() };
  });

  fastify.get<{ Params: { id: string } }>('/v1/builds/:id', async (req, reply) => {
    const record = opts.store.get(req.params.id);
    if (!record) return reply.status(404).send({ error: 'Build not found' });
    return record;
  });
}
