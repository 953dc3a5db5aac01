// src/routes/search.ts
import type { FastifyInstance } from 'fastify';
import { badRequest } from './errors';
import type { RouteDeps } from './deps';
import { searchBodySchema } from './schemas';

export async function registerSearchRoutes(app: FastifyInstance, { service }: RouteDeps) {
  app.post('/search', async (req, reply) => {
    const parsed = searchBodySchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    // blank query returns everything
    return reply.send(await service.search(parsed.data.query));
  });
}
