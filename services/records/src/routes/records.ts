import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { autoExport } from './export';
import { badRequest } from './errors';
import type { RouteDeps } from './deps';
import { createSchema, idParamsSchema, listQuerySchema, updateSchema } from './schemas';

const LIST_PATHS = ['/', '/main', '/records'] as const;

/** JSON/REST contract. */
export async function registerRecordRoutes(app: FastifyInstance, deps: RouteDeps) {
  const { service, config } = deps;
  const listSchema = listQuerySchema(config.pagination.maxLimit);

  // List / filter
  const listHandler = async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = listSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const page = await service.list(parsed.data);
    if (!parsed.data.search?.trim()) await autoExport(req, deps);
    return reply.send(page);
  };
  for (const path of LIST_PATHS) app.get(path, listHandler);

  // Read one
  app.get('/records/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    return reply.send(await service.get(params.data.id));
  });

  // Create
  app.post('/records', async (req, reply) => {
    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const record = await service.create(parsed.data);
    return reply.code(201).send(record);
  });

  // Partial update
  app.put('/records/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const parsed = updateSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    return reply.send(await service.update(params.data.id, parsed.data));
  });

  // Delete
  app.delete('/records/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    await service.delete(params.data.id);
    return reply.code(204).send();
  });
}
