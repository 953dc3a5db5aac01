import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import formbody from '@fastify/formbody';
import { renderListPage } from '../views/listPage';
import { autoExport } from './export';
import { badRequest } from './errors';
import type { RouteDeps } from './deps';
import { createSchema, idParamsSchema, listQuerySchema, updateSchema } from './schemas';

const LIST_PATH = '/';

/**
 * Form/redirect contract: mutations take url-encoded bodies and answer with
 * a 303 back to the listing page.
 */
export async function registerFormRoutes(app: FastifyInstance, deps: RouteDeps) {
  const { service, config } = deps;
  const listSchema = listQuerySchema(config.pagination.maxLimit);

  await app.register(formbody);

  const listHandler = async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = listSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const page = await service.list(parsed.data);
    if (!parsed.data.search?.trim()) await autoExport(req, deps);
    return reply.type('text/html; charset=utf-8').send(renderListPage(page, parsed.data.search));
  };
  app.get(LIST_PATH, listHandler);
  app.get('/main', listHandler);

  app.post('/add', async (req, reply) => {
    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    await service.create(parsed.data);
    return reply.code(303).redirect(LIST_PATH);
  });

  app.post('/update/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const parsed = updateSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    await service.update(params.data.id, parsed.data);
    return reply.code(303).redirect(LIST_PATH);
  });

  app.post('/delete/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    await service.delete(params.data.id);
    return reply.code(303).redirect(LIST_PATH);
  });
}
