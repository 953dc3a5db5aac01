import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import { RecordError } from '../errors';
import type { RecordErrorCode } from '../errors';

const STATUS_BY_CODE: Record<RecordErrorCode, number> = {
  validation_error: 400,
  duplicate_key: 400,
  constraint_violation: 400,
  not_found: 404,
  store_unavailable: 500,
  store_error: 500,
};

export function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: 'validation_error', detail: error.flatten() });
}

export function statusFor(err: unknown): number {
  if (err instanceof RecordError) return STATUS_BY_CODE[err.code];
  if (hasStatusCode(err) && err.statusCode >= 400 && err.statusCode < 500) return err.statusCode;
  return 500;
}

/** Maps any failure to `{ error, detail }`; 5xx are logged with the request. */
export function sendError(req: FastifyRequest, reply: FastifyReply, err: unknown) {
  const status = statusFor(err);
  const detail = err instanceof Error ? err.message : String(err);

  if (status >= 500) {
    req.log.error({ err }, 'Request failed');
  }

  let code: string;
  if (err instanceof RecordError) code = err.code;
  else code = status >= 500 ? 'internal_error' : 'bad_request';

  return reply.code(status).send({ error: code, detail });
}

export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((err, req, reply) => sendError(req, reply, err));
}

function hasStatusCode(err: unknown): err is { statusCode: number } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'statusCode' in err &&
    typeof err.statusCode === 'number'
  );
}
