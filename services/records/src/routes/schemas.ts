import { z } from 'zod';

// empty form fields and JSON nulls both mean "not supplied"
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((v) => (v ? v : undefined));

const patchText = (max: number) => z.string().trim().max(max).nullish();

export const createSchema = z.object({
  externalKey: z.string().trim().min(1, 'externalKey required').max(50),
  name: z.string().trim().min(1, 'name required').max(100),
  rights: optionalText(50),
  status: optionalText(50),
  remarks: optionalText(500),
});

export const updateSchema = z.object({
  externalKey: patchText(50),
  name: patchText(100),
  rights: patchText(50),
  status: patchText(50),
  remarks: patchText(500),
});

export const MAX_RECORD_ID = 2_147_483_647;

export const idParamsSchema = z.object({
  // ids are 32-bit SERIAL values on PostgreSQL
  id: z.coerce.number().int().positive().max(MAX_RECORD_ID),
});

export const searchBodySchema = z.object({
  query: z.string(),
});

export function listQuerySchema(maxLimit: number) {
  return z.object({
    search: z.string().optional(),
    skip: z.coerce.number().int().min(0).optional(),
    limit: z.coerce.number().int().positive().max(maxLimit).optional(),
  });
}
