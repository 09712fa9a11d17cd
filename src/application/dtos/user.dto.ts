import { z } from 'zod';
import { ValidationError } from '../../domain/errors/app-error.js';
import type { FieldIssue } from '../../domain/errors/app-error.js';
import type { UserInput, UserListFilters, UserPatch } from '../../domain/entities/user.js';

/**
 * DTOs de entrada da API de usuários
 * Regras por campo compartilhadas entre create/replace e patch
 */

const nameSchema = z.string().min(1).max(100);
// Formato do email não é validado, só não pode ser vazio
const emailSchema = z.string().min(1);
const ageSchema = z.number().int().min(0).max(150);
const bioSchema = z.string().max(500);

const userInputSchema = z.object({
  name: nameSchema,
  email: emailSchema,
  age: ageSchema,
  bio: bioSchema.nullish().transform((bio) => bio ?? null),
});

const userPatchSchema = z.object({
  name: nameSchema.optional(),
  email: emailSchema.optional(),
  age: ageSchema.optional(),
  bio: bioSchema.nullable().optional(),
});

// Query strings e params chegam como texto: só dígitos decimais viram número ('', '0x10' e '1e1' não)
const digitsSchema = z.string().regex(/^\d+$/, 'Expected a non-negative integer').transform(Number);

const listUsersQuerySchema = z.object({
  skip: digitsSchema.pipe(z.number().int().min(0)).optional(),
  limit: digitsSchema.pipe(z.number().int().min(1).max(1000)).optional(),
  name: z.string().optional(),
  min_age: digitsSchema.pipe(z.number().int().min(0)).optional(),
  max_age: digitsSchema.pipe(z.number().int().min(0)).optional(),
});

const userIdParamsSchema = z.object({
  id: digitsSchema.pipe(z.number().int().positive()),
});

const searchParamsSchema = z.object({
  term: z.string().min(1),
});

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.errors.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.map(String).join('.') : 'body',
    message: issue.message,
  }));
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(toFieldIssues(result.error), result.error);
  }
  return result.data;
}

export function parseUserInput(raw: unknown): UserInput {
  return parseOrThrow(userInputSchema, raw);
}

export function parseUserPatch(raw: unknown): UserPatch {
  return parseOrThrow(userPatchSchema, raw);
}

export function parseListUsersQuery(raw: unknown): UserListFilters {
  const query = parseOrThrow(listUsersQuerySchema, raw ?? {});
  const filters: UserListFilters = { skip: query.skip ?? 0, limit: query.limit ?? 100 };

  // Nome vazio não filtra
  if (query.name) {
    filters.name = query.name;
  }
  if (query.min_age !== undefined) {
    filters.minAge = query.min_age;
  }
  if (query.max_age !== undefined) {
    filters.maxAge = query.max_age;
  }

  return filters;
}

/**
 * Recebe os params da rota ({ id }) e retorna o id numérico
 */
export function parseUserId(rawParams: unknown): number {
  return parseOrThrow(userIdParamsSchema, rawParams).id;
}

/**
 * Recebe os params da rota ({ term }) e retorna o termo de busca
 */
export function parseSearchTerm(rawParams: unknown): string {
  return parseOrThrow(searchParamsSchema, rawParams).term;
}
