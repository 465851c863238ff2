import { z } from 'zod';
import { ValidationError } from '../errors.js';

const analysisType = z.enum(['quick', 'deep']);

const queryFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

export const analyzeParamsSchema = z.object({
  tokenAddress: z.string().trim().min(1, 'tokenAddress is required'),
});

export const analyzeQuerySchema = z.object({
  type: analysisType.default('quick'),
  refresh: queryFlag,
});

export const analyzeBodySchema = z.object({
  token_address: z.string().trim().min(1, 'token_address is required'),
  analysis_type: analysisType.default('quick'),
  refresh: z.boolean().default(false),
});

export const securityBodySchema = z.object({
  token_address: z.string().trim().min(1, 'token_address is required'),
});

export const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

/** Parses request input, turning zod issues into a 400 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(message);
  }
  return result.data;
}
