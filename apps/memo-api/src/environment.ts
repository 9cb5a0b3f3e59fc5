import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  DEFAULT_COMPLETION_MODEL,
  DEFAULT_COMPLETION_TEMPERATURE,
  DEFAULT_SOURCE_CHAR_LIMIT,
} from '@special-sits/shared/types';
import { DEEPSEEK_API_URL } from '@special-sits/memo/integrations';

const optionalNumber = (schema: z.ZodNumber) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined)
    .pipe(z.coerce.number().pipe(schema).optional());

const environmentSchema = z
  .object({
    DEEPSEEK_API_KEY: z.string({ required_error: 'DEEPSEEK_API_KEY is required' }).trim().min(1, 'DEEPSEEK_API_KEY is required'),
    FMP_API_KEY: z.string({ required_error: 'FMP_API_KEY is required' }).trim().min(1, 'FMP_API_KEY is required'),
    DEEPSEEK_API_URL: z.string().url().optional(),
    DEEPSEEK_MODEL: z.string().min(1).optional(),
    COMPLETION_TEMPERATURE: optionalNumber(z.number().min(0).max(2)),
    SOURCE_CHAR_LIMIT: optionalNumber(z.number().int().positive()),
    ARTIFACT_DIR: z.string().min(1).optional(),
    PORT: optionalNumber(z.number().int().positive()),
  })
  .passthrough();

/**
 * Fails startup when a required key is missing or a value is malformed,
 * listing every problem at once.
 */
export function validateEnvironment(env: Record<string, unknown>): Record<string, unknown> {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}

export default registerAs('memo', () => ({
  port: Number(process.env.PORT) || 3002,
  deepseek: {
    apiKey: process.env.DEEPSEEK_API_KEY,
    apiUrl: process.env.DEEPSEEK_API_URL || DEEPSEEK_API_URL,
    model: process.env.DEEPSEEK_MODEL || DEFAULT_COMPLETION_MODEL,
    temperature: process.env.COMPLETION_TEMPERATURE
      ? Number(process.env.COMPLETION_TEMPERATURE)
      : DEFAULT_COMPLETION_TEMPERATURE,
  },
  fmp: {
    apiKey: process.env.FMP_API_KEY,
  },
  sourceCharLimit: Number(process.env.SOURCE_CHAR_LIMIT) || DEFAULT_SOURCE_CHAR_LIMIT,
  artifactDir: process.env.ARTIFACT_DIR || undefined,
}));
