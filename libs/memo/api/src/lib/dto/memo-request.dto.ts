import { z } from 'zod';
import { ValuationMode } from '@special-sits/shared/types';
import { InvalidMemoRequestError, parsePeerList } from '@special-sits/memo/core';

/**
 * Multipart form fields arrive as strings; blank fields count as absent.
 */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const requiredText = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} is required`);

const formBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'on', 'off', ''])])
  .optional()
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'on');

export const memoRequestSchema = z.object({
  companyName: requiredText('companyName'),
  situationType: requiredText('situationType'),
  valuationMode: optionalText.pipe(z.nativeEnum(ValuationMode).optional()),
  parentPeers: optionalText.transform(parsePeerList),
  spincoPeers: optionalText.transform(parsePeerList),
  targetTicker: optionalText,
  enrichWithMarketData: formBoolean,
});

export type MemoRequestDto = z.infer<typeof memoRequestSchema>;

export const infographicRequestSchema = z.object({
  companyName: optionalText,
  situationType: optionalText,
});

export type InfographicRequestDto = z.infer<typeof infographicRequestSchema>;

export const sessionIdSchema = z
  .string()
  .trim()
  .max(128, 'session id is too long')
  .regex(/^[A-Za-z0-9_-]*$/, 'session id may only contain letters, digits, "-" and "_"')
  .optional()
  .transform((value) => value || undefined);

/**
 * @throws InvalidMemoRequestError listing every failed field
 */
export function parseRequest<TSchema extends z.ZodTypeAny>(schema: TSchema, input: unknown): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidMemoRequestError(`Invalid request: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
