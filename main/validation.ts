import { z } from 'zod';
import { ValidationError } from './errors';

// Document ids double as file names, so keep them to a portable set.
const documentId = z
  .string()
  .min(1, 'documentId is required')
  .max(128, 'documentId must be at most 128 characters')
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'documentId may only contain letters, digits, ".", "_" and "-"');

const versionId = z.string().min(1, 'versionId is required');

const annotation = z.string().nullish();

export const schemas = {
  documentId,
  versionId,

  versionRecord: z.object({
    version_id: z.string().min(1),
    content: z.string(),
    timestamp: z.string().min(1),
    label: z.string().nullable(),
    style: z.string().nullable(),
  }),

  saveVersionArgs: z.object({
    documentId,
    content: z.string({ required_error: 'content is required' }),
    label: annotation,
    style: annotation,
  }),

  documentArgs: z.object({
    documentId,
  }),

  getVersionArgs: z.object({
    documentId,
    versionId,
  }),

  compareVersionsArgs: z.object({
    documentId,
    versionIdA: versionId,
    versionIdB: versionId,
    charLevel: z.boolean().optional(),
  }),

  compareArgs: z.object({
    textA: z.string({ required_error: 'textA is required' }),
    textB: z.string({ required_error: 'textB is required' }),
    charLevel: z.boolean().optional(),
  }),
};

export const historySchema = z.array(schemas.versionRecord);

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Validation failed: ${issues.map((issue) => issue.message).join(', ')}`,
      { issues }
    );
  }
  return result.data;
}

export function assertDocumentId(value: string): string {
  return validate(schemas.documentId, value);
}
