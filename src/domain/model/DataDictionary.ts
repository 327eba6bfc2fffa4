import { z } from 'zod';
import { DictionaryFormatError } from './errors.js';

const constraintsSchema = z.object({
  required: z.boolean().optional(),
  minimum: z.number().optional(),
  maximum: z.number().optional(),
  minLength: z.number().int().nonnegative().optional(),
  maxLength: z.number().int().nonnegative().optional(),
  pattern: z.string().optional(),
  enum: z.array(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

const fieldSchema = z.object({
  name: z.string().min(1),
  title: z.string().optional(),
  type: z.string().optional(),
  format: z.string().optional(),
  description: z.string().optional(),
  constraints: constraintsSchema.optional(),
});

const dictionarySchema = z.object({
  identifier: z.string().optional(),
  title: z.string().optional(),
  fields: z.array(fieldSchema),
});

/** Constraint hints attached to a dictionary field. */
export type DictionaryConstraints = z.infer<typeof constraintsSchema>;

/** One external field definition: at least a name, usually a type label. */
export type DictionaryField = z.infer<typeof fieldSchema>;

/** The externally supplied field-type catalogue that drives schema construction. */
export interface DataDictionary {
  readonly identifier?: string;
  readonly title: string;
  readonly fields: readonly DictionaryField[];
}

/**
 * Validate an untrusted dictionary payload.
 *
 * Accepts either `{ fields: [...] }` (optionally with `title`/`identifier`)
 * or a metastore item `{ identifier, data: { title, fields } }`.
 *
 * @throws DictionaryFormatError when the payload has no usable field list.
 */
export function parseDataDictionary(payload: unknown): DataDictionary {
  const candidate = unwrapMetastoreItem(payload);
  const result = dictionarySchema.safeParse(candidate);

  if (!result.success) {
    throw new DictionaryFormatError(
      'Invalid data dictionary',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  return {
    ...(result.data.identifier !== undefined ? { identifier: result.data.identifier } : {}),
    title: result.data.title ?? 'Untitled Schema',
    fields: result.data.fields,
  };
}

function unwrapMetastoreItem(payload: unknown): unknown {
  const item = z.object({ identifier: z.string(), data: z.record(z.unknown()) }).safeParse(payload);
  if (!item.success) return payload;
  return { ...item.data.data, identifier: item.data.identifier };
}
