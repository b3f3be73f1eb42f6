import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const SelectedColumnSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['numeric', 'categorical']),
});

/** Structured export of a builder's selection. Serializes to plain JSON. */
export const SchemaRecordSchema = z.object({
  source: z.string(),
  options: z.object({
    dateAsNumeric: z.boolean(),
    stringAsNominal: z.boolean(),
  }),
  features: z.array(SelectedColumnSchema),
  labels: z.array(SelectedColumnSchema),
});

export type SchemaRecord = z.infer<typeof SchemaRecordSchema>;
export type SchemaRecordColumn = z.infer<typeof SelectedColumnSchema>;

/**
 * Validate an untrusted value (e.g. the result of `JSON.parse`) as a schema record.
 *
 * @throws ConfigurationError listing every offending path.
 */
export function parseSchemaRecord(value: unknown): SchemaRecord {
  const result = SchemaRecordSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError('Invalid schema record', issues.join('; '));
  }
  return result.data;
}
