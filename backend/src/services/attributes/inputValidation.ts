/**
 * Input Validation
 * Zod schemas for caller rows and operation options
 */

import { z, type ZodTypeAny } from 'zod';
import { InvalidInputError } from '../../lib/errors.js';

export const studyRowSchema = z
  .object({
    STUDYID: z.string().min(1),
  })
  .passthrough();

export const animalRowSchema = studyRowSchema
  .extend({
    USUBJID: z.string().min(1),
  })
  .passthrough();

const filterValuesSchema = z.union([z.string(), z.array(z.string()).readonly()]).nullish();

export const entityAttributeOptionsSchema = z.object({
  filter: filterValuesSchema,
  inclUncertain: z.boolean().default(false),
  exclusively: z.boolean().default(false),
  matchAll: z.boolean().default(false),
  noFilterReportUncertain: z.boolean().default(true),
});

export const groupAttributeOptionsSchema = z.object({
  filter: filterValuesSchema,
  exclusively: z.boolean().default(true),
  inclUncertain: z.boolean().default(false),
  noFilterReportUncertain: z.boolean().default(true),
});

export type EntityAttributeOptions = z.input<typeof entityAttributeOptionsSchema>;
export type GroupAttributeOptions = z.input<typeof groupAttributeOptionsSchema>;

/**
 * Parse a value, raising InvalidInputError on failure
 */
export function parseInput<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  context: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw InvalidInputError.fromZodError(context, result.error);
  }
  return result.data;
}

/**
 * Check the identity columns of caller rows; the rows themselves are kept as given
 */
export function assertRows(schema: ZodTypeAny, rows: unknown, context: string): void {
  parseInput(z.array(schema), rows, context);
}
