/**
 * Option validation using TypeBox.
 */

import { Type } from 'typebox';
import type { Static } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';

/**
 * Options accepted by `createDelimiterReader`.
 */
export const DelimiterReaderOptionsSchema = Type.Object(
  {
    /** Byte value terminating a message. */
    delimiter: Type.Optional(Type.Integer({ minimum: 0, maximum: 255 })),
    /** Largest message, terminator included, before the framer gives up. */
    maxLength: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false }
);

export type DelimiterReaderOptions = Static<typeof DelimiterReaderOptionsSchema>;

const delimiterReaderOptions = Compile(DelimiterReaderOptionsSchema);

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Validate delimiter reader options, throwing `ValidationError` when invalid.
 */
export function validateDelimiterReaderOptions(value: unknown): DelimiterReaderOptions {
  if (!delimiterReaderOptions.Check(value)) {
    throw new ValidationError(formatErrors(delimiterReaderOptions.Errors(value)));
  }
  return value;
}
