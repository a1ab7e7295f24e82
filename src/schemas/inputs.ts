import { z } from 'zod';

import { ArgumentError } from '../lib/errors.js';
import { LOG_LEVELS } from '../lib/types.js';

export const MaxAllowedSchema = z
  .number()
  .int()
  .describe('Cap on simultaneously running tasks; zero or less means no cap');

export const JoinTimeoutSchema = z
  .number()
  .int()
  .optional()
  .describe('Milliseconds to wait; negative or omitted waits until idle');

export const LogLevelSchema = z.enum(LOG_LEVELS);

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/** Parse `value` with `schema`, rethrowing a failure as an `ArgumentError`. */
export function parseArgument<T>(
  schema: z.ZodType<T>,
  value: unknown,
  paramName: string
): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  throw new ArgumentError(
    paramName,
    `Invalid "${paramName}": ${formatIssues(result.error)}`
  );
}
