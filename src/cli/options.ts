import { z } from 'zod';

import { DEFAULT_DIAL_TIMEOUT_MS } from '../constants.js';

const milliseconds = z.coerce
  .number({ invalid_type_error: 'must be a number of milliseconds' })
  .int('must be a whole number of milliseconds')
  .positive('must be greater than zero');

const headerLine = z
  .string()
  .regex(/^[^:\s][^:]*:/, 'must look like "Name: value"')
  .transform((line): [string, string] => {
    const colon = line.indexOf(':');
    return [line.slice(0, colon).trim(), line.slice(colon + 1).trim()];
  });

/**
 * Options as commander hands them over, before validation
 */
export const cliOptionsSchema = z.object({
  connectTimeout: milliseconds.default(DEFAULT_DIAL_TIMEOUT_MS),
  timeout: milliseconds.optional(),
  http2: z.boolean().default(true),
  ca: z.string().min(1, 'must name a file').optional(),
  header: z.array(headerLine).default([]),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * One line per problem, e.g. `--connect-timeout: must be greater than zero`
 */
export function describeOptionIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const [key] = issue.path;
    const flag = typeof key === 'string' ? `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}` : 'options';
    return `${flag}: ${issue.message}`;
  });
}
