import { z } from 'zod';

const positiveIntegerSchema = (message: string) =>
  z.string().regex(/^0*[1-9]\d*$/, { message }).transform(Number);

/**
 * Option values as returned by `parseArgs`, validated and converted
 */
export const cliOptionsSchema = z.object({
  depth: positiveIntegerSchema('Depth must be a positive integer').optional(),
  indent: positiveIntegerSchema('Indent must be a positive integer').optional(),
  tree: z.boolean().default(false),
  help: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.output<typeof cliOptionsSchema>;

/**
 * `parseArgs` option table
 */
export const CLI_ARG_OPTIONS = {
  depth: { type: 'string', short: 'd' },
  tree: { type: 'boolean', short: 't' },
  indent: { type: 'string', short: 'i' },
  help: { type: 'boolean', short: 'h' },
  verbose: { type: 'boolean', short: 'v' },
} as const;
