/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: value coercion, schema validation, handler invocation,
 *   output formatting and error routing
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import type { z } from 'zod';
import { ValidationError } from '@tradesim/utils';
import { formatZodIssues } from '@tradesim/simulation';
import { CommandContext } from './command-context.js';
import { formatOutput } from './output-formatter.js';
import type { OutputFormat } from '../command-defs/simulation.js';

type CoerceFn = (raw: Record<string, unknown>) => Record<string, unknown>;

export type DefineCommandArgs<TSchema extends z.ZodTypeAny, TResult> = {
  name: string;
  schema: TSchema;
  // Value parsing only (numbers/booleans), NOT key renaming
  coerce?: CoerceFn;
  handler: (args: z.infer<TSchema>, ctx: CommandContext) => Promise<TResult>;
  // Shape the handler result for display
  present?: (result: TResult, format: OutputFormat) => unknown;
  format?: (args: z.infer<TSchema>) => OutputFormat;
  context?: CommandContext;
  write?: (text: string) => void;
  onError?: (e: unknown) => never;
};

/**
 * Validate options against a schema, reporting every issue at once
 */
export function validateArgs<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  raw: Record<string, unknown>
): z.infer<TSchema> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid arguments: ${formatZodIssues(parsed.error)}`, {
      issues: parsed.error.issues.map((issue) => issue.path.join('.')),
    });
  }
  return parsed.data;
}

export function defineCommand<TSchema extends z.ZodTypeAny, TResult>(
  cmd: Command,
  args: DefineCommandArgs<TSchema, TResult>
): Command {
  cmd.name(args.name);

  cmd.action(async () => {
    try {
      // Commander gives camelCase keys already
      const rawOpts = cmd.opts();
      const coerced = args.coerce ? args.coerce(rawOpts) : rawOpts;
      const validated = validateArgs(args.schema, coerced);

      const ctx = args.context ?? new CommandContext();
      const result = await args.handler(validated, ctx);

      const format = args.format ? args.format(validated) : 'json';
      const shown = args.present ? args.present(result, format) : result;
      const write = args.write ?? ((text: string) => process.stdout.write(`${text}\n`));
      write(formatOutput(shown, format));
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
