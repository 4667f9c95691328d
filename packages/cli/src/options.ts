import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import {
  ColorModeSchema,
  IndentTypeSchema,
  LineEndingsSchema,
  RunOptionsSchema,
  UsageError,
  type RunOptions,
} from '@moonfmt/shared';

/**
 * The option values commander collects, before they are checked against the run schema.
 */
export const CliFlagsSchema = z.object({
  check: z.boolean().optional(),
  glob: z.array(z.string()).default([]),
  numThreads: z.number().optional(),
  verbose: z.boolean().optional(),
  color: ColorModeSchema.default('auto'),
  rangeStart: z.number().optional(),
  rangeEnd: z.number().optional(),
  configPath: z.string().optional(),
  indentType: IndentTypeSchema.optional(),
  indentWidth: z.number().optional(),
  lineEndings: LineEndingsSchema.optional(),
});

export type CliFlags = z.infer<typeof CliFlagsSchema>;

export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number(value);
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function toRunOptions(files: string[], flags: CliFlags): RunOptions {
  const result = RunOptionsSchema.safeParse({
    files,
    check: flags.check,
    glob: flags.glob.length > 0 ? flags.glob : undefined,
    numThreads: flags.numThreads,
    verbose: flags.verbose,
    color: flags.color,
    rangeStart: flags.rangeStart,
    rangeEnd: flags.rangeEnd,
    configPath: flags.configPath,
    formatOverrides: {
      indentType: flags.indentType,
      indentWidth: flags.indentWidth,
      lineEndings: flags.lineEndings,
    },
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new UsageError(`error: invalid arguments:\n${issues}`);
  }
  return result.data;
}
