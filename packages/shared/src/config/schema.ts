import os from 'node:os';
import { z } from 'zod';

export const IndentTypeSchema = z.enum(['Tabs', 'Spaces']);
export type IndentType = z.infer<typeof IndentTypeSchema>;

export const LineEndingsSchema = z.enum(['Unix', 'Windows']);
export type LineEndings = z.infer<typeof LineEndingsSchema>;

export const ColorModeSchema = z.enum(['auto', 'always', 'never']);
export type ColorMode = z.infer<typeof ColorModeSchema>;

/**
 * Fully resolved formatting configuration. Built once per run and shared read-only by every job.
 */
export const FormatConfigSchema = z
  .object({
    indentType: IndentTypeSchema.default('Tabs'),
    indentWidth: z.number().int().positive().default(4),
    lineEndings: LineEndingsSchema.default('Unix'),
  })
  .strict();

export type FormatConfig = z.infer<typeof FormatConfigSchema>;

export const DEFAULT_FORMAT_CONFIG: FormatConfig = FormatConfigSchema.parse({});

export function defaultThreadCount(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Options of one formatting run, as produced by the command-line surface.
 */
export const RunOptionsSchema = z
  .object({
    files: z.array(z.string()).default([]),
    check: z.boolean().default(false),
    glob: z.array(z.string()).optional(),
    rangeStart: z.number().int().nonnegative().optional(),
    rangeEnd: z.number().int().nonnegative().optional(),
    numThreads: z.number().int().positive().default(defaultThreadCount),
    verbose: z.boolean().default(false),
    color: ColorModeSchema.default('auto'),
    configPath: z.string().optional(),
    formatOverrides: z
      .object({
        indentType: IndentTypeSchema.optional(),
        indentWidth: z.number().int().positive().optional(),
        lineEndings: LineEndingsSchema.optional(),
      })
      .default({}),
  })
  .strict();

export type RunOptions = Readonly<z.infer<typeof RunOptionsSchema>>;
export type RunOptionsInput = z.input<typeof RunOptionsSchema>;
