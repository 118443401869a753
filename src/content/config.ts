import { resolve } from 'node:path';
import { z } from 'zod';
import { ContentError } from '../kernel/content-error.js';

export const SUPPORTED_SCHEMA_VERSION = 1;

export const DEFAULT_BASE_DIR = 'content/base';
export const DEFAULT_MODS_DIR = 'content/mods';
export const DEFAULT_DEBOUNCE_MS = 150;
export const DEFAULT_QUEUE_CAPACITY = 64;
export const DEFAULT_NAMING_PATTERN = '^[a-z][a-z0-9]*(_[a-z0-9]+)*$';

export const PipelineConfigSchema = z
  .object({
    baseDir: z.string().min(1).default(DEFAULT_BASE_DIR),
    modsDir: z.string().min(1).default(DEFAULT_MODS_DIR),
    supportedSchemaVersion: z.number().int().min(1).default(SUPPORTED_SCHEMA_VERSION),
    debounceMs: z.number().int().min(0).default(DEFAULT_DEBOUNCE_MS),
    queueCapacity: z.number().int().min(1).default(DEFAULT_QUEUE_CAPACITY),
    namingPattern: z
      .string()
      .default(DEFAULT_NAMING_PATTERN)
      .refine(isCompilableRegExp, { message: 'namingPattern must be a valid regular expression' }),
  })
  .strict();

export type PipelineConfig = Readonly<z.infer<typeof PipelineConfigSchema>>;

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/** Fills defaults and makes both roots absolute against `cwd`. */
export function resolvePipelineConfig(input: PipelineConfigInput = {}, cwd: string = process.cwd()): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ContentError('CONTENT_CONFIG_INVALID', 'Invalid content pipeline configuration.', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    });
  }

  return {
    ...parsed.data,
    baseDir: resolve(cwd, parsed.data.baseDir),
    modsDir: resolve(cwd, parsed.data.modsDir),
  };
}

function isCompilableRegExp(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
