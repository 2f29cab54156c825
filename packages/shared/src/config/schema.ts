import { z } from 'zod';
import { ConfigError } from '../errors';

/**
 * Extensions scanned when `--extensions` is not given.
 */
export const DEFAULT_EXTENSIONS: readonly string[] = [
  '.py',
  '.js',
  '.jsx',
  '.ts',
  '.tsx',
  '.java',
  '.cpp',
  '.c',
  '.h',
  '.hpp',
  '.cs',
  '.rb',
  '.php',
  '.go',
  '.rs',
  '.swift',
  '.kt',
  '.kts',
  '.scala',
  '.sql',
  '.html',
  '.css',
  '.scss',
  '.sass',
  '.less',
  '.md',
  '.txt',
  '.json',
  '.yaml',
  '.yml',
];

/** 1 MiB, inclusive. */
export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

/**
 * Turns a comma-separated list (or an array of entries) into an extension set.
 * Entries are trimmed, empty entries dropped, and a leading dot is prepended
 * where missing. Matching stays case-sensitive, so case is preserved.
 */
export function normalizeExtensions(raw: string | readonly string[]): string[] {
  const entries = typeof raw === 'string' ? raw.split(',') : raw;
  const result = new Set<string>();
  for (const entry of entries) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    result.add(trimmed.startsWith('.') ? trimmed : `.${trimmed}`);
  }
  return [...result];
}

export const CountConfigSchema = z.object({
  extensions: z
    .union([z.string(), z.array(z.string())])
    .default(DEFAULT_EXTENSIONS.join(','))
    .transform((value) => normalizeExtensions(value)),
  maxFileSize: z
    .union([
      z.number(),
      z
        .string()
        .trim()
        .regex(/^\d+$/, 'Expected a non-negative integer')
        .transform(Number),
    ])
    .pipe(z.number().int().nonnegative())
    .default(DEFAULT_MAX_FILE_SIZE)
    .describe('Largest file size in bytes that is still tokenized'),
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type CountConfig = z.output<typeof CountConfigSchema>;

const OPTION_FLAGS: Record<string, string> = {
  extensions: '--extensions',
  maxFileSize: '--max-file-size',
  verbose: '--verbose',
  json: '--json',
};

/**
 * Validates raw option values, as commander hands them over, into a CountConfig.
 * @throws ConfigError listing every invalid option
 */
export function parseCountConfig(input: Record<string, unknown>): CountConfig {
  const result = CountConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = String(issue.path[0] ?? '');
      return `${OPTION_FLAGS[key] ?? key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid options: ${problems.join('; ')}`, {
      details: { issues: result.error.issues },
    });
  }
  return result.data;
}
