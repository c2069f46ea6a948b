/**
 * Boundary Extractor MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool. Each schema carries its constraints,
 * descriptive messages and defaults.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with `path: message` pairs joined by '; '
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SearchTypeSchema = z.enum(['all', 'state', 'lga', 'ward']);

export const BannerPositionSchema = z.enum(['after_tables', 'before_tables']);

/**
 * Configuration keys settable through boundary_config_set
 */
export const ConfigKey = z.enum([
  'output_dir',
  'max_file_size_mb',
  'preseed_first_reference',
  'accept_unlisted_banners',
  'banner_position',
  'header_min_matches',
  'banner_min_length',
  'banner_max_length',
  'code_max_length',
]);

export type ConfigKeyName = z.infer<typeof ConfigKey>;

const ColumnIndex = z.number().int().min(0).max(50);

/**
 * Fixed column positions, or the name of a known layout
 */
export const ColumnLayoutInput = z.union([
  z.literal('lga_ward_six_column'),
  z.object({
    level2_name: ColumnIndex,
    level2_code: ColumnIndex,
    level3_name: ColumnIndex,
    level3_code: ColumnIndex,
  }),
]);

const ReferenceStatesInput = z
  .array(z.string().min(1).max(100))
  .max(200)
  .nullable()
  .optional()
  .describe(
    'Ordered state names used for code-reset boundaries; null disables them, omitted uses the bundled list'
  );

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DatabaseCreateInput = z.object({
  name: z
    .string()
    .min(1, 'Database name is required')
    .max(64, 'Database name must be 64 characters or less')
    .regex(
      /^[a-zA-Z0-9_-]+$/,
      'Database name must contain only alphanumeric characters, underscores, and hyphens'
    ),
  description: z.string().max(500, 'Description must be 500 characters or less').optional(),
  storage_path: z.string().optional(),
});

export const DatabaseListInput = z.object({
  include_stats: z.boolean().default(false),
  limit: z
    .number()
    .int()
    .min(1)
    .max(500)
    .default(50)
    .describe('Maximum number of databases to return (default 50)'),
  offset: z
    .number()
    .int()
    .min(0)
    .default(0)
    .describe('Number of databases to skip for pagination'),
});

export const DatabaseSelectInput = z.object({
  database_name: z.string().min(1, 'Database name is required'),
});

export const DatabaseStatsInput = z.object({
  database_name: z.string().optional(),
});

export const DatabaseDeleteInput = z.object({
  database_name: z.string().min(1, 'Database name is required'),
  confirm: z.literal(true, {
    errorMap: () => ({ message: 'Confirm must be true to delete database' }),
  }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ExtractPdfInput = z.object({
  file_path: z.string().min(1, 'File path is required'),
  save_to_db: z.boolean().default(true),
  save_to_json: z.boolean().default(true),
  output_dir: z.string().min(1).optional(),
  column_layout: ColumnLayoutInput.optional(),
  reference_states: ReferenceStatesInput,
  include_document: z
    .boolean()
    .default(false)
    .describe('Return the full extracted hierarchy in the response'),
});

const PageCell = z.union([z.string(), z.null()]);

export const PageInput = z.object({
  tables: z.array(z.array(z.array(PageCell))).default([]),
  text: z.string().default(''),
});

export const ExtractPagesInput = z.object({
  pages: z.array(PageInput).min(1, 'At least one page is required').max(5000),
  filename: z.string().min(1).max(255).default('pages.json'),
  save_to_db: z.boolean().default(false),
  save_to_json: z.boolean().default(false),
  output_dir: z.string().min(1).optional(),
  column_layout: ColumnLayoutInput.optional(),
  reference_states: ReferenceStatesInput,
  include_document: z.boolean().default(true),
});

export const ExtractionLogsInput = z.object({
  limit: z.number().int().min(1).max(500).default(20),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HIERARCHY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const StateListInput = z.object({});

export const LgaListInput = z.object({
  state_id: z.number().int().positive(),
});

export const WardListInput = z.object({
  lga_id: z.number().int().positive(),
});

export const SearchInput = z.object({
  query: z.string().trim().min(2, 'Query must be at least 2 characters').max(200),
  type: SearchTypeSchema.default('all'),
});

export const ExportInput = z.object({
  output_path: z
    .string()
    .min(1)
    .optional()
    .describe('Write the export to this JSON file instead of returning it inline'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

export const HealthCheckInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default allowed base directories: the storage path, home, the temp
 * directory, cwd, and anything listed in BOUNDARY_EXTRACTOR_ALLOWED_DIRS.
 * Read lazily so environment changes are picked up.
 */
function getDefaultAllowedBaseDirs(): string[] {
  // Inlined to avoid importing the storage layer here
  const storagePath =
    process.env.BOUNDARY_EXTRACTOR_DATABASES_PATH ||
    path.join(homedir(), '.boundary-extractor', 'databases');

  const dirs = [
    path.resolve(storagePath),
    path.resolve(homedir()),
    path.resolve('/tmp'),
    path.resolve(tmpdir()),
    path.resolve(process.cwd()),
  ];

  const extraDirs = process.env.BOUNDARY_EXTRACTOR_ALLOWED_DIRS;
  if (extraDirs) {
    for (const d of extraDirs.split(',')) {
      const trimmed = d.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }

  return dirs;
}

/**
 * Resolve a file path and reject null bytes and paths outside the allowed
 * base directories.
 *
 * @param allowedBaseDirs - Defaults to getDefaultAllowedBaseDirs()
 * @returns The resolved path
 * @throws ValidationError if the path contains null bytes or escapes allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);

  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set the BOUNDARY_EXTRACTOR_ALLOWED_DIRS environment variable ` +
        `(comma-separated list of directories).`
    );
  }

  return resolved;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SQL ESCAPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Escape '%', '_' and '\' for use in a LIKE clause with ESCAPE '\'
 */
export function escapeLikePattern(pattern: string): string {
  return pattern.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}
