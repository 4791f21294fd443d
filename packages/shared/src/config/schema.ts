import { z } from 'zod';

export const DEFAULT_EXCLUDES = ['.*', 'System Volume Information', '$RECYCLE.BIN', 'node_modules'];

export const CategoryDefinitionSchema = z.object({
  name: z.string().min(1),
  extensions: z.array(z.string()),
});

export const CategoriesConfigSchema = z.object({
  /** `extend` layers user categories over the built-in taxonomy, `replace` drops it */
  mode: z.enum(['extend', 'replace']).default('extend'),
  /** Treat an extension claimed by two categories as an error instead of first-match-wins */
  strict: z.boolean().default(false),
  fallback: z.string().min(1).default('misc'),
  /**
   * Either a list of `{ name, extensions }` or a mapping of category name →
   * extensions. Order is precedence order. A mapping always lists
   * integer-like names such as `2024` first, so use the list form for those.
   */
  definitions: z
    .union([z.array(CategoryDefinitionSchema), z.record(z.string(), z.array(z.string()))])
    .default({}),
});

export const ScanConfigSchema = z.object({
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDES),
});

export const ExportConfigSchema = z.object({
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(256)
    .default(10)
    .describe('Maximum number of copies open at the same time'),
  layout: z.enum(['mirror', 'flat']).default('mirror'),
});

export const ArchiveConfigSchema = z.object({
  enabled: z.boolean().default(false),
  compressionLevel: z.number().int().min(0).max(9).default(6),
  bufferSizeKb: z.number().int().min(1).max(65536).default(256),
  /** Keep the exported directory tree next to the archive */
  keepDirectory: z.boolean().default(true),
  path: z.string().optional(),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  categories: CategoriesConfigSchema.default({}),
  scan: ScanConfigSchema.default({}),
  export: ExportConfigSchema.default({}),
  archive: ArchiveConfigSchema.default({}),
});

export type CategoriesConfig = z.infer<typeof CategoriesConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/** Config as written in YAML files and CLI flags, before defaults are applied. */
export type ConfigInput = z.input<typeof ConfigSchema>;
