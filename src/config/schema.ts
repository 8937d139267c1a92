import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Octal permission bits, written either as a number or as a string such as "0644". */
const modeSchema = z.union([
  z.number().int().min(0).max(0o7777),
  z
    .string()
    .regex(/^0?[0-7]{3,4}$/, 'expected an octal mode such as "0644"')
    .transform((value) => Number.parseInt(value, 8))
]);

const urlSchema = z.string().url();

export const configFileSchema = z.object({
  rootName: z.string().min(1).regex(/^[^/]+$/, 'must be a single path segment').default('if-archive'),
  indexPath: z.string().min(1),
  treeDir: z.string().min(1),
  destDir: z.string().min(1),
  templateDir: z.string().min(1).optional(),
  cachePath: z.string().min(1).optional(),
  markerPath: z.string().min(1).optional(),
  linksPath: z.string().min(1).optional(),
  lockPath: z.string().min(1).optional(),
  manifestName: z.string().min(1).default('Master-Index.xml'),
  fragmentName: z.string().min(1).default('Index'),
  identifierKeys: z.array(z.string().min(1)).default(['tuid', 'ifdbid']),
  reserved: z
    .object({
      glob: z.array(z.string().min(1)).default([]),
      regex: z.array(z.string().min(1)).default([])
    })
    .default({}),
  quietPrefixes: z.array(z.string().min(1)).default([]),
  excludeUndocumented: z.boolean().default(false),
  triggerSearchIndex: z.boolean().default(false),
  feedSize: z.number().int().min(1).default(30),
  feedTitle: z.string().min(1).default('Recent additions'),
  siteUrl: urlSchema,
  pageBaseUrl: urlSchema.optional(),
  fileBaseUrl: urlSchema.optional(),
  concurrency: z.object({ hash: z.number().int().min(1).max(64).default(4) }).default({}),
  outputMode: z.object({ file: modeSchema.default(0o644), dir: modeSchema.default(0o755) }).default({}),
  search: z.object({ url: urlSchema, key: z.string().min(1).optional() }).optional(),
  purge: z
    .object({
      url: urlSchema,
      key: z.string().min(1).optional(),
      email: z.string().min(1).optional(),
      prefixes: z.array(urlSchema).min(1),
      unboxBase: urlSchema.optional()
    })
    .optional(),
  logLevel: z.enum(LOG_LEVELS).default('info')
});

export type ConfigFile = z.infer<typeof configFileSchema>;

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const configEnvSchema = z
  .object({
    ARCHIVE_INDEX_CONFIG: optionalSecret,
    SEARCH_REINDEX_KEY: optionalSecret,
    CACHE_PURGE_KEY: optionalSecret,
    CACHE_PURGE_EMAIL: optionalSecret,
    LOG_LEVEL: z.enum(LOG_LEVELS).optional()
  })
  .passthrough();

export type ConfigEnv = z.infer<typeof configEnvSchema>;
