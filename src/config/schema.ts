import { z } from 'zod';

export const DEFAULT_PACKAGE_PATTERNS = ['packages/*'];

/** `.dev/config.yaml` */
export const workspaceConfigSchema = z.object({
  project: z.object({
    name: z.string().optional(),
  }).default({}),
  workspaces: z.object({
    packages: z.array(z.string()).default(DEFAULT_PACKAGE_PATTERNS),
    exclude: z.array(z.string()).default([]),
  }).default({}),
  services: z.record(z.number().int().positive()).default({}),
}).passthrough();

export type WorkspaceConfig = z.infer<typeof workspaceConfigSchema>;

const RESERVED_ENTRY_KEYS = new Set(['default', 'deps']);

function stringVariants(table: Record<string, unknown>): Record<string, string> {
  const variants: Record<string, string> = {};
  for (const [key, value] of Object.entries(table)) {
    if (typeof value === 'string') variants[key] = value;
  }
  return variants;
}

/**
 * A `cmd` table value: a bare command string, or a table with `default`,
 * optional `deps`, and any other string key as a named variant.
 */
export const commandEntrySchema = z.union([
  z.string(),
  z.object({
    default: z.string(),
    deps: z.array(z.string()).default([]),
  })
    .passthrough()
    .superRefine((table, ctx) => {
      for (const [key, value] of Object.entries(table)) {
        if (!RESERVED_ENTRY_KEYS.has(key) && typeof value !== 'string') {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Variant commands must be strings' });
        }
      }
    })
    .transform(({ default: command, deps, ...rest }) => ({
      default: command,
      deps,
      variants: stringVariants(rest),
    })),
]);

export type CommandEntryInput = z.infer<typeof commandEntrySchema>;

/** `<package>/dev.yaml` */
export const packageConfigSchema = z.object({
  name: z.string().min(1).optional(),
  cmd: z.record(commandEntrySchema).default({}),
}).passthrough();

export type PackageConfig = z.infer<typeof packageConfigSchema>;

export const packageManifestSchema = z.object({
  name: z.string().optional(),
}).passthrough();
