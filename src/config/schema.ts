import { z } from 'zod';

// ── Path helpers ────────────────────────────────────────────────────

function isSafeRelativePath(value: string): boolean {
  if (value.startsWith('/') || value.startsWith('\\')) return false;
  if (/^[a-zA-Z]:/.test(value)) return false;
  return !value.split(/[\\/]/).includes('..');
}

function isValidPattern(value: string): boolean {
  try {
    new RegExp(value, 'i');
    return true;
  } catch {
    return false;
  }
}

const RelativePathSchema = z
  .string()
  .min(1)
  .refine(isSafeRelativePath, 'Relative path without ".." segments');

// ── Manifest sub-schemas ────────────────────────────────────────────

export const RegistryKeySchema = z.object({
  key: z.string().min(1),
  value: z.string().min(1),
});

export const GameSchema = z.object({
  name: z.string().min(1),
  executable: z.string().min(1),
  folderNames: z.array(z.string().min(1)).min(1),
  registryKeys: z.array(RegistryKeySchema).default([]),
});

export const SignaturesSchema = z.object({
  patterns: z
    .array(z.string().min(1).refine(isValidPattern, 'Invalid regular expression'))
    .default([]),
  knownFilenames: z.array(z.string().min(1)).default([]),
});

export const ModManagersSchema = z.object({
  /** `${VAR}` templates of Vortex per-game folders, used when no Vortex folder is given. */
  vortex: z.array(z.string().min(1)).default([]),
  mo2: z
    .object({
      /** Looked for beside the installation and one level further up. */
      folderName: z.string().min(1),
      subdirs: z.array(RelativePathSchema).min(1),
    })
    .optional(),
});

// ── Manifest ────────────────────────────────────────────────────────

const namePattern = /^[a-z0-9][a-z0-9-]*$/;
const versionPattern = /^v?[0-9]+(\.[0-9]+)*(-[a-zA-Z0-9.-]+)?$/;

export const DEFAULT_MAX_MATCHES = 10000;

export const ManifestSchema = z
  .object({
    name: z.string().regex(namePattern, 'Lowercase alphanumeric with hyphens'),
    version: z.string().regex(versionPattern, 'Relaxed semver: 1.0, 1.2.3, v1.2.3'),
    description: z.string().min(1),
    game: GameSchema,
    entries: z.array(RelativePathSchema).default([]),
    signatures: SignaturesSchema.default({}),
    scanRoots: z.array(RelativePathSchema).default([]),
    textFiles: z.array(z.string().min(1)).default([]),
    profileDirs: z.array(z.string().min(1)).default([]),
    modManagers: ModManagersSchema.default({}),
    maxMatches: z.number().int().positive().default(DEFAULT_MAX_MATCHES),
  })
  .refine(
    (m) =>
      m.entries.length > 0 ||
      m.signatures.patterns.length > 0 ||
      m.signatures.knownFilenames.length > 0,
    { message: 'Manifest must list entries or signatures' },
  );

// ── Run options ─────────────────────────────────────────────────────

export const RunOptionsSchema = z
  .object({
    doBackup: z.boolean().default(false),
    backupDestination: z.string().min(1).optional(),
    dryRun: z.boolean().default(false),
    cleanText: z.boolean().default(true),
    gameDir: z.string().min(1).optional(),
    mo2Dir: z.string().min(1).optional(),
    vortexDir: z.string().min(1).optional(),
  })
  .superRefine((opts, ctx) => {
    if (opts.doBackup && !opts.backupDestination) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backupDestination'],
        message: 'A backup destination is required when backup is enabled',
      });
    }
  });

// ── User settings ───────────────────────────────────────────────────

export const SETTING_KEYS = [
  'game_dir',
  'backup_dir',
  'mo2_dir',
  'vortex_dir',
  'manifest',
  'clean_text',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

export const SettingsSchema = z
  .object({
    game_dir: z.string().min(1).optional(),
    backup_dir: z.string().min(1).optional(),
    mo2_dir: z.string().min(1).optional(),
    vortex_dir: z.string().min(1).optional(),
    manifest: z.string().min(1).optional(),
    clean_text: z.enum(['true', 'false']).optional(),
  })
  .strict();

// ── Backup record ───────────────────────────────────────────────────

const OutsideCopySchema = z.object({
  /** Absolute path the copy is restored to. */
  origin: z.string().min(1),
  /** Relative to the backup destination. */
  copy: RelativePathSchema,
});

export const BackupRecordSchema = z.object({
  installation: z.string().min(1),
  manifest: z.string().min(1),
  createdAt: z.string().min(1),
  entries: z.array(RelativePathSchema),
  /** Entries found outside the installation, in mod-manager or user folders. */
  external: z.array(OutsideCopySchema).default([]),
  textFiles: z.array(OutsideCopySchema).default([]),
});
