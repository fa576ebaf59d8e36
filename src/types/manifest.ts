import type { z } from 'zod';
import type {
  ManifestSchema,
  GameSchema,
  SignaturesSchema,
  ModManagersSchema,
  BackupRecordSchema,
  SettingsSchema,
} from '../config/schema.js';

export type Manifest = z.infer<typeof ManifestSchema>;
export type Game = z.infer<typeof GameSchema>;
export type Signatures = z.infer<typeof SignaturesSchema>;
export type ModManagers = z.infer<typeof ModManagersSchema>;
export type BackupRecord = z.infer<typeof BackupRecordSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

export type EntrySource = 'fixed' | 'signature';

/** A manifest entry resolved against one installation. */
export type ResolvedEntry = {
  /** Relative to the installation, or absolute for matches under a mod-manager or user folder. */
  relativePath: string;
  source: EntrySource;
  present: boolean;
};
