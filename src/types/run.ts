import type { z } from 'zod';
import type { RunOptionsSchema } from '../config/schema.js';
import type { IOError } from '../core/errors.js';
import type { ResolvedEntry } from './manifest.js';

export type RunOptions = z.infer<typeof RunOptionsSchema>;
export type RunOptionsInput = z.input<typeof RunOptionsSchema>;

export type RunState = 'idle' | 'discovering' | 'backing-up' | 'removing' | 'done' | 'failed';

export type RunStatus = 'success' | 'partial' | 'failed';

export interface EntryFailure {
  /** Entry as resolved, or absolute path for text files. */
  relativePath: string;
  error: IOError;
}

export interface TextEdit {
  path: string;
  removedLines: string[];
}

export interface TextPlan {
  edits: TextEdit[];
  failed: EntryFailure[];
}

export interface Plan {
  installation: string;
  manifest: string;
  /** Mod-manager and user folders scanned besides the installation. */
  extraRoots: string[];
  entries: ResolvedEntry[];
  text: TextPlan;
}

export type RunEvent =
  | { type: 'state'; state: RunState }
  | { type: 'copied' | 'removed' | 'skipped'; relativePath: string }
  | { type: 'failed'; relativePath: string; error: IOError }
  | { type: 'edited'; path: string; lines: number };

export type RunListener = (event: RunEvent) => void;
