/**
 * Typed errors raised while locating, backing up and removing the
 * modification, and the process exit codes they map to.
 */

export const ExitCode = {
  Success: 0,
  PartialFailure: 1,
  NotFound: 2,
  Config: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export abstract class RemoverError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  abstract readonly exitCode: ExitCode;

  readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause?.message,
    };
  }
}

/** The installation, or a manifest entry inside it, is missing. */
export class NotFoundError extends RemoverError {
  readonly code = 'NOT_FOUND' as const;
  readonly exitCode = ExitCode.NotFound;

  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(message);
  }
}

/** Invalid option combination, manifest or setting. */
export class ConfigError extends RemoverError {
  readonly code = 'CONFIG' as const;
  readonly exitCode = ExitCode.Config;
}

/** A copy, delete or edit of one path failed. */
export class IOError extends RemoverError {
  readonly code = 'IO' as const;
  readonly exitCode = ExitCode.PartialFailure;

  /** errno code reported by node:fs, e.g. EACCES */
  readonly errno: string;

  readonly reason: string;

  constructor(
    readonly path: string,
    cause: Error,
  ) {
    const errno = isNodeError(cause) && cause.code ? cause.code : 'UNKNOWN';
    const reason = describeErrno(errno, cause);
    super(`${path}: ${reason}`, cause);
    this.errno = errno;
    this.reason = reason;
  }

  /** Locked or read-only media: continuing with other entries is pointless. */
  get unrecoverable(): boolean {
    return UNRECOVERABLE_CODES.has(this.errno);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path, errno: this.errno, reason: this.reason };
  }
}

const UNRECOVERABLE_CODES = new Set(['EBUSY', 'ETXTBSY', 'EROFS', 'EIO']);

const ERRNO_REASONS: Record<string, string> = {
  ENOENT: 'no such file or directory',
  EACCES: 'permission denied',
  EPERM: 'permission denied',
  EBUSY: 'file in use',
  ETXTBSY: 'file in use',
  EROFS: 'read-only file system',
  EIO: 'I/O error',
  ENOSPC: 'no space left on device',
  ENOTEMPTY: 'directory not empty',
  EISDIR: 'is a directory',
  ENOTDIR: 'not a directory',
};

function describeErrno(errno: string, cause: Error): string {
  return ERRNO_REASONS[errno] ?? cause.message;
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function exitCodeFor(err: unknown): ExitCode {
  return err instanceof RemoverError ? err.exitCode : ExitCode.PartialFailure;
}
