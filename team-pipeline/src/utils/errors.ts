/**
 * Error taxonomy for the team page sync.
 *
 * Fatal errors stop the run before anything is pushed. Non-fatal ones are
 * collected per row or per record and surface in the change summary.
 */

export abstract class TeamSyncError extends Error {
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Column mapping or config file does not match reality. */
export class ConfigurationError extends TeamSyncError {
  readonly fatal = true;
}

export class ValidationError extends TeamSyncError {
  readonly fatal = false;

  constructor(
    readonly rowNumber: number,
    readonly fields: string[],
    readonly problems: string[],
  ) {
    super(`Row ${rowNumber}: ${problems.join('; ')}`);
  }
}

export class DuplicateIdentityError extends TeamSyncError {
  readonly fatal = false;

  constructor(
    readonly identity: string,
    readonly firstRow: number,
    readonly secondRow: number,
  ) {
    super(`Identity "${identity}" appears in rows ${firstRow} and ${secondRow}; keeping row ${secondRow}`);
  }
}

export class ImageFetchError extends TeamSyncError {
  readonly fatal = false;

  constructor(
    readonly url: string,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Image fetch failed for ${url}: ${reason}`, options);
  }
}

/** Previous collection could not be read; merging against it would lose data. */
export class StateCorruptionError extends TeamSyncError {
  readonly fatal = true;

  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read previous state ${path}: ${reason}`, options);
  }
}

export class RepositoryStateError extends TeamSyncError {
  readonly fatal = true;
}

export class GitCommandError extends TeamSyncError {
  readonly fatal = false;

  constructor(
    readonly args: string[],
    readonly stderr: string,
    readonly retriable: boolean,
    options?: { cause?: unknown },
  ) {
    super(`git ${args.join(' ')} failed: ${stderr.trim() || 'unknown error'}`, options);
  }
}

export class GitHubApiError extends TeamSyncError {
  readonly fatal = false;

  constructor(
    readonly status: number | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** Network failures, rate limiting and server errors are worth another try. */
  get retriable(): boolean {
    return this.status === undefined || this.status === 429 || this.status >= 500;
  }
}

export interface PublishProgress {
  filesWritten: string[];
  commitSha?: string;
  branchPushed: boolean;
  pullRequest?: { number: number; url: string };
}

export class PublishTransportError extends TeamSyncError {
  readonly fatal = true;

  constructor(
    readonly step: string,
    readonly attempts: number,
    readonly progress: PublishProgress,
    options?: { cause?: unknown },
  ) {
    const cause = options?.cause instanceof Error ? options.cause.message : 'unknown error';
    super(`${step} failed after ${attempts} attempt(s): ${cause}`, options);
  }
}

/**
 * Replace every occurrence of a secret with asterisks.
 */
export function maskSecret(text: string, secret: string | undefined): string {
  if (!secret) return text;
  return text.split(secret).join('***');
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
