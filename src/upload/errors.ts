/**
 * Error taxonomy for the upload library.
 *
 * File-level and subtree-level errors are caught by the engine and turned
 * into failure records; only ConfigurationError (and a missing root path)
 * abort a run.
 */

// ─── Error Classes ──────────────────────────────────────────────────

/** Missing or incomplete credentials / target folder identity. */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Remote folder creation failed or returned a malformed payload. */
export class FolderCreateError extends Error {
  public readonly folderName: string;
  public readonly parentHash: string;

  constructor(folderName: string, parentHash: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to create folder "${folderName}": ${message}`, options);
    this.name = 'FolderCreateError';
    this.folderName = folderName;
    this.parentHash = parentHash;
  }
}

/** A single file upload failed. */
export class UploadError extends Error {
  public readonly localPath: string;
  public readonly status?: number;

  constructor(localPath: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(`Upload failed for ${localPath}: ${message}`, { cause: options?.cause });
    this.name = 'UploadError';
    this.localPath = localPath;
    this.status = options?.status;
  }
}

/** A local path vanished or became unreadable mid-run. */
export class TraversalError extends Error {
  public readonly localPath: string;

  constructor(localPath: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${localPath}`, options);
    this.name = 'TraversalError';
    this.localPath = localPath;
  }
}

export class LoginError extends Error {
  public readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(`Login failed: ${message}`, { cause: options?.cause });
    this.name = 'LoginError';
    this.status = options?.status;
  }
}

export class RemoteListError extends Error {
  public readonly folderHash: string;

  constructor(folderHash: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to list folder ${folderHash}: ${message}`, options);
    this.name = 'RemoteListError';
    this.folderHash = folderHash;
  }
}

// ─── Utilities ──────────────────────────────────────────────────────

/**
 * Convert an unknown thrown value into a message for a failure record.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Whether an error came from an aborted or timed-out fetch.
 */
export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}
