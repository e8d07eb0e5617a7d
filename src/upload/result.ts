/**
 * Incremental construction of an UploadResult.
 */

import type { FailureKind, UploadFailure, UploadResult, UploadedFile } from './types.js';

export class UploadResultBuilder {
  private readonly startedAt = Date.now();
  private readonly trackHashes: boolean;
  private readonly uploaded: UploadedFile[] = [];
  private readonly failures: UploadFailure[] = [];
  private filesAttempted = 0;
  private filesSucceeded = 0;
  private foldersCreated = 0;
  private cancelled = false;
  private aborted = false;

  constructor(trackHashes: boolean) {
    this.trackHashes = trackHashes;
  }

  recordUpload(localPath: string, remoteHash: string): void {
    this.filesAttempted++;
    this.filesSucceeded++;
    if (this.trackHashes) {
      this.uploaded.push({ localPath, remoteHash });
    }
  }

  recordFileFailure(localPath: string, error: string): void {
    this.filesAttempted++;
    this.pushFailure(localPath, 'file', error);
  }

  recordDirectoryFailure(localPath: string, error: string): void {
    this.pushFailure(localPath, 'directory', error);
  }

  recordFolderCreated(): void {
    this.foldersCreated++;
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  /**
   * Abort before any work: the precondition failure is the only entry.
   */
  abort(localPath: string, error: string): UploadResult {
    this.aborted = true;
    this.failures.length = 0;
    this.uploaded.length = 0;
    this.filesAttempted = 0;
    this.filesSucceeded = 0;
    this.foldersCreated = 0;
    this.pushFailure(localPath, 'precondition', error);
    return this.finalize();
  }

  get failureCount(): number {
    return this.failures.length;
  }

  finalize(): UploadResult {
    const result: UploadResult = {
      success: !this.aborted && !this.cancelled && this.failures.length === 0,
      filesAttempted: this.filesAttempted,
      filesSucceeded: this.filesSucceeded,
      failures: [...this.failures],
      foldersCreated: this.foldersCreated,
      cancelled: this.cancelled,
      durationMs: Date.now() - this.startedAt,
    };
    if (this.trackHashes) {
      result.uploaded = [...this.uploaded];
    }
    return result;
  }

  private pushFailure(localPath: string, kind: FailureKind, error: string): void {
    this.failures.push({ localPath, kind, error });
  }
}

/**
 * One-line human summary of a result.
 */
export function summarizeResult(result: UploadResult): string {
  const parts = [`Uploaded ${result.filesSucceeded}/${result.filesAttempted} files`];

  const fileFailures = result.failures.filter((f) => f.kind === 'file').length;
  const dirFailures = result.failures.filter((f) => f.kind === 'directory').length;
  const precondition = result.failures.find((f) => f.kind === 'precondition');

  if (precondition) {
    return `Upload aborted: ${precondition.error}`;
  }
  if (fileFailures > 0) {
    parts.push(`${fileFailures} file${fileFailures !== 1 ? 's' : ''} failed`);
  }
  if (dirFailures > 0) {
    parts.push(`${dirFailures} folder${dirFailures !== 1 ? 's' : ''} failed`);
  }
  if (result.cancelled) {
    parts.push('cancelled');
  }
  return parts.join(', ');
}
