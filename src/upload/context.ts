/**
 * Per-invocation upload context.
 *
 * Bundles credentials, the destination folder identity and the PathMapper
 * for one top-level run. Created by the engine for each call and threaded
 * explicitly; nothing here is process-wide.
 */

import type { PathMapper } from './path-mapper.js';
import type { Credentials, RemoteFolder } from './types.js';

export interface UploadContext {
  credentials: Credentials;
  /** Folder the run's root directory is created under */
  baseFolder: RemoteFolder;
  pathMapper: PathMapper;
  /** Whether uploads request and record content hashes */
  wantHashes: boolean;
  signal?: AbortSignal;
}

export function createUploadContext(params: {
  credentials: Credentials;
  baseFolder: RemoteFolder;
  pathMapper: PathMapper;
  wantHashes?: boolean;
  signal?: AbortSignal;
}): UploadContext {
  return {
    credentials: params.credentials,
    baseFolder: params.baseFolder,
    pathMapper: params.pathMapper,
    wantHashes: params.wantHashes ?? false,
    signal: params.signal,
  };
}

/**
 * Preconditions for a recursive upload.
 * Returns an array of error messages (empty = valid).
 */
export function validateRecursiveTarget(
  credentials: Credentials,
  remoteParentHash: string
): string[] {
  const errors: string[] = [];

  if (!credentials.username) {
    errors.push('username is required');
  }
  if (!credentials.password) {
    errors.push('password is required');
  }
  if (!remoteParentHash) {
    errors.push('remote parent folder hash is required');
  }

  return errors;
}

/**
 * Preconditions for a single-file upload.
 * Returns an array of error messages (empty = valid).
 */
export function validateSingleFileTarget(folderHash: string, folderKey: string): string[] {
  const errors: string[] = [];

  if (!folderHash) {
    errors.push('remote folder hash is required');
  }
  if (!folderKey) {
    errors.push('remote folder key is required');
  }

  return errors;
}
