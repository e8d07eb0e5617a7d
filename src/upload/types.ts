/**
 * Types for the upload module.
 *
 * Covers remote folder identity, the local tree snapshot, per-file tasks,
 * and the aggregate result of one upload invocation.
 */

/** Account credentials sent with login and folder-creation requests */
export interface Credentials {
  username: string;
  password: string;
}

/**
 * A folder on the remote service. Immutable once created.
 * At least one of addKey / editKey is present on folders returned by createFolder.
 */
export interface RemoteFolder {
  /** Opaque identifier assigned by the service */
  readonly hash: string;
  /** Authorization token for uploading into the folder */
  readonly addKey?: string;
  /** Authorization token for modifying the folder */
  readonly editKey?: string;
}

/** Visibility of a newly created remote folder */
export type AccessType = 'LINK' | 'PRIVATE';

/** Entry returned by a folder listing */
export interface RemoteEntry {
  name: string;
  hash: string;
  /** Size in bytes (files only) */
  size?: number;
  type?: 'file' | 'folder';
}

/** Session returned by login */
export interface LoginSession {
  /** Session cookie to present on later requests */
  cookie: string;
  /** Base folder reported by the service, when the response carries one */
  baseFolder?: RemoteFolder;
  /** All key=value pairs parsed from the response text */
  fields: Record<string, string>;
}

// ─── Local snapshot ─────────────────────────────────────────────────

export interface LocalFile {
  kind: 'file';
  /** Absolute path */
  path: string;
  name: string;
  sizeBytes: number;
}

export interface LocalDirectory {
  kind: 'directory';
  /** Absolute path */
  path: string;
  name: string;
  /** Immediate child files, sorted by name */
  files: LocalFile[];
  /** Immediate child directories, sorted by name */
  directories: LocalDirectory[];
  /** Set when the directory could not be listed during the snapshot */
  unreadable?: string;
}

export type LocalEntry = LocalFile | LocalDirectory;

/** Binds one file to its destination folder and key. Never persisted. */
export interface UploadTask {
  file: LocalFile;
  folder: RemoteFolder;
  addKey: string;
}

// ─── Results ────────────────────────────────────────────────────────

export interface UploadedFile {
  localPath: string;
  /** Content hash, or the literal acknowledgement when no hash was requested */
  remoteHash: string;
}

/** Where a failure was recorded */
export type FailureKind = 'file' | 'directory' | 'precondition';

export interface UploadFailure {
  localPath: string;
  kind: FailureKind;
  error: string;
}

/** Aggregate outcome of one top-level upload invocation */
export interface UploadResult {
  /** True only if every attempted file uploaded and no folder creation failed */
  success: boolean;
  filesAttempted: number;
  filesSucceeded: number;
  /** Present when hash tracking was requested (always for single-file uploads) */
  uploaded?: UploadedFile[];
  failures: UploadFailure[];
  /** Remote folders created during this run */
  foldersCreated: number;
  /** Whether the run stopped early on a cancellation request */
  cancelled: boolean;
  durationMs: number;
}
