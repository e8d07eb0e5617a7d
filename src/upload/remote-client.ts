/**
 * Capability set the engine consumes from the remote service.
 *
 * Implementations throw the typed errors from errors.ts; the engine never
 * inspects HTTP details.
 */

import type {
  AccessType,
  Credentials,
  LoginSession,
  RemoteEntry,
  RemoteFolder,
} from './types.js';

export interface CreateFolderOptions {
  /** Visibility of the new folder (default: LINK) */
  accessType?: AccessType;
}

export interface UploadFileOptions {
  /** Ask the service to return the content hash instead of the bare acknowledgement */
  returnHash?: boolean;
}

export interface ListFolderOptions {
  includeSubfolders?: boolean;
}

export interface RemoteClient {
  /**
   * @throws LoginError
   */
  login(credentials: Credentials): Promise<LoginSession>;

  /**
   * Create a folder under `parentHash`. The service does not dedupe by name.
   * @throws FolderCreateError on invalid credentials, network failure or a malformed payload
   */
  createFolder(
    name: string,
    parentHash: string,
    credentials: Credentials,
    options?: CreateFolderOptions
  ): Promise<RemoteFolder>;

  /**
   * Upload one file into a folder.
   * @returns The acknowledgement token or the content hash
   * @throws UploadError
   */
  uploadFile(
    localPath: string,
    folderHash: string,
    addKey: string,
    options?: UploadFileOptions
  ): Promise<string>;

  /**
   * @throws RemoteListError
   */
  listFolder(folderHash: string, options?: ListFolderOptions): Promise<RemoteEntry[]>;
}
