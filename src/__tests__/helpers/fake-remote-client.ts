/**
 * In-process RemoteClient for engine tests.
 *
 * Records every call in order and can be scripted to fail specific
 * folders (by name) or files (by base name).
 */

import * as path from 'node:path';
import { FolderCreateError, UploadError } from '../../upload/errors.js';
import type {
  CreateFolderOptions,
  ListFolderOptions,
  RemoteClient,
  UploadFileOptions,
} from '../../upload/remote-client.js';
import type {
  Credentials,
  LoginSession,
  RemoteEntry,
  RemoteFolder,
} from '../../upload/types.js';

export type FakeCall =
  | { op: 'login'; username: string }
  | { op: 'createFolder'; name: string; parentHash: string; accessType?: string }
  | { op: 'uploadFile'; localPath: string; folderHash: string; addKey: string; returnHash: boolean }
  | { op: 'listFolder'; folderHash: string };

export class FakeRemoteClient implements RemoteClient {
  readonly calls: FakeCall[] = [];
  /** Folder names whose creation fails */
  readonly failFolders = new Set<string>();
  /** File base names whose upload fails */
  readonly failFiles = new Set<string>();
  /** Canned createFolder responses by folder name */
  readonly folderResponses = new Map<string, RemoteFolder>();
  /** Entries returned by listFolder */
  listing: RemoteEntry[] = [];
  /** Runs after each upload call is recorded */
  onUpload?: (localPath: string) => void;

  private folderCounter = 0;
  private hashCounter = 0;

  async login(credentials: Credentials): Promise<LoginSession> {
    this.calls.push({ op: 'login', username: credentials.username });
    return { cookie: 'session=test', fields: {} };
  }

  async createFolder(
    name: string,
    parentHash: string,
    _credentials: Credentials,
    options?: CreateFolderOptions
  ): Promise<RemoteFolder> {
    this.calls.push({ op: 'createFolder', name, parentHash, accessType: options?.accessType });

    if (this.failFolders.has(name)) {
      throw new FolderCreateError(name, parentHash, 'HTTP 500');
    }

    const canned = this.folderResponses.get(name);
    if (canned) return canned;

    this.folderCounter++;
    return { hash: `fold${this.folderCounter}`, addKey: `key-${name}` };
  }

  async uploadFile(
    localPath: string,
    folderHash: string,
    addKey: string,
    options?: UploadFileOptions
  ): Promise<string> {
    const returnHash = options?.returnHash ?? false;
    this.calls.push({ op: 'uploadFile', localPath, folderHash, addKey, returnHash });
    this.onUpload?.(localPath);

    if (this.failFiles.has(path.basename(localPath))) {
      throw new UploadError(localPath, 'simulated network error');
    }

    if (!returnHash) return 'd';
    this.hashCounter++;
    return `filehash${this.hashCounter}`;
  }

  async listFolder(folderHash: string, _options?: ListFolderOptions): Promise<RemoteEntry[]> {
    this.calls.push({ op: 'listFolder', folderHash });
    return this.listing;
  }

  /** Calls of one kind, in order */
  callsOf<K extends FakeCall['op']>(op: K): Array<Extract<FakeCall, { op: K }>> {
    const matching: Array<Extract<FakeCall, { op: K }>> = [];
    for (const call of this.calls) {
      if (isOp(call, op)) matching.push(call);
    }
    return matching;
  }
}

function isOp<K extends FakeCall['op']>(call: FakeCall, op: K): call is Extract<FakeCall, { op: K }> {
  return call.op === op;
}
