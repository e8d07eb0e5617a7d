/**
 * PathMapper - resolves the remote folder a local directory uploads into,
 * creating it on the first visit only.
 *
 * The cache is scoped to one upload invocation unless the caller hands
 * the same mapper to a later run. Entries are never removed.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type { CreateFolderOptions, RemoteClient } from './remote-client.js';
import type { Credentials, RemoteFolder } from './types.js';

export class PathMapper {
  private readonly cache = new Map<string, RemoteFolder>();
  private readonly client: RemoteClient;
  private readonly logger: Logger;
  private readonly folderOptions: CreateFolderOptions;

  constructor(client: RemoteClient, logger: Logger, folderOptions: CreateFolderOptions = {}) {
    this.client = client;
    this.logger = logger.child({ component: 'path-mapper' });
    this.folderOptions = folderOptions;
  }

  /**
   * Return the cached folder for `localDirPath`, or create it under `parent`.
   * A FolderCreateError propagates unmodified and leaves the cache untouched.
   */
  async resolve(
    localDirPath: string,
    parent: RemoteFolder,
    credentials: Credentials
  ): Promise<RemoteFolder> {
    const key = path.resolve(localDirPath);
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.trace({ path: key, hash: cached.hash }, 'Folder cache hit');
      return cached;
    }

    const folder = await this.client.createFolder(
      path.basename(key),
      parent.hash,
      credentials,
      this.folderOptions
    );
    this.cache.set(key, folder);
    return folder;
  }

  /** Pre-populate an entry, e.g. from a previous run */
  seed(localDirPath: string, folder: RemoteFolder): void {
    this.cache.set(path.resolve(localDirPath), folder);
  }

  get(localDirPath: string): RemoteFolder | undefined {
    return this.cache.get(path.resolve(localDirPath));
  }

  has(localDirPath: string): boolean {
    return this.cache.has(path.resolve(localDirPath));
  }

  get size(): number {
    return this.cache.size;
  }

  entries(): Array<[string, RemoteFolder]> {
    return [...this.cache.entries()];
  }
}
