/**
 * FolderUploadEngine - mirrors a local directory tree onto the remote
 * service and uploads every regular file.
 *
 * Traversal is depth-first: a directory's remote folder is resolved, then
 * its files are uploaded in order, then each subdirectory is processed.
 * One network operation is in flight at a time.
 *
 * Failure policy:
 * - a file upload failure is recorded and the next file is attempted
 * - a folder creation failure skips that directory's whole subtree;
 *   siblings continue
 * - bad credentials/target or a missing root abort the run before any work
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { createUploadContext, validateRecursiveTarget, validateSingleFileTarget } from './context.js';
import type { UploadContext } from './context.js';
import { ConfigurationError, TraversalError, errorMessage } from './errors.js';
import { countFiles, describeFile, pathExists, snapshotDirectory } from './local-tree.js';
import { PathMapper } from './path-mapper.js';
import { ProgressTracker } from './progress.js';
import type { ProgressSink } from './progress.js';
import type { RemoteClient } from './remote-client.js';
import { uploadKeyFor } from './response.js';
import { UploadResultBuilder } from './result.js';
import type {
  AccessType,
  Credentials,
  LocalDirectory,
  LocalFile,
  RemoteFolder,
  UploadResult,
  UploadTask,
} from './types.js';

export interface FolderUploadEngineOptions {
  client: RemoteClient;
  logger: Logger;
  /** Receives progress events; optional */
  progress?: ProgressSink;
}

export interface RecursiveUploadOptions {
  /** Reuse a mapper (and its cache) from an earlier run */
  pathMapper?: PathMapper;
  /** Visibility of folders created by this run (default: LINK) */
  accessType?: AccessType;
  /** Checked before each file upload and each descent */
  signal?: AbortSignal;
}

export interface SingleFileUploadOptions {
  /** Ask the service for the content hash instead of the acknowledgement */
  returnHash?: boolean;
  signal?: AbortSignal;
}

/** State shared by every level of one recursive run */
interface RunState {
  context: UploadContext;
  results: UploadResultBuilder;
  tracker: ProgressTracker;
  /** Progress labels are relative to this directory */
  labelBase: string;
}

export class FolderUploadEngine {
  private readonly client: RemoteClient;
  private readonly logger: Logger;
  private readonly progress: ProgressSink | undefined;

  constructor(options: FolderUploadEngineOptions) {
    this.client = options.client;
    this.logger = options.logger.child({ component: 'folder-upload-engine' });
    this.progress = options.progress;
  }

  /**
   * Upload one file straight into a configured folder. Never creates folders.
   * The result always lists the returned identifier.
   */
  async uploadSingleFile(
    localPath: string,
    remoteFolderHash: string,
    remoteFolderKey: string,
    options?: SingleFileUploadOptions
  ): Promise<UploadResult> {
    const results = new UploadResultBuilder(true);
    const tracker = new ProgressTracker(this.progress, this.logger, 1);

    return this.track(tracker, async () => {
      const issues = validateSingleFileTarget(remoteFolderHash, remoteFolderKey);
      if (issues.length > 0) {
        return this.abort(results, localPath, new ConfigurationError(issues));
      }

      let file: LocalFile;
      try {
        file = await describeFile(localPath);
      } catch (err) {
        return this.abort(results, localPath, err);
      }

      if (options?.signal?.aborted) {
        results.markCancelled();
        return results.finalize();
      }

      const folder: RemoteFolder = { hash: remoteFolderHash, addKey: remoteFolderKey };
      await this.runTask(
        { file, folder, addKey: remoteFolderKey },
        results,
        tracker,
        options?.returnHash ?? false,
        file.name
      );
      return results.finalize();
    });
  }

  /**
   * Mirror `localRootPath` under the remote folder `remoteParentHash`.
   * The root directory itself becomes a new remote folder.
   */
  async uploadFolderRecursive(
    localRootPath: string,
    remoteParentHash: string,
    credentials: Credentials,
    wantHashes: boolean,
    options?: RecursiveUploadOptions
  ): Promise<UploadResult> {
    const results = new UploadResultBuilder(wantHashes);
    const tracker = new ProgressTracker(this.progress, this.logger);

    return this.track(tracker, async () => {
      const issues = validateRecursiveTarget(credentials, remoteParentHash);
      if (issues.length > 0) {
        return this.abort(results, localRootPath, new ConfigurationError(issues));
      }

      let root: LocalDirectory;
      try {
        root = await snapshotDirectory(localRootPath);
      } catch (err) {
        return this.abort(results, localRootPath, err);
      }

      const totalFiles = countFiles(root);
      tracker.setTotal(totalFiles);

      const state: RunState = {
        context: createUploadContext({
          credentials,
          baseFolder: { hash: remoteParentHash },
          pathMapper:
            options?.pathMapper ??
            new PathMapper(this.client, this.logger, { accessType: options?.accessType }),
          wantHashes,
          signal: options?.signal,
        }),
        results,
        tracker,
        labelBase: path.dirname(root.path),
      };

      this.logger.info(
        { root: root.path, parentHash: remoteParentHash, files: totalFiles },
        'Starting folder upload'
      );

      if (!this.checkCancelled(state)) {
        await this.uploadDirectory(root, state.context.baseFolder, state);
      }

      const result = results.finalize();
      this.logger.info(
        {
          attempted: result.filesAttempted,
          succeeded: result.filesSucceeded,
          failures: result.failures.length,
          foldersCreated: result.foldersCreated,
          cancelled: result.cancelled,
        },
        'Folder upload complete'
      );
      return result;
    });
  }

  // ── Traversal ─────────────────────────────────────────────────────

  private async uploadDirectory(
    dir: LocalDirectory,
    parent: RemoteFolder,
    state: RunState
  ): Promise<void> {
    const { context, results, tracker } = state;
    const label = this.label(state, dir.path);

    if (dir.unreadable) {
      const err = new TraversalError(dir.path, `Directory is unreadable (${dir.unreadable})`);
      this.failDirectory(state, dir, err);
      return;
    }

    if (!(await pathExists(dir.path))) {
      this.failDirectory(state, dir, new TraversalError(dir.path, 'Directory vanished before upload'));
      return;
    }

    let folder: RemoteFolder;
    try {
      const known = context.pathMapper.has(dir.path);
      folder = await context.pathMapper.resolve(dir.path, parent, context.credentials);
      if (!known) {
        results.recordFolderCreated();
        tracker.report(`Created folder ${label}`);
      }
    } catch (err) {
      this.failDirectory(state, dir, err);
      return;
    }

    const addKey = uploadKeyFor(folder);
    if (!addKey) {
      this.failDirectory(state, dir, new Error(`Remote folder ${folder.hash} has no upload key`));
      return;
    }

    for (const file of dir.files) {
      if (this.checkCancelled(state)) return;
      await this.runTask(
        { file, folder, addKey },
        results,
        tracker,
        context.wantHashes,
        this.label(state, file.path)
      );
    }

    for (const child of dir.directories) {
      if (this.checkCancelled(state)) return;
      await this.uploadDirectory(child, folder, state);
    }
  }

  private async runTask(
    task: UploadTask,
    results: UploadResultBuilder,
    tracker: ProgressTracker,
    returnHash: boolean,
    label: string
  ): Promise<void> {
    const { file } = task;

    if (!(await pathExists(file.path))) {
      const err = new TraversalError(file.path, 'File vanished before upload');
      this.logger.warn({ path: file.path }, err.message);
      results.recordFileFailure(file.path, err.message);
      tracker.advance(label);
      return;
    }

    try {
      const identifier = await this.client.uploadFile(
        file.path,
        task.folder.hash,
        task.addKey,
        { returnHash }
      );
      results.recordUpload(file.path, identifier);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn({ path: file.path, error: message }, 'File upload failed');
      results.recordFileFailure(file.path, message);
    }

    tracker.advance(label);
  }

  // ── Helpers ───────────────────────────────────────────────────────

  /** Record a subtree failure and count its files as processed */
  private failDirectory(state: RunState, dir: LocalDirectory, err: unknown): void {
    const message = errorMessage(err);
    this.logger.warn({ path: dir.path, error: message }, 'Skipping directory subtree');
    state.results.recordDirectoryFailure(dir.path, message);
    state.tracker.advance(`Failed ${this.label(state, dir.path)}`, countFiles(dir));
  }

  private checkCancelled(state: RunState): boolean {
    if (!state.context.signal?.aborted) return false;
    state.results.markCancelled();
    return true;
  }

  private abort(results: UploadResultBuilder, localPath: string, err: unknown): UploadResult {
    const message = errorMessage(err);
    this.logger.error({ path: localPath, error: message }, 'Upload aborted');
    return results.abort(path.resolve(localPath), message);
  }

  private label(state: RunState, target: string): string {
    return path.relative(state.labelBase, target) || path.basename(target);
  }

  /** Run an operation and emit its terminal progress event whatever the outcome */
  private async track(
    tracker: ProgressTracker,
    operation: () => Promise<UploadResult>
  ): Promise<UploadResult> {
    let result: UploadResult | undefined;
    try {
      result = await operation();
      return result;
    } finally {
      if (!result) {
        tracker.finish('Upload failed');
      } else if (result.cancelled) {
        tracker.finish('Upload cancelled');
      } else {
        tracker.finish(result.success ? 'Upload complete' : 'Upload failed');
      }
    }
  }
}
