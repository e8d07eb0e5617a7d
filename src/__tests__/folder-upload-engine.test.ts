/**
 * Tests for FolderUploadEngine (upload/folder-upload-engine.ts)
 *
 * Covers:
 * - Depth-first ordering (files before subdirectories)
 * - Folder reuse through a shared PathMapper
 * - Subtree isolation on folder-creation failure
 * - Non-fatal file failures
 * - Per-folder upload keys
 * - Hash tracking, cancellation, vanished paths
 * - Single-file path and run preconditions
 * - Progress terminal event
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import pino from 'pino';
import { FolderUploadEngine } from '../upload/folder-upload-engine.js';
import { PathMapper } from '../upload/path-mapper.js';
import type { ProgressEvent, ProgressSink } from '../upload/progress.js';
import type { Credentials } from '../upload/types.js';
import { FakeRemoteClient } from './helpers/fake-remote-client.js';

const logger = pino({ level: 'silent' });
const credentials: Credentials = { username: 'tester', password: 'test-secret' };
const BASE_HASH = 'base123';

let tmpDir: string;
let rootDir: string;
let client: FakeRemoteClient;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloud-upload-engine-test-'));
  rootDir = path.join(tmpDir, 'root');
  fs.mkdirSync(rootDir);
  client = new FakeRemoteClient();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

/** Create a file under rootDir with the given relative path. */
function createFile(relativePath: string, content = 'data'): string {
  const absPath = path.join(rootDir, relativePath);
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, content);
  return absPath;
}

class RecordingSink implements ProgressSink {
  readonly events: ProgressEvent[] = [];
  emit(event: ProgressEvent): void {
    this.events.push(event);
  }
}

function makeEngine(progress?: ProgressSink): FolderUploadEngine {
  return new FolderUploadEngine({ client, logger, progress });
}

function describeCall(call: FakeRemoteClient['calls'][number]): string {
  switch (call.op) {
    case 'createFolder':
      return `mkdir ${call.name} in ${call.parentHash}`;
    case 'uploadFile':
      return `put ${path.basename(call.localPath)} to ${call.folderHash} with ${call.addKey}`;
    case 'login':
      return `login ${call.username}`;
    case 'listFolder':
      return `ls ${call.folderHash}`;
  }
}

// ── Recursive upload ─────────────────────────────────────────────────────────

describe('uploadFolderRecursive', () => {
  it('uploads files before creating and descending into subdirectories', async () => {
    createFile('a.txt');
    createFile('sub/b.txt');

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(client.calls.map(describeCall)).toEqual([
      'mkdir root in base123',
      'put a.txt to fold1 with key-root',
      'mkdir sub in fold1',
      'put b.txt to fold2 with key-sub',
    ]);
    expect(result.success).toBe(true);
    expect(result.filesAttempted).toBe(2);
    expect(result.filesSucceeded).toBe(2);
    expect(result.foldersCreated).toBe(2);
    expect(result.failures).toEqual([]);
    expect(result.cancelled).toBe(false);
  });

  it('processes sibling entries in name order', async () => {
    createFile('c.txt');
    createFile('a.txt');
    createFile('b.txt');
    createFile('zeta/z.txt');
    createFile('alpha/x.txt');

    await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(client.calls.map(describeCall)).toEqual([
      'mkdir root in base123',
      'put a.txt to fold1 with key-root',
      'put b.txt to fold1 with key-root',
      'put c.txt to fold1 with key-root',
      'mkdir alpha in fold1',
      'put x.txt to fold2 with key-alpha',
      'mkdir zeta in fold1',
      'put z.txt to fold3 with key-zeta',
    ]);
  });

  it('treats an empty root as a normal, successful run', async () => {
    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(client.callsOf('createFolder')).toHaveLength(1);
    expect(client.callsOf('uploadFile')).toHaveLength(0);
    expect(result.success).toBe(true);
    expect(result.filesAttempted).toBe(0);
  });

  it('issues no folder creation for directories already in a reused mapper', async () => {
    createFile('a.txt');
    createFile('sub/b.txt');
    const mapper = new PathMapper(client, logger);
    const engine = makeEngine();

    const first = await engine.uploadFolderRecursive(rootDir, BASE_HASH, credentials, false, {
      pathMapper: mapper,
    });
    const createsAfterFirst = client.callsOf('createFolder').length;

    const second = await engine.uploadFolderRecursive(rootDir, BASE_HASH, credentials, false, {
      pathMapper: mapper,
    });

    expect(first.foldersCreated).toBe(2);
    expect(createsAfterFirst).toBe(2);
    expect(client.callsOf('createFolder')).toHaveLength(2);
    expect(second.foldersCreated).toBe(0);
    expect(second.filesSucceeded).toBe(2);
    expect(client.callsOf('uploadFile').slice(2).map((c) => c.folderHash)).toEqual(['fold1', 'fold2']);
  });

  it('skips the subtree of a failed folder but continues with its siblings', async () => {
    createFile('sub1/x.txt');
    createFile('sub1/deep/y.txt');
    createFile('sub2/z.txt');
    client.failFolders.add('sub1');

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(result.success).toBe(false);
    expect(result.failures).toEqual([
      {
        localPath: path.join(rootDir, 'sub1'),
        kind: 'directory',
        error: 'Failed to create folder "sub1": HTTP 500',
      },
    ]);
    expect(client.callsOf('uploadFile').map((c) => path.basename(c.localPath))).toEqual(['z.txt']);
    expect(client.callsOf('createFolder').map((c) => c.name)).toEqual(['root', 'sub1', 'sub2']);
    expect(result.filesAttempted).toBe(1);
    expect(result.filesSucceeded).toBe(1);
  });

  it('records a failed file and continues with the next file and sibling directories', async () => {
    createFile('1.txt');
    createFile('2.txt');
    createFile('3.txt');
    createFile('sibling/4.txt');
    client.failFiles.add('2.txt');

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(result.success).toBe(false);
    expect(result.filesAttempted).toBe(4);
    expect(result.filesSucceeded).toBe(3);
    expect(result.failures).toEqual([
      {
        localPath: path.join(rootDir, '2.txt'),
        kind: 'file',
        error: `Upload failed for ${path.join(rootDir, '2.txt')}: simulated network error`,
      },
    ]);
    expect(client.callsOf('uploadFile').map((c) => path.basename(c.localPath))).toEqual([
      '1.txt',
      '2.txt',
      '3.txt',
      '4.txt',
    ]);
  });

  it('presents the add key returned for the folder on every upload into it', async () => {
    createFile('a.txt');
    createFile('b.txt');
    client.folderResponses.set('root', { hash: 'abc123', addKey: 'XYZ' });

    await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(client.callsOf('uploadFile').map((c) => [c.folderHash, c.addKey])).toEqual([
      ['abc123', 'XYZ'],
      ['abc123', 'XYZ'],
    ]);
  });

  it('falls back to the edit key when no add key is returned', async () => {
    createFile('a.txt');
    client.folderResponses.set('root', { hash: 'abc123', editKey: 'EDIT1' });

    await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(client.callsOf('uploadFile')[0].addKey).toBe('EDIT1');
  });

  it('uses each nested folder\'s own key rather than the root key', async () => {
    createFile('a/b/c.txt');

    await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    const upload = client.callsOf('uploadFile')[0];
    expect(upload.folderHash).toBe('fold3');
    expect(upload.addKey).toBe('key-b');
  });

  it('records a directory failure when a reused folder has no upload key', async () => {
    createFile('a.txt');
    const mapper = new PathMapper(client, logger);
    mapper.seed(rootDir, { hash: 'keyless' });

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false, {
      pathMapper: mapper,
    });

    expect(result.failures).toEqual([
      { localPath: rootDir, kind: 'directory', error: 'Remote folder keyless has no upload key' },
    ]);
    expect(client.callsOf('uploadFile')).toHaveLength(0);
  });

  it('requests and records content hashes when asked', async () => {
    createFile('a.txt');
    createFile('sub/b.txt');

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, true);

    expect(client.callsOf('uploadFile').every((c) => c.returnHash)).toBe(true);
    expect(result.uploaded).toEqual([
      { localPath: path.join(rootDir, 'a.txt'), remoteHash: 'filehash1' },
      { localPath: path.join(rootDir, 'sub', 'b.txt'), remoteHash: 'filehash2' },
    ]);
  });

  it('omits the hash list when hashes are not requested', async () => {
    createFile('a.txt');

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(result.uploaded).toBeUndefined();
  });

  it('passes the access type to folder creation', async () => {
    createFile('a.txt');

    await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false, {
      accessType: 'PRIVATE',
    });

    expect(client.callsOf('createFolder')[0].accessType).toBe('PRIVATE');
  });

  it('stops issuing operations once cancelled and reports the partial result', async () => {
    createFile('a.txt');
    createFile('b.txt');
    createFile('sub/c.txt');
    const controller = new AbortController();
    client.onUpload = () => controller.abort();

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false, {
      signal: controller.signal,
    });

    expect(client.callsOf('uploadFile')).toHaveLength(1);
    expect(client.callsOf('createFolder')).toHaveLength(1);
    expect(result.cancelled).toBe(true);
    expect(result.success).toBe(false);
    expect(result.filesAttempted).toBe(1);
    expect(result.filesSucceeded).toBe(1);
  });

  it('records a file that vanished before its upload', async () => {
    createFile('a.txt');
    const doomed = createFile('b.txt');
    client.onUpload = (localPath) => {
      if (path.basename(localPath) === 'a.txt') fs.rmSync(doomed);
    };

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(client.callsOf('uploadFile')).toHaveLength(1);
    expect(result.failures).toEqual([
      { localPath: doomed, kind: 'file', error: `File vanished before upload: ${doomed}` },
    ]);
    expect(result.filesAttempted).toBe(2);
  });

  it('skips a subdirectory that vanished before its folder was created', async () => {
    createFile('a.txt');
    createFile('sub1/x.txt');
    createFile('sub1/deep/w.txt');
    createFile('sub2/y.txt');
    const sub1 = path.join(rootDir, 'sub1');
    client.onUpload = (localPath) => {
      if (path.basename(localPath) === 'a.txt') fs.rmSync(sub1, { recursive: true, force: true });
    };

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(result.failures).toEqual([
      { localPath: sub1, kind: 'directory', error: `Directory vanished before upload: ${sub1}` },
    ]);
    expect(client.calls.map(describeCall)).toEqual([
      'mkdir root in base123',
      'put a.txt to fold1 with key-root',
      'mkdir sub2 in fold1',
      'put y.txt to fold2 with key-sub2',
    ]);
    expect(result.success).toBe(false);
    expect(result.filesAttempted).toBe(2);
    expect(result.filesSucceeded).toBe(2);
  });

  it('issues no remote operation when cancelled before the run starts', async () => {
    createFile('a.txt');
    createFile('sub/b.txt');
    const controller = new AbortController();
    controller.abort();

    const result = await makeEngine().uploadFolderRecursive(rootDir, BASE_HASH, credentials, false, {
      signal: controller.signal,
    });

    expect(client.calls).toEqual([]);
    expect(result.cancelled).toBe(true);
    expect(result.success).toBe(false);
    expect(result.foldersCreated).toBe(0);
    expect(result.filesAttempted).toBe(0);
  });

  it('aborts without work when the root does not exist', async () => {
    const missing = path.join(tmpDir, 'missing');

    const result = await makeEngine().uploadFolderRecursive(missing, BASE_HASH, credentials, false);

    expect(client.calls).toEqual([]);
    expect(result.success).toBe(false);
    expect(result.filesAttempted).toBe(0);
    expect(result.failures).toEqual([
      { localPath: missing, kind: 'precondition', error: `Path does not exist: ${missing}` },
    ]);
  });

  it('aborts without work when credentials are incomplete', async () => {
    createFile('a.txt');

    const result = await makeEngine().uploadFolderRecursive(
      rootDir,
      '',
      { username: 'tester', password: '' },
      false
    );

    expect(client.calls).toEqual([]);
    expect(result.success).toBe(false);
    expect(result.failures).toEqual([
      {
        localPath: rootDir,
        kind: 'precondition',
        error: 'Invalid configuration: password is required; remote parent folder hash is required',
      },
    ]);
  });
});

// ── Progress ─────────────────────────────────────────────────────────────────

describe('progress events', () => {
  it('emits per-file progress and exactly one terminal event', async () => {
    createFile('a.txt');
    createFile('sub/b.txt');
    const sink = new RecordingSink();

    await makeEngine(sink).uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    const doneEvents = sink.events.filter((e) => e.done);
    expect(doneEvents).toHaveLength(1);
    expect(sink.events[sink.events.length - 1]).toBe(doneEvents[0]);
    expect(doneEvents[0].activity).toBe('Upload complete');
    expect(doneEvents[0].total).toBe(2);
    expect(doneEvents[0].completed).toBe(2);
    expect(sink.events.map((e) => e.activity)).toEqual([
      'Created folder root',
      path.join('root', 'a.txt'),
      `Created folder ${path.join('root', 'sub')}`,
      path.join('root', 'sub', 'b.txt'),
      'Upload complete',
    ]);
  });

  it('emits a terminal failure event when the run aborts', async () => {
    const sink = new RecordingSink();

    await makeEngine(sink).uploadFolderRecursive(path.join(tmpDir, 'missing'), BASE_HASH, credentials, false);

    expect(sink.events).toHaveLength(1);
    expect(sink.events[0].done).toBe(true);
    expect(sink.events[0].activity).toBe('Upload failed');
  });

  it('counts a skipped subtree\'s files as processed', async () => {
    createFile('sub1/x.txt');
    createFile('sub1/y.txt');
    createFile('z.txt');
    client.failFolders.add('sub1');
    const sink = new RecordingSink();

    await makeEngine(sink).uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    const last = sink.events[sink.events.length - 1];
    expect(last.done).toBe(true);
    expect(last.completed).toBe(3);
    expect(last.total).toBe(3);
  });

  it('keeps uploading when the sink throws', async () => {
    createFile('a.txt');
    const sink: ProgressSink = {
      emit: () => {
        throw new Error('display gone');
      },
    };

    const result = await makeEngine(sink).uploadFolderRecursive(rootDir, BASE_HASH, credentials, false);

    expect(result.success).toBe(true);
    expect(result.filesSucceeded).toBe(1);
  });
});

// ── Single file ──────────────────────────────────────────────────────────────

describe('uploadSingleFile', () => {
  it('uploads straight into the given folder without creating folders', async () => {
    const file = createFile('report.pdf');

    const result = await makeEngine().uploadSingleFile(file, 'dest42', 'folder-key');

    expect(client.callsOf('createFolder')).toHaveLength(0);
    expect(client.calls).toEqual([
      { op: 'uploadFile', localPath: file, folderHash: 'dest42', addKey: 'folder-key', returnHash: false },
    ]);
    expect(result.success).toBe(true);
    expect(result.uploaded).toEqual([{ localPath: file, remoteHash: 'd' }]);
  });

  it('returns a content hash when requested', async () => {
    const file = createFile('report.pdf');

    const result = await makeEngine().uploadSingleFile(file, 'dest42', 'folder-key', {
      returnHash: true,
    });

    expect(result.uploaded?.[0].remoteHash).toMatch(/^[a-zA-Z0-9]{6,}$/);
  });

  it('reports the upload failure directly', async () => {
    const file = createFile('report.pdf');
    client.failFiles.add('report.pdf');

    const result = await makeEngine().uploadSingleFile(file, 'dest42', 'folder-key');

    expect(result.success).toBe(false);
    expect(result.filesAttempted).toBe(1);
    expect(result.filesSucceeded).toBe(0);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].kind).toBe('file');
    expect(result.uploaded).toEqual([]);
  });

  it('aborts when the folder key is missing', async () => {
    const file = createFile('report.pdf');

    const result = await makeEngine().uploadSingleFile(file, 'dest42', '');

    expect(client.calls).toEqual([]);
    expect(result.failures).toEqual([
      {
        localPath: file,
        kind: 'precondition',
        error: 'Invalid configuration: remote folder key is required',
      },
    ]);
  });

  it('aborts when the path is a directory', async () => {
    const result = await makeEngine().uploadSingleFile(rootDir, 'dest42', 'folder-key');

    expect(client.calls).toEqual([]);
    expect(result.failures[0].error).toBe(`Not a regular file: ${rootDir}`);
  });

  it('emits one terminal event', async () => {
    const file = createFile('report.pdf');
    const sink = new RecordingSink();

    await makeEngine(sink).uploadSingleFile(file, 'dest42', 'folder-key');

    expect(sink.events.map((e) => [e.activity, e.completed, e.total, e.done])).toEqual([
      ['report.pdf', 1, 1, false],
      ['Upload complete', 1, 1, true],
    ]);
  });
});
