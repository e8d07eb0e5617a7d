/**
 * HTTP implementation of RemoteClient.
 *
 * One request at a time, each bounded by the configured timeout. Bodies
 * are read as text and classified by the helpers in response.ts; nothing
 * speculative is done with a body that does not classify cleanly.
 */

import { openAsBlob } from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { buildClientConfig, validateClientConfig } from './config.js';
import type { RemoteClientConfig } from './config.js';
import {
  ConfigurationError,
  FolderCreateError,
  LoginError,
  RemoteListError,
  UploadError,
  errorMessage,
  isTimeoutError,
} from './errors.js';
import type {
  CreateFolderOptions,
  ListFolderOptions,
  RemoteClient,
  UploadFileOptions,
} from './remote-client.js';
import {
  UPLOAD_ACK,
  classifyUploadResponse,
  folderFromFields,
  parseFolderListing,
  parseFolderPayload,
  parseKeyValuePairs,
} from './response.js';
import type {
  Credentials,
  LoginSession,
  RemoteEntry,
  RemoteFolder,
} from './types.js';

/** Options for constructing an HttpRemoteClient */
export interface HttpRemoteClientOptions {
  logger: Logger;
  /** Config overrides (environment and defaults fill the rest) */
  config?: Partial<RemoteClientConfig>;
  /** Custom fetch implementation (for testing). Default: global fetch */
  fetchFn?: typeof fetch;
}

interface RawResponse {
  ok: boolean;
  status: number;
  body: string;
  headers: Headers;
}

/** First 80 characters of a body, for error messages */
function snippet(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '(empty response)';
  return trimmed.length > 80 ? `${trimmed.slice(0, 80)}...` : trimmed;
}

export class HttpRemoteClient implements RemoteClient {
  private readonly config: RemoteClientConfig;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;
  private session: LoginSession | null = null;

  constructor(options: HttpRemoteClientOptions) {
    this.config = buildClientConfig(options.config);
    const errors = validateClientConfig(this.config);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }
    this.logger = options.logger.child({ component: 'http-remote-client' });
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  /** Session from the last successful login, if any */
  get currentSession(): LoginSession | null {
    return this.session;
  }

  async login(credentials: Credentials): Promise<LoginSession> {
    const form = new URLSearchParams({
      user: credentials.username,
      pass: credentials.password,
    });

    let res: RawResponse;
    try {
      res = await this.request(this.url(this.config.endpoints.login), {
        method: 'POST',
        body: form,
      });
    } catch (err) {
      throw new LoginError(this.describeFailure(err), { cause: err });
    }

    if (!res.ok) {
      throw new LoginError(`HTTP ${res.status}`, { status: res.status });
    }

    const setCookie = res.headers.get('set-cookie');
    if (!setCookie) {
      throw new LoginError(`no session cookie in response: ${snippet(res.body)}`);
    }

    const fields = parseKeyValuePairs(res.body);
    const session: LoginSession = {
      cookie: setCookie.split(';')[0].trim(),
      baseFolder: folderFromFields(fields),
      fields,
    };
    this.session = session;

    this.logger.debug(
      { hasBaseFolder: session.baseFolder !== undefined },
      'Logged in'
    );
    return session;
  }

  async createFolder(
    name: string,
    parentHash: string,
    credentials: Credentials,
    options?: CreateFolderOptions
  ): Promise<RemoteFolder> {
    const form = new URLSearchParams({
      user: credentials.username,
      pass: credentials.password,
      folder_name: name,
      parent_hash: parentHash,
      access_type: options?.accessType ?? 'LINK',
    });

    let res: RawResponse;
    try {
      res = await this.request(this.url(this.config.endpoints.createFolder), {
        method: 'POST',
        body: form,
      });
    } catch (err) {
      throw new FolderCreateError(name, parentHash, this.describeFailure(err), { cause: err });
    }

    if (!res.ok) {
      throw new FolderCreateError(name, parentHash, `HTTP ${res.status}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(res.body);
    } catch (err) {
      throw new FolderCreateError(
        name,
        parentHash,
        `response is not valid JSON: ${snippet(res.body)}`,
        { cause: err }
      );
    }

    const parsed = parseFolderPayload(payload);
    if (!parsed.ok) {
      throw new FolderCreateError(name, parentHash, parsed.reason);
    }

    this.logger.debug({ name, parentHash, hash: parsed.folder.hash }, 'Folder created');
    return parsed.folder;
  }

  async uploadFile(
    localPath: string,
    folderHash: string,
    addKey: string,
    options?: UploadFileOptions
  ): Promise<string> {
    let blob: Blob;
    try {
      blob = await openAsBlob(localPath);
    } catch (err) {
      throw new UploadError(localPath, `cannot read file (${errorMessage(err)})`, { cause: err });
    }

    const form = new FormData();
    form.append('file', blob, path.basename(localPath));

    const returnHash = options?.returnHash ?? false;
    const query: Record<string, string> = { up_id: folderHash, key: addKey };
    if (returnHash) {
      query['get_file_hash'] = '1';
    }

    let res: RawResponse;
    try {
      res = await this.request(this.url(this.config.endpoints.uploadFile, query), {
        method: 'POST',
        body: form,
      });
    } catch (err) {
      throw new UploadError(localPath, this.describeFailure(err), { cause: err });
    }

    const outcome = classifyUploadResponse(res.status, res.body, returnHash);
    switch (outcome.kind) {
      case 'acknowledged':
        this.logger.debug({ file: path.basename(localPath), folderHash }, 'File uploaded');
        return UPLOAD_ACK;
      case 'hash-returned':
        this.logger.debug(
          { file: path.basename(localPath), folderHash, hash: outcome.hash },
          'File uploaded'
        );
        return outcome.hash;
      case 'malformed':
        throw new UploadError(localPath, `unexpected response: ${snippet(outcome.rawBody)}`);
      case 'http-error':
        throw new UploadError(localPath, `HTTP ${outcome.status}`, { status: outcome.status });
    }
  }

  async listFolder(folderHash: string, options?: ListFolderOptions): Promise<RemoteEntry[]> {
    const query: Record<string, string> = { hash: folderHash };
    if (options?.includeSubfolders) {
      query['include_subfolders'] = '1';
    }

    const headers: Record<string, string> = {};
    if (this.session) {
      headers['Cookie'] = this.session.cookie;
    }

    let res: RawResponse;
    try {
      res = await this.request(this.url(this.config.endpoints.listFolder, query), {
        method: 'GET',
        headers,
      });
    } catch (err) {
      throw new RemoteListError(folderHash, this.describeFailure(err), { cause: err });
    }

    if (!res.ok) {
      throw new RemoteListError(folderHash, `HTTP ${res.status}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(res.body);
    } catch (err) {
      throw new RemoteListError(folderHash, `response is not valid JSON: ${snippet(res.body)}`, {
        cause: err,
      });
    }

    const entries = parseFolderListing(payload);
    if (!entries) {
      throw new RemoteListError(folderHash, 'response is not a list of entries');
    }
    return entries;
  }

  // ── Internals ─────────────────────────────────────────────────────

  private url(endpoint: string, query?: Record<string, string>): string {
    const url = new URL(`${this.config.apiUrl}${endpoint}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }

  private async request(url: string, init: RequestInit): Promise<RawResponse> {
    const response = await this.fetchFn(url, {
      ...init,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    const body = await response.text();
    return {
      ok: response.ok,
      status: response.status,
      body,
      headers: response.headers,
    };
  }

  private describeFailure(err: unknown): string {
    if (isTimeoutError(err)) {
      return `request timed out after ${this.config.timeoutMs}ms`;
    }
    return errorMessage(err);
  }
}
