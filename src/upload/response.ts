/**
 * Parse-then-classify helpers for remote API responses.
 *
 * The service answers with JSON, bare strings or HTML depending on the
 * endpoint and failure mode; every body goes through one of these
 * functions before the client acts on it.
 */

import type { RemoteEntry, RemoteFolder } from './types.js';

/** Literal body returned by the upload endpoint on plain success */
export const UPLOAD_ACK = 'd';

const CONTENT_HASH_PATTERN = /^[a-zA-Z0-9]{6,}$/;

/** Classified outcome of an upload request */
export type UploadResponse =
  | { kind: 'acknowledged' }
  | { kind: 'hash-returned'; hash: string }
  | { kind: 'malformed'; rawBody: string }
  | { kind: 'http-error'; status: number; rawBody: string };

/**
 * Classify an upload reply. A content hash is accepted only when the
 * request asked for one; a plain upload succeeds on the literal "d" alone.
 */
export function classifyUploadResponse(
  status: number,
  body: string,
  hashRequested: boolean
): UploadResponse {
  if (status < 200 || status >= 300) {
    return { kind: 'http-error', status, rawBody: body };
  }

  const trimmed = body.trim();
  if (trimmed === UPLOAD_ACK) {
    return { kind: 'acknowledged' };
  }
  if (hashRequested && CONTENT_HASH_PATTERN.test(trimmed)) {
    return { kind: 'hash-returned', hash: trimmed };
  }
  return { kind: 'malformed', rawBody: body };
}

/**
 * Parse `key=value` pairs out of a semicolon-delimited string.
 * Segments without `=` are ignored; the first `=` splits key from value.
 */
export function parseKeyValuePairs(text: string): Record<string, string> {
  const pairs: Record<string, string> = {};

  for (const segment of text.split(';')) {
    const idx = segment.indexOf('=');
    if (idx <= 0) continue;
    const key = segment.slice(0, idx).trim();
    const value = segment.slice(idx + 1).trim();
    if (key) {
      pairs[key] = value;
    }
  }

  return pairs;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Result of reading a folder-creation payload */
export type FolderPayload =
  | { ok: true; folder: RemoteFolder }
  | { ok: false; reason: string };

/**
 * Read `{ hash, add_key?, edit_key? }` from a folder-creation response.
 * A payload without `hash`, or without both keys, is malformed.
 */
export function parseFolderPayload(payload: unknown): FolderPayload {
  if (!isRecord(payload)) {
    return { ok: false, reason: 'response is not a JSON object' };
  }

  const error = nonEmptyString(payload['error']);
  if (error) {
    return { ok: false, reason: error };
  }

  const hash = nonEmptyString(payload['hash']);
  if (!hash) {
    return { ok: false, reason: 'response is missing "hash"' };
  }

  const addKey = nonEmptyString(payload['add_key']);
  const editKey = nonEmptyString(payload['edit_key']);
  if (!addKey && !editKey) {
    return { ok: false, reason: 'response is missing both "add_key" and "edit_key"' };
  }

  return { ok: true, folder: { hash, addKey, editKey } };
}

/**
 * Build a RemoteFolder from login response fields, if they describe one.
 */
export function folderFromFields(fields: Record<string, string>): RemoteFolder | undefined {
  const hash = nonEmptyString(fields['hash']);
  if (!hash) return undefined;
  return {
    hash,
    addKey: nonEmptyString(fields['add_key']),
    editKey: nonEmptyString(fields['edit_key']),
  };
}

/**
 * Validate a folder listing. Returns null when the payload is not an
 * array of entries with at least `name` and `hash`.
 */
export function parseFolderListing(payload: unknown): RemoteEntry[] | null {
  if (!Array.isArray(payload)) return null;

  const entries: RemoteEntry[] = [];
  for (const item of payload) {
    if (!isRecord(item)) return null;
    const name = nonEmptyString(item['name']);
    const hash = nonEmptyString(item['hash']);
    if (!name || !hash) return null;

    const entry: RemoteEntry = { name, hash };
    const size = item['size'];
    if (typeof size === 'number') {
      entry.size = size;
    } else if (typeof size === 'string' && /^\d+$/.test(size)) {
      entry.size = parseInt(size, 10);
    }
    const type = item['type'];
    if (type === 'file' || type === 'folder') {
      entry.type = type;
    }
    entries.push(entry);
  }
  return entries;
}

/**
 * The key to present when uploading into a folder: add key first, edit key otherwise.
 */
export function uploadKeyFor(folder: RemoteFolder): string | undefined {
  return folder.addKey ?? folder.editKey;
}
