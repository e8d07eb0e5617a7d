/**
 * Settings storage for the cloud-upload CLI.
 * Stores account credentials and the base folder identity in
 * ~/.cloud-upload/config.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigurationError } from '../upload/index.js';
import type { Credentials, RemoteFolder } from '../upload/index.js';

/** Persisted settings shape */
export interface StoredConfig {
  Username: string;
  Password: string;
  /** Remote folder every upload goes into */
  BaseFolderHash: string;
  /** Upload key of the base folder */
  FolderKey: string;
  /** Optional API base URL override */
  ApiUrl?: string;
}

const REQUIRED_FIELDS = ['Username', 'Password', 'BaseFolderHash', 'FolderKey'] as const;

/**
 * Override for the config directory base path.
 * Set via CLOUD_UPLOAD_CONFIG_HOME env var or _setConfigHome (for testing).
 * When null, defaults to os.homedir().
 */
let configHomeOverride: string | null = null;

/**
 * Set the base directory for config files. Intended for testing only.
 */
export function _setConfigHome(dir: string | null): void {
  configHomeOverride = dir;
}

function getConfigDir(): string {
  const base = configHomeOverride
    ?? process.env['CLOUD_UPLOAD_CONFIG_HOME']
    ?? os.homedir();
  return path.join(base, '.cloud-upload');
}

/**
 * Get the settings file path (for display/debugging).
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Read stored settings. Returns null if the file is missing or corrupt.
 * Fields may be empty; use loadConfig for a validated value.
 */
export function readConfig(filePath: string = getConfigPath()): StoredConfig | null {
  try {
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    const record: Record<string, unknown> = { ...parsed };
    const config: StoredConfig = {
      Username: readString(record, 'Username'),
      Password: readString(record, 'Password'),
      BaseFolderHash: readString(record, 'BaseFolderHash'),
      FolderKey: readString(record, 'FolderKey'),
    };
    const apiUrl = readString(record, 'ApiUrl');
    if (apiUrl) {
      config.ApiUrl = apiUrl;
    }
    return config;
  } catch {
    return null;
  }
}

/**
 * Read and validate stored settings.
 * @throws ConfigurationError listing every missing field
 */
export function loadConfig(filePath: string = getConfigPath()): StoredConfig {
  const config = readConfig(filePath);
  if (!config) {
    throw new ConfigurationError([
      `no settings found at ${filePath}; run "cloud-upload config set" first`,
    ]);
  }

  const missing = REQUIRED_FIELDS.filter((field) => !config[field]);
  if (missing.length > 0) {
    throw new ConfigurationError(missing.map((field) => `${field} is missing`));
  }

  return config;
}

/**
 * Write settings to disk. Creates the directory if needed.
 * File permissions are set to owner-only (0o600).
 */
export function writeConfig(config: StoredConfig, filePath: string = getConfigPath()): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function credentialsFrom(config: StoredConfig): Credentials {
  return { username: config.Username, password: config.Password };
}

export function baseFolderFrom(config: StoredConfig): RemoteFolder {
  return { hash: config.BaseFolderHash, addKey: config.FolderKey };
}

/**
 * Mask a secret for display, keeping the last two characters.
 */
export function maskSecret(value: string): string {
  if (!value) return '(not set)';
  if (value.length <= 4) return '****';
  return `${'*'.repeat(value.length - 2)}${value.slice(-2)}`;
}
