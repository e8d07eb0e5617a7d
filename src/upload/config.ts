/**
 * Remote client configuration builder.
 *
 * Reads from environment variables with defaults; every value can be
 * overridden programmatically.
 */

/** Default API base URL */
export const DEFAULT_API_URL = 'https://api.files.fm';

/** Default per-request timeout (10 minutes, sized for large uploads) */
export const DEFAULT_TIMEOUT_MS = 600_000;

/** Endpoint paths relative to the API base URL */
export interface ApiEndpoints {
  login: string;
  createFolder: string;
  uploadFile: string;
  listFolder: string;
}

export const DEFAULT_ENDPOINTS: ApiEndpoints = {
  login: '/api_v2/login.php',
  createFolder: '/api_v2/create_folder.php',
  uploadFile: '/save_file.php',
  listFolder: '/api_v2/get_file_list.php',
};

export interface RemoteClientConfig {
  /** API base URL without trailing slash */
  apiUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  endpoints: ApiEndpoints;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build client config from environment variables and optional overrides.
 *
 * Environment variables:
 * - CLOUD_UPLOAD_API_URL: API base URL (default: DEFAULT_API_URL)
 * - CLOUD_UPLOAD_TIMEOUT_MS: per-request timeout (default: 600000)
 */
export function buildClientConfig(
  overrides?: Partial<RemoteClientConfig>
): RemoteClientConfig {
  const apiUrl = overrides?.apiUrl ?? process.env['CLOUD_UPLOAD_API_URL'] ?? DEFAULT_API_URL;

  return {
    apiUrl: apiUrl.replace(/\/+$/, ''),
    timeoutMs: overrides?.timeoutMs ?? getEnvNumber('CLOUD_UPLOAD_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    endpoints: { ...DEFAULT_ENDPOINTS, ...overrides?.endpoints },
  };
}

/**
 * Validate a client configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateClientConfig(config: RemoteClientConfig): string[] {
  const errors: string[] = [];

  if (!/^https?:\/\//.test(config.apiUrl)) {
    errors.push('apiUrl must start with http:// or https://');
  }

  if (config.timeoutMs < 1000) {
    errors.push('timeoutMs must be at least 1000 (1 second)');
  }

  if (config.timeoutMs > 3_600_000) {
    errors.push('timeoutMs must not exceed 3600000 (1 hour)');
  }

  return errors;
}
