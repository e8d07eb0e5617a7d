/**
 * Wiring shared by the CLI commands: settings, logger and HTTP client.
 */

import type { Logger } from 'pino';
import { HttpRemoteClient } from '../upload/index.js';
import { getConfigPath, loadConfig } from './config.js';
import type { StoredConfig } from './config.js';
import { createLogger } from './logger.js';

/** Options every command accepts */
export type GlobalOptions = {
  /** Path to the settings file */
  config?: string;
  /** Debug-level, human-readable logging */
  verbose?: boolean;
};

export interface CliServices {
  config: StoredConfig;
  logger: Logger;
  client: HttpRemoteClient;
}

/**
 * Load validated settings and build the client.
 * @throws ConfigurationError when settings are missing or incomplete
 */
export function buildServices(options: GlobalOptions): CliServices {
  const logger = options.verbose
    ? createLogger({ level: 'debug', pretty: true })
    : createLogger();

  const config = loadConfig(options.config ?? getConfigPath());
  // CLOUD_UPLOAD_API_URL wins over the settings file
  const apiUrl = process.env['CLOUD_UPLOAD_API_URL'] ? undefined : config.ApiUrl;
  const client = new HttpRemoteClient({
    logger,
    config: apiUrl ? { apiUrl } : undefined,
  });

  return { config, logger, client };
}
