/**
 * cloud-upload login: verify stored credentials against the service.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { errorMessage } from '../upload/index.js';
import type { LoginSession, RemoteClient } from '../upload/index.js';
import { credentialsFrom } from '../utils/config.js';
import type { StoredConfig } from '../utils/config.js';
import { buildServices } from '../utils/services.js';
import type { GlobalOptions } from '../utils/services.js';

/**
 * Log in and describe the session. Warns when the service reports a base
 * folder different from the configured one.
 */
export async function runLogin(
  config: StoredConfig,
  client: RemoteClient
): Promise<LoginSession> {
  const session = await client.login(credentialsFrom(config));

  console.log(chalk.green(`Logged in as ${config.Username}`));
  if (session.baseFolder) {
    console.log(`  Account base folder: ${session.baseFolder.hash}`);
    if (session.baseFolder.hash !== config.BaseFolderHash) {
      console.log(chalk.yellow(`  Configured upload folder: ${config.BaseFolderHash}`));
    }
  }

  return session;
}

export function registerLoginCommand(program: Command): void {
  program
    .command('login')
    .description('Check that the stored credentials are accepted')
    .action(async (_options: Record<string, never>, command: Command) => {
      try {
        const { config, client } = buildServices(command.optsWithGlobals<GlobalOptions>());
        await runLogin(config, client);
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exitCode = 1;
      }
    });
}
