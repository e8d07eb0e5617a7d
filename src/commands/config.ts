/**
 * cloud-upload config set|show: manage the settings file.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { errorMessage } from '../upload/index.js';
import { getConfigPath, maskSecret, readConfig, writeConfig } from '../utils/config.js';
import type { StoredConfig } from '../utils/config.js';
import type { GlobalOptions } from '../utils/services.js';

export interface ConfigSetOptions {
  username?: string;
  password?: string;
  folder?: string;
  key?: string;
  apiUrl?: string;
}

/**
 * Merge the given values into the stored settings and write them back.
 */
export function applyConfigSet(options: ConfigSetOptions, filePath: string): StoredConfig {
  const current = readConfig(filePath) ?? {
    Username: '',
    Password: '',
    BaseFolderHash: '',
    FolderKey: '',
  };

  const next: StoredConfig = {
    Username: options.username ?? current.Username,
    Password: options.password ?? current.Password,
    BaseFolderHash: options.folder ?? current.BaseFolderHash,
    FolderKey: options.key ?? current.FolderKey,
  };
  const apiUrl = options.apiUrl ?? current.ApiUrl;
  if (apiUrl) {
    next.ApiUrl = apiUrl.replace(/\/+$/, '');
  }

  writeConfig(next, filePath);
  return next;
}

export function describeConfig(config: StoredConfig): string[] {
  return [
    `Username:       ${config.Username || '(not set)'}`,
    `Password:       ${maskSecret(config.Password)}`,
    `BaseFolderHash: ${config.BaseFolderHash || '(not set)'}`,
    `FolderKey:      ${maskSecret(config.FolderKey)}`,
    `ApiUrl:         ${config.ApiUrl ?? '(default)'}`,
  ];
}

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Manage stored credentials and the base upload folder');

  configCmd
    .command('set')
    .description('Store credentials and the base folder identity')
    .option('--username <name>', 'Account user name')
    .option('--password <password>', 'Account password')
    .option('--folder <hash>', 'Base folder hash')
    .option('--key <key>', 'Base folder upload key')
    .option('--api-url <url>', 'API base URL override')
    .action((options: ConfigSetOptions, command: Command) => {
      try {
        const filePath = command.optsWithGlobals<GlobalOptions>().config ?? getConfigPath();
        applyConfigSet(options, filePath);
        console.log(chalk.green(`Settings saved to ${filePath}`));
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exitCode = 1;
      }
    });

  configCmd
    .command('show')
    .description('Show stored settings (secrets masked)')
    .action((_options: Record<string, never>, command: Command) => {
      const filePath = command.optsWithGlobals<GlobalOptions>().config ?? getConfigPath();
      const config = readConfig(filePath);
      if (!config) {
        console.log(chalk.yellow(`No settings found at ${filePath}.`));
        return;
      }
      console.log(chalk.dim(filePath));
      for (const line of describeConfig(config)) {
        console.log(`  ${line}`);
      }
    });
}
