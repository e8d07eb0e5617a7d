/**
 * cloud-upload ls [hash]: list a remote folder.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { errorMessage } from '../upload/index.js';
import type { RemoteClient, RemoteEntry } from '../upload/index.js';
import { credentialsFrom } from '../utils/config.js';
import type { StoredConfig } from '../utils/config.js';
import { buildServices } from '../utils/services.js';
import type { GlobalOptions } from '../utils/services.js';

export function formatSize(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

export function formatEntry(entry: RemoteEntry): string {
  const size = entry.size !== undefined ? formatSize(entry.size) : '';
  const name = entry.type === 'folder' ? `${entry.name}/` : entry.name;
  return `${entry.hash.padEnd(12)} ${size.padStart(10)}  ${name}`;
}

/**
 * List a folder (default: the configured base folder). Logs in first so the
 * listing carries the session cookie.
 */
export async function runList(
  config: StoredConfig,
  client: RemoteClient,
  folderHash?: string,
  options?: { subfolders?: boolean }
): Promise<RemoteEntry[]> {
  await client.login(credentialsFrom(config));

  const hash = folderHash ?? config.BaseFolderHash;
  const entries = await client.listFolder(hash, {
    includeSubfolders: options?.subfolders ?? false,
  });

  if (entries.length === 0) {
    console.log(chalk.dim(`Folder ${hash} is empty.`));
    return entries;
  }

  for (const entry of entries) {
    console.log(formatEntry(entry));
  }
  console.log(chalk.dim(`\n${entries.length} entr${entries.length !== 1 ? 'ies' : 'y'}`));
  return entries;
}

export function registerListCommand(program: Command): void {
  program
    .command('ls')
    .description('List a remote folder (default: the configured base folder)')
    .argument('[hash]', 'Remote folder hash')
    .option('--subfolders', 'Include subfolders in the listing')
    .action(async (hash: string | undefined, options: { subfolders?: boolean }, command: Command) => {
      try {
        const { config, client } = buildServices(command.optsWithGlobals<GlobalOptions>());
        await runList(config, client, hash, options);
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exitCode = 1;
      }
    });
}
