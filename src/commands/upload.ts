/**
 * cloud-upload upload <path>
 *
 * A file goes straight into the configured base folder. A directory is
 * mirrored under the base folder: one remote folder per local directory,
 * every regular file uploaded into its directory's folder.
 *
 * Exports `runUpload` so the flow can be driven programmatically and in tests.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { Command, Option } from 'commander';
import type { Logger } from 'pino';
import {
  FolderUploadEngine,
  errorMessage,
  summarizeResult,
} from '../upload/index.js';
import type {
  AccessType,
  ProgressSink,
  RemoteClient,
  UploadResult,
} from '../upload/index.js';
import { baseFolderFrom, credentialsFrom } from '../utils/config.js';
import type { StoredConfig } from '../utils/config.js';
import { TerminalProgressSink } from '../utils/progress.js';
import { buildServices } from '../utils/services.js';
import type { GlobalOptions } from '../utils/services.js';

export interface UploadCommandOptions {
  /** Request content hashes and list them after the run */
  hashes?: boolean;
  /** Print the full result as JSON instead of the summary */
  json?: boolean;
  /** Visibility of created folders */
  access?: AccessType;
  /** Suppress console output */
  quiet?: boolean;
}

export interface UploadDependencies {
  config: StoredConfig;
  client: RemoteClient;
  logger: Logger;
  progress?: ProgressSink;
  signal?: AbortSignal;
}

/**
 * Upload a file or a directory tree and report the outcome.
 */
export async function runUpload(
  targetPath: string,
  options: UploadCommandOptions,
  deps: UploadDependencies
): Promise<UploadResult> {
  const quiet = options.quiet ?? false;
  const log = (msg: string) => {
    if (!quiet) console.log(msg);
  };

  const engine = new FolderUploadEngine({
    client: deps.client,
    logger: deps.logger,
    progress: deps.progress,
  });

  const absPath = path.resolve(targetPath);
  const isDirectory = fs.existsSync(absPath) && fs.statSync(absPath).isDirectory();
  const base = baseFolderFrom(deps.config);

  let result: UploadResult;
  if (isDirectory) {
    log(chalk.blue(`Uploading folder ${absPath}...`));
    result = await engine.uploadFolderRecursive(
      absPath,
      base.hash,
      credentialsFrom(deps.config),
      options.hashes ?? false,
      { accessType: options.access, signal: deps.signal }
    );
  } else {
    log(chalk.blue(`Uploading ${absPath}...`));
    result = await engine.uploadSingleFile(absPath, base.hash, deps.config.FolderKey, {
      returnHash: options.hashes ?? false,
      signal: deps.signal,
    });
  }

  if (options.json) {
    if (!quiet) console.log(JSON.stringify(result, null, 2));
    return result;
  }

  reportResult(result, options, log);
  return result;
}

function reportResult(
  result: UploadResult,
  options: UploadCommandOptions,
  log: (msg: string) => void
): void {
  const summary = summarizeResult(result);
  log(result.success ? chalk.green(summary) : chalk.yellow(summary));

  if (options.hashes && result.uploaded) {
    for (const entry of result.uploaded) {
      log(chalk.dim(`  ${entry.localPath} -> ${entry.remoteHash}`));
    }
  }

  if (result.failures.length > 0) {
    log(chalk.yellow(`  ${result.failures.length} error${result.failures.length !== 1 ? 's' : ''}:`));
    for (const failure of result.failures.slice(0, 5)) {
      log(chalk.red(`    - ${failure.error}`));
    }
    if (result.failures.length > 5) {
      log(chalk.dim(`    ... and ${result.failures.length - 5} more`));
    }
  }
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Upload a file, or a folder with its whole directory tree')
    .argument('<path>', 'File or folder to upload')
    .option('--hashes', 'Request content hashes and list them after the upload')
    .option('--json', 'Print the full result as JSON')
    .addOption(
      new Option('--access <type>', 'Visibility of created folders')
        .choices(['LINK', 'PRIVATE'])
        .default('LINK')
    )
    .action(async (target: string, options: UploadCommandOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const controller = new AbortController();
      const onInterrupt = () => {
        console.error(chalk.yellow('\nStopping after the current operation...'));
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const { config, client, logger } = buildServices(globals);
        const result = await runUpload(target, options, {
          config,
          client,
          logger,
          progress: options.json ? undefined : new TerminalProgressSink(),
          signal: controller.signal,
        });
        if (!result.success) {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exitCode = 1;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
