/**
 * asar-inject - command definitions
 */
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { AsarBinary } from './asar-binary.js';
import { defaultBackupPath, readArchiveFile } from './archive-io.js';
import { loadConfig } from './config.js';
import { applyTheme, removeTheme, restoreTheme } from './workflow.js';
import type { Logger } from './types/logger.js';

// Version is set at build time
const version = '0.1.0';

interface PatchCommandOptions {
  css?: string;
  cssUrl?: string;
  js?: string;
  entry?: string;
  backup?: string | boolean;
  reapply?: boolean;
  config?: string;
}

interface UnpatchCommandOptions {
  entry?: string;
  config?: string;
}

interface RestoreCommandOptions {
  backup?: string;
}

async function fetchText(url: string): Promise<string> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Download of ${url} failed with HTTP ${response.status}`);
  }
  return response.text();
}

async function readCss(options: PatchCommandOptions, logger: Logger): Promise<string> {
  if (options.css && options.cssUrl) {
    throw new Error('Use either --css or --css-url, not both');
  }
  if (options.css) {
    return readFile(resolve(options.css), 'utf8');
  }
  if (options.cssUrl) {
    logger.log(`Downloading theme from ${options.cssUrl}...`);
    return fetchText(options.cssUrl);
  }
  throw new Error('A theme is required: pass --css <file> or --css-url <url>');
}

/**
 * Builds the CLI. `logger` receives all output so tests can capture it.
 */
export function createProgram(logger: Logger = console): Command {
  const program = new Command();

  program
    .name('asar-inject')
    .description('Inject a CSS theme and script into an Electron asar archive, with backup and restore')
    .version(version);

  program
    .command('patch')
    .description('Inject a theme into a script inside the archive')
    .argument('<archive>', 'Path to the .asar archive')
    .option('--css <file>', 'Theme CSS file')
    .option('--css-url <url>', 'Download the theme CSS from a URL')
    .option('--js <file>', 'Script to run after the theme is applied')
    .option('--entry <path>', 'Script entry inside the archive')
    .option('--backup <file>', 'Backup location (default: <archive>.backup)')
    .option('--no-backup', 'Do not back up the archive before writing')
    .option('--reapply', 'Replace a theme that was injected earlier')
    .option('--config <file>', 'JSON config file')
    .action(async (archive: string, options: PatchCommandOptions) => {
      try {
        const config = await loadConfig(options.config);
        const css = await readCss(options, logger);
        const js = options.js ? await readFile(resolve(options.js), 'utf8') : config.customJs;
        const backupPath = typeof options.backup === 'string' ? options.backup : config.backupPath;

        const status = await applyTheme({
          archivePath: archive,
          css,
          js,
          entryPath: options.entry ?? config.entryPath,
          makeBackup: options.backup !== false && config.makeBackup,
          ...(backupPath !== undefined ? { backupPath } : {}),
          reapply: options.reapply === true,
          injection: config.injection,
          logger,
        });

        logger.log('');
        logger.log(status === 'patched' ? '✅ Theme injected successfully!' : '✅ Theme already present, nothing to do.');
      } catch (error) {
        logger.error(`❌ Patch failed: ${error instanceof Error ? error.message : String(error)}`);
        logger.error(`   If the application no longer starts, run: asar-inject restore ${archive}`);
        process.exitCode = 1;
      }
    });

  program
    .command('unpatch')
    .description('Remove an injected theme, keeping the rest of the archive as it is')
    .argument('<archive>', 'Path to the .asar archive')
    .option('--entry <path>', 'Script entry inside the archive')
    .option('--config <file>', 'JSON config file')
    .action(async (archive: string, options: UnpatchCommandOptions) => {
      try {
        const config = await loadConfig(options.config);
        const status = await removeTheme({
          archivePath: archive,
          entryPath: options.entry ?? config.entryPath,
          injection: config.injection,
          logger,
        });
        logger.log('');
        logger.log(status === 'unpatched' ? '✅ Theme removed successfully!' : '✅ No theme present, nothing to do.');
      } catch (error) {
        logger.error(`❌ Unpatch failed: ${error instanceof Error ? error.message : String(error)}`);
        logger.error(`   To go back to the original archive, run: asar-inject restore ${archive}`);
        process.exitCode = 1;
      }
    });

  program
    .command('restore')
    .description('Copy the backup over the archive')
    .argument('<archive>', 'Path to the .asar archive')
    .option('--backup <file>', 'Backup location (default: <archive>.backup)')
    .action(async (archive: string, options: RestoreCommandOptions) => {
      try {
        await restoreTheme({
          archivePath: archive,
          backupPath: options.backup ?? defaultBackupPath(resolve(archive)),
          logger,
        });
        logger.log('');
        logger.log('✅ Archive restored from backup!');
      } catch (error) {
        logger.error(`❌ Restore failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command('list')
    .description('List the entries of an archive')
    .argument('<archive>', 'Path to the .asar archive')
    .action(async (archive: string) => {
      try {
        const decoded = AsarBinary.decode({ buffer: await readArchiveFile(resolve(archive)) });
        for (const entry of AsarBinary.listEntries({ archive: decoded })) {
          const detail =
            entry.kind === 'file' ? `${entry.size} bytes` : entry.kind === 'directory' ? `${entry.size} entries` : 'link';
          logger.log(`${entry.path}${entry.kind === 'directory' ? '/' : ''}  ${detail}${entry.unpacked ? '  (unpacked)' : ''}`);
        }
      } catch (error) {
        logger.error(`❌ List failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
