/**
 * Photo Vault command-line program
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { APP_NAME } from './config/constants.js';

interface CliOptions {
  stateFile?: string;
  logFile?: string;
  convertCommand?: string;
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
  progress?: boolean;
  stats?: boolean;
}

function readVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description(
      'Copy photos and videos from a removable or cloud-synced folder into a ' +
        'year/month archive, skipping files that were already archived.'
    )
    .version(readVersion())
    .argument('<source_dir>', 'Folder to import from (not searched recursively)')
    .argument('<target_dir>', 'Archive root')
    .argument('[dir_suffix]', 'Appended to the year and year-month folder names')
    .option('--state-file <path>', 'Archive ledger JSON file (default: ~/photo-vault-state.json)')
    .option('--log-file <path>', 'Log file (default: ~/photo-vault.log)')
    .option('--convert-command <command>', 'Image conversion tool (default: magick)')
    .option('--config <path>', 'Config file (default: ~/.photo-vault/config.json)')
    .option('--dry-run', 'Decide what would be copied without copying or recording anything')
    .option('-v, --verbose', 'Echo log lines to stderr')
    .option('--progress', 'Show a progress spinner on stderr')
    .option('--stats', 'Print ledger statistics to stderr after the run')
    .action(
      async (
        sourceDir: string,
        targetDir: string,
        dirSuffix: string | undefined,
        options: CliOptions
      ) => {
        const { importCommand } = await import('./commands/import.js');
        await importCommand({
          sourceDir,
          targetDir,
          dirSuffix,
          stateFile: options.stateFile,
          logFile: options.logFile,
          convertCommand: options.convertCommand,
          configFile: options.config,
          dryRun: options.dryRun,
          verbose: options.verbose,
          progress: options.progress,
          stats: options.stats,
        });
      }
    );

  return program;
}
