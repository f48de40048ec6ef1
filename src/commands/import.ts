/**
 * Import Command - copy new photos and videos from a source folder into the archive
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import path from 'path';
import { ArchiveLedger } from '../core/ledger.js';
import { Importer } from '../core/importer.js';
import { MagickConverter } from '../core/converter.js';
import { ExifMetadataReader } from '../core/metadata.js';
import { PlacementPolicy } from '../core/placement.js';
import type {
  Converter,
  ImportProgressEvent,
  ImportResult,
  Logger,
  MetadataReader,
} from '../types/index.js';
import { loadConfig, resolveSettings } from '../utils/config.js';
import { StartupError } from '../utils/errors.js';
import { FileLogger } from '../utils/logger.js';
import { isDirectory } from '../utils/source-files.js';

export interface ImportCommandOptions {
  sourceDir: string;
  targetDir: string;
  dirSuffix?: string;
  stateFile?: string;
  logFile?: string;
  convertCommand?: string;
  configFile?: string;
  dryRun?: boolean;
  verbose?: boolean;
  progress?: boolean;
  stats?: boolean;
}

/**
 * Collaborator overrides, for tests
 */
export interface ImportCommandDeps {
  logger?: Logger;
  metadataReader?: MetadataReader;
  converter?: Converter;
}

export async function importCommand(
  options: ImportCommandOptions,
  deps: ImportCommandDeps = {}
): Promise<ImportResult> {
  const sourceDir = path.resolve(options.sourceDir);
  const targetDir = path.resolve(options.targetDir);

  if (!(await isDirectory(sourceDir))) {
    throw new StartupError(`Source directory does not exist: ${sourceDir}`);
  }
  if (!(await isDirectory(targetDir))) {
    throw new StartupError(`Target directory does not exist: ${targetDir}`);
  }

  const config = await loadConfig(options.configFile);
  const settings = resolveSettings(config, {
    stateFile: options.stateFile,
    logFile: options.logFile,
    convertCommand: options.convertCommand,
    dirSuffix: options.dirSuffix,
  });

  const logger = deps.logger ?? new FileLogger(settings.logFile, { echo: options.verbose });
  logger.info(
    `Starting import from ${sourceDir} to ${targetDir}` +
      (settings.dirSuffix ? ` (suffix "${settings.dirSuffix}")` : '') +
      (options.dryRun ? ' [dry-run]' : '')
  );

  const ledger = await ArchiveLedger.load(settings.stateFile, logger);
  const placement = new PlacementPolicy({
    targetDir,
    dirSuffix: settings.dirSuffix,
    metadataReader: deps.metadataReader ?? new ExifMetadataReader(),
    converter: deps.converter ?? new MagickConverter(settings.convertCommand),
    logger,
  });
  const importer = new Importer(ledger, placement, logger);

  const spinner = options.progress ? ora({ text: 'Scanning source folder...' }).start() : null;

  let result: ImportResult;
  try {
    result = await importer.run(sourceDir, {
      dryRun: options.dryRun,
      onProgress: spinner ? (event) => updateSpinner(spinner, event) : undefined,
    });
  } catch (error) {
    spinner?.fail('Import failed');
    throw error;
  }

  if (spinner) {
    const copied = result.copiedFirstPass + result.copiedSecondPass;
    const summary = `${copied} copied, ${result.alreadyPresent} already archived`;
    if (result.failed > 0) {
      spinner.warn(`${summary}, ${chalk.red(`${result.failed} failed`)}`);
    } else {
      spinner.succeed(summary);
    }
  }

  if (options.stats) {
    printLedgerStats(ledger, result);
  }

  return result;
}

function updateSpinner(spinner: Ora, event: ImportProgressEvent): void {
  const label = event.pass === 'fast' ? 'Checking names' : 'Comparing content';
  spinner.text = `${label} ${event.index}/${event.total}: ${path.basename(event.path)}`;
}

/**
 * Ledger and run summary, on stderr
 */
function printLedgerStats(ledger: ArchiveLedger, result: ImportResult): void {
  const stats = ledger.getStats();
  const lines = [
    chalk.bold('Archive ledger'),
    `  State file:       ${ledger.statePath}`,
    `  Records:          ${stats.records}`,
    `  Distinct names:   ${stats.names}`,
    `  Reused names:     ${stats.collidingNames}`,
    chalk.bold('This run'),
    `  Discovered:       ${result.discovered}`,
    `  Copied (names):   ${result.copiedFirstPass}`,
    `  Copied (content): ${result.copiedSecondPass}`,
    `  Already present:  ${result.alreadyPresent}`,
    `  Failed:           ${result.failed > 0 ? chalk.red(result.failed) : result.failed}`,
    `  Duration:         ${(result.duration / 1000).toFixed(1)}s`,
  ];
  console.error(lines.join('\n'));
}
