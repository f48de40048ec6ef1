/**
 * Configuration Management
 *
 * Stores default paths and the conversion command in ~/.photo-vault/config.json
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import {
  CONFIG_FILE,
  DEFAULT_CONVERT_COMMAND,
  DEFAULT_LOG_FILE,
  DEFAULT_STATE_FILE,
} from '../config/constants.js';
import { ConfigSchema, type Config, type Settings } from '../types/schemas.js';
import { resolveUserPath } from './paths.js';

export type { Config, Settings };

/**
 * Settings after merging CLI flags, config file and built-in defaults
 */
export interface ResolvedSettings {
  stateFile: string;
  logFile: string;
  convertCommand: string;
  dirSuffix: string;
}

function emptyConfig(): Config {
  return { version: '1.0.0' };
}

async function readConfigFile(filePath: string): Promise<Config> {
  const content = await fs.readFile(filePath, 'utf-8');
  return ConfigSchema.parse(JSON.parse(content));
}

/**
 * Load configuration from disk
 *
 * Warnings go to stderr: the log file location itself comes from this config.
 */
export async function loadConfig(configFile: string = CONFIG_FILE): Promise<Config> {
  if (!existsSync(configFile)) {
    return emptyConfig();
  }

  try {
    return await readConfigFile(configFile);
  } catch {
    // Interrupted write or hand edit: try to recover from backup
    const backupFile = `${configFile}.backup`;
    if (existsSync(backupFile)) {
      console.warn('Config file corrupted, restoring from backup...');
      try {
        const config = await readConfigFile(backupFile);
        await fs.copyFile(backupFile, configFile);
        return config;
      } catch {
        console.error('Backup file also corrupted. Using defaults.');
      }
    }

    console.error('Config file corrupted and no valid backup found. Using defaults.');
    return emptyConfig();
  }
}

/**
 * Save configuration to disk (atomic write with backup)
 */
export async function saveConfig(config: Config, configFile: string = CONFIG_FILE): Promise<void> {
  const validated = ConfigSchema.parse(config);
  await fs.mkdir(path.dirname(configFile), { recursive: true });

  if (existsSync(configFile)) {
    const backupFile = `${configFile}.backup`;
    try {
      await fs.copyFile(configFile, backupFile);
    } catch (error) {
      console.warn('Failed to create config backup:', error);
    }
  }

  const tempFile = `${configFile}.tmp`;
  await fs.writeFile(tempFile, JSON.stringify(validated, null, 2), 'utf-8');
  await fs.rename(tempFile, configFile);
}

/**
 * Merge CLI overrides over config file settings over built-in defaults
 */
export function resolveSettings(config: Config, overrides: Settings = {}): ResolvedSettings {
  const settings = config.settings ?? {};

  return {
    stateFile: resolveUserPath(overrides.stateFile ?? settings.stateFile ?? DEFAULT_STATE_FILE),
    logFile: resolveUserPath(overrides.logFile ?? settings.logFile ?? DEFAULT_LOG_FILE),
    convertCommand: overrides.convertCommand ?? settings.convertCommand ?? DEFAULT_CONVERT_COMMAND,
    dirSuffix: overrides.dirSuffix ?? settings.dirSuffix ?? '',
  };
}
