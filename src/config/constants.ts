/**
 * Built-in defaults
 */

import os from 'os';
import path from 'path';

export const APP_NAME = 'photo-vault';

export const CONFIG_DIR = path.join(os.homedir(), '.photo-vault');
export const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export const DEFAULT_STATE_FILE = path.join(os.homedir(), 'photo-vault-state.json');
export const DEFAULT_LOG_FILE = path.join(os.homedir(), 'photo-vault.log');

/** ImageMagick 7 entry point */
export const DEFAULT_CONVERT_COMMAND = 'magick';

/**
 * Source extensions (lowercase) that are converted on placement, mapped to
 * the extension the converted file gets.
 */
export const CONVERTED_EXTENSIONS: Readonly<Record<string, string>> = {
  '.heic': '.jpg',
};

/** EXIF tag holding the original capture timestamp */
export const CAPTURE_DATE_TAG = 'DateTimeOriginal';
