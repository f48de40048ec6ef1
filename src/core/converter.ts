/**
 * Image format conversion through an external tool
 */

import { execa } from 'execa';
import { DEFAULT_CONVERT_COMMAND } from '../config/constants.js';
import type { Converter } from '../types/index.js';

/**
 * Runs `<command> <source> <destination>` (ImageMagick by default).
 * A non-zero exit rejects with execa's error, which carries stderr.
 */
export class MagickConverter implements Converter {
  readonly command: string;

  constructor(command: string = DEFAULT_CONVERT_COMMAND) {
    this.command = command;
  }

  async convert(sourcePath: string, destinationPath: string): Promise<void> {
    await execa(this.command, [sourcePath, destinationPath], { stdin: 'ignore' });
  }
}
