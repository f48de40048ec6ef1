/**
 * Content hashing
 */

import crypto from 'crypto';
import { createReadStream } from 'fs';

/**
 * Computes the hex digest of a file's full content.
 */
export type DigestFunction = (filePath: string) => Promise<string>;

/**
 * Stream a file through MD5 and return the hex digest
 */
export const md5File: DigestFunction = (filePath) => {
  const hash = crypto.createHash('md5');
  const stream = createReadStream(filePath);

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
};
