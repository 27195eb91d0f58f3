// src/hash.ts

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { ResultAsync } from 'neverthrow';
import { toError } from './retry';

const BLOCK_SIZE = 64 * 1024;

export const digestFile = (
  path: string,
  algorithm: 'md5' | 'sha256' = 'md5',
): ResultAsync<string, Error> =>
  ResultAsync.fromPromise(
    new Promise<string>((resolve, reject) => {
      const hash = createHash(algorithm);
      createReadStream(path, { highWaterMark: BLOCK_SIZE })
        .on('data', (chunk) => hash.update(chunk))
        .on('error', reject)
        .on('end', () => resolve(hash.digest('hex')));
    }),
    toError,
  );

// Empty string when the file cannot be read, which never equals a real digest.
export const fileMd5 = (path: string): Promise<string> =>
  digestFile(path, 'md5').match(
    (digest) => digest,
    () => '',
  );
