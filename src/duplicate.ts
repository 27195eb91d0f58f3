// src/duplicate.ts

import { stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from './types';
import { fileMd5 } from './hash';
import { errorCode, toError } from './retry';

export type DuplicateOptions = {
  checksum: boolean;
  logger?: Logger;
};

export const isDuplicate = async (
  source: string,
  destinationDir: string,
  { checksum, logger }: DuplicateOptions,
): Promise<boolean> => {
  const candidate = join(destinationDir, basename(source));

  try {
    const [src, dst] = await Promise.all([stat(source), stat(candidate)]);
    if (!dst.isFile() || src.size !== dst.size) return false;
    if (!checksum) return true;

    const [a, b] = await Promise.all([fileMd5(source), fileMd5(candidate)]);
    return a !== '' && a === b;
  } catch (e) {
    if (errorCode(e) !== 'ENOENT') {
      logger?.debug(`Cannot compare files for duplicate ${source}: ${toError(e).message}`);
    }
    return false;
  }
};
