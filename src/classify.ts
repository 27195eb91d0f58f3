// src/classify.ts

import { access, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { DestinationBucket, Logger } from './types';
import { toError } from './retry';

const MAX_COLLISION_COUNTER = 100;

export const pad = (value: number, width = 2): string =>
  String(value).padStart(width, '0');

export const isValidDate = (date: Date): boolean => !Number.isNaN(date.getTime());

export const bucketOf = (date: Date): DestinationBucket => ({
  year: pad(date.getFullYear(), 4),
  month: pad(date.getMonth() + 1),
  day: pad(date.getDate()),
});

export const bucketDir = (archiveRoot: string, bucket: DestinationBucket): string =>
  join(archiveRoot, bucket.year, bucket.month, bucket.day);

// Copies tend to refresh one of mtime/ctime but not both; the earlier one is
// closer to when the file was really made.
export const filesystemTimestamp = async (path: string, logger?: Logger): Promise<Date> => {
  try {
    const info = await stat(path);
    return new Date(Math.min(info.mtimeMs, info.ctimeMs));
  } catch (e) {
    logger?.warn(`Cannot get file date for ${path}: ${toError(e).message}`);
    return new Date();
  }
};

export const resolveDestinationBucket = async (
  path: string,
  metadataTimestamp?: Date,
  logger?: Logger,
): Promise<DestinationBucket> => {
  if (metadataTimestamp && isValidDate(metadataTimestamp)) return bucketOf(metadataTimestamp);

  const fallback = await filesystemTimestamp(path, logger);
  logger?.info(`Using file date for ${path}: ${fallback.toISOString()}`);
  return bucketOf(fallback);
};

export const collisionStamp = (date: Date): string =>
  `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

const taken = (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false,
  );

/**
 * First free name among `name`, `<stem>_<YYYYMMDD_HHMMSS><ext>` and
 * `<stem>_<YYYYMMDD_HHMMSS>_<n><ext>`; gives up on counting after 100 and
 * falls back to the unix timestamp.
 *
 * `reserve` must check and take a name synchronously; a candidate counts as
 * free only when nothing is on disk there and `reserve` accepts it.
 */
export const uniqueDestination = async (
  dir: string,
  filename: string,
  now: Date = new Date(),
  reserve: (path: string) => boolean = () => true,
): Promise<string> => {
  const free = async (candidate: string): Promise<boolean> =>
    !(await taken(candidate)) && reserve(candidate);

  const direct = join(dir, filename);
  if (await free(direct)) return direct;

  const ext = extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  const stamp = collisionStamp(now);

  const stamped = join(dir, `${stem}_${stamp}${ext}`);
  if (await free(stamped)) return stamped;

  for (let counter = 1; counter <= MAX_COLLISION_COUNTER; counter += 1) {
    const candidate = join(dir, `${stem}_${stamp}_${counter}${ext}`);
    if (await free(candidate)) return candidate;
  }

  const seconds = Math.floor(now.getTime() / 1000);
  for (let counter = 0; ; counter += 1) {
    const candidate = join(dir, counter === 0 ? `${stem}_${seconds}${ext}` : `${stem}_${seconds}_${counter}${ext}`);
    if (await free(candidate)) return candidate;
  }
};
