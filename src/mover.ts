// src/mover.ts

import { createReadStream, createWriteStream } from 'node:fs';
import type { Stats } from 'node:fs';
import { access, chmod, copyFile, mkdir, rename, rm, stat, unlink, utimes } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { Logger } from './types';
import type { RetryContext } from './retry';
import { errorCode, toError, withRetry } from './retry';
import { logDryRun, logQuarantine } from './log';

const PROGRESS_THRESHOLD = 50 * 1024 * 1024;

export type CopyProgress = (copiedBytes: number, totalBytes: number) => void;

export type FileOps = {
  copy: (source: string, target: string, bufferSize: number, onProgress?: CopyProgress) => Promise<void>;
  copyFile: (source: string, target: string) => Promise<void>;
  rename: (from: string, to: string) => Promise<void>;
  unlink: (path: string) => Promise<void>;
};

const preserveMetadata = async (info: Stats, target: string): Promise<void> => {
  await utimes(target, info.atime, info.mtime);
  await chmod(target, info.mode & 0o7777);
};

export const nodeFileOps: FileOps = {
  copy: async (source, target, bufferSize, onProgress) => {
    const info = await stat(source);
    const reader = createReadStream(source, { highWaterMark: bufferSize });
    if (onProgress) {
      let copied = 0;
      reader.on('data', (chunk) => {
        copied += chunk.length;
        onProgress(copied, info.size);
      });
    }
    await pipeline(reader, createWriteStream(target));
    await preserveMetadata(info, target);
  },
  copyFile: async (source, target) => {
    const info = await stat(source);
    await copyFile(source, target);
    await preserveMetadata(info, target);
  },
  rename: (from, to) => rename(from, to),
  unlink: (path) => unlink(path),
};

// Records the temp file of the move in flight so a crashed run's leftover can
// be found and removed on the next start.
export type TempJournal = {
  track: (tempPath: string) => Promise<void>;
  untrack: () => Promise<void>;
};

export type MoverDeps = {
  logger: Logger;
  retry: RetryContext;
  bufferSize: number;
  quarantineDir: string;
  ops?: FileOps;
  journal?: TempJournal;
  now?: () => number;
  // Synchronous check-and-take of a target name shared by concurrent movers.
  reserveName?: (path: string) => boolean;
  releaseName?: (path: string) => void;
};

export type UnlinkResult = 'deleted' | 'quarantined';

export const tempSiblingPath = (destination: string, tag: string): string => {
  const ext = extname(destination);
  return join(dirname(destination), `${basename(destination, ext)}.${tag}.tmp${ext}`);
};

export const quarantinePath = (
  quarantineDir: string,
  source: string,
  unixSeconds: number,
  counter = 0,
): string => {
  const ext = extname(source);
  const suffix = counter === 0 ? '' : `_${counter}`;
  return join(quarantineDir, `${basename(source, ext)}_locked_${unixSeconds}${suffix}${ext}`);
};

const exists = (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false,
  );

const freeQuarantinePath = async (deps: MoverDeps, source: string, unixSeconds: number): Promise<string> => {
  const reserve = deps.reserveName ?? (() => true);
  for (let counter = 0; ; counter += 1) {
    const candidate = quarantinePath(deps.quarantineDir, source, unixSeconds, counter);
    if (!(await exists(candidate)) && reserve(candidate)) return candidate;
  }
};

const progressLogger = (logger: Logger, name: string): CopyProgress => {
  let reported = 0;
  return (copied, total) => {
    if (total <= PROGRESS_THRESHOLD) return;
    const decile = Math.floor((copied / total) * 10);
    if (decile === reported) return;
    reported = decile;
    logger.debug(`Copy progress ${name}: ${copied}/${total} bytes (${decile * 10}%)`);
  };
};

const attempt = <T>(promise: Promise<T>): ResultAsync<T, Error> =>
  ResultAsync.fromPromise(promise, toError);

const clearStale = (deps: MoverDeps, temp: string): Promise<void> =>
  rm(temp, { force: true }).catch((e: unknown) => {
    deps.logger.debug(`Cannot remove stale temp file ${temp}: ${toError(e).message}`);
  });

const track = (deps: MoverDeps, temp: string): Promise<void> =>
  deps.journal ? deps.journal.track(temp) : Promise.resolve();

const untrack = (deps: MoverDeps): Promise<void> =>
  (deps.journal ? deps.journal.untrack() : Promise.resolve()).catch((e: unknown) => {
    deps.logger.warn(`Cannot update move journal: ${toError(e).message}`);
  });

// The journal entry is only dropped once the temp file is really gone.
const discardTemp = async (deps: MoverDeps, temp: string): Promise<void> => {
  try {
    await rm(temp, { force: true });
  } catch (e) {
    deps.logger.debug(`Cannot remove temp file ${temp}: ${toError(e).message}`);
    return;
  }
  await untrack(deps);
};

const abandon = (deps: MoverDeps, temp: string) =>
  (err: Error): ResultAsync<void, Error> =>
    ResultAsync.fromSafePromise(discardTemp(deps, temp)).andThen(() => errAsync(err));

// copy -> temp sibling, then rename onto the destination. The destination
// name only ever points at a complete file.
const transfer = (
  deps: MoverDeps,
  label: string,
  copy: (target: string) => Promise<void>,
  destination: string,
  temp: string,
): ResultAsync<void, Error> => {
  const ops = deps.ops ?? nodeFileOps;
  const retry = withRetry(deps.retry);

  return attempt(mkdir(dirname(destination), { recursive: true }))
    .andThen(() => ResultAsync.fromSafePromise(clearStale(deps, temp)))
    .andThen(() => attempt(track(deps, temp)))
    .andThen(() => retry(`${label}:copy`)(() => copy(temp)).orElse(abandon(deps, temp)))
    .andThen(() => retry(`${label}:rename`)(() => ops.rename(temp, destination)).orElse(abandon(deps, temp)))
    .andThen(() => ResultAsync.fromSafePromise(untrack(deps)));
};

export const quarantine =
  (deps: MoverDeps) =>
    (path: string): ResultAsync<UnlinkResult, Error> => {
      const ops = deps.ops ?? nodeFileOps;
      const now = deps.now ?? Date.now;
      const seconds = Math.floor(now() / 1000);

      const relocate = async (): Promise<string> => {
        await mkdir(deps.quarantineDir, { recursive: true });
        const target = await freeQuarantinePath(deps, path, seconds);
        try {
          await ops.rename(path, target);
          return target;
        } finally {
          deps.releaseName?.(target);
        }
      };

      return attempt(relocate())
        .map((target) => logQuarantine(deps.logger, basename(path), target)<UnlinkResult>('quarantined'))
        .mapErr((err) => {
          deps.logger.error(`Cannot move locked file ${path} to ${deps.quarantineDir}: ${err.message}`);
          return err;
        });
    };

export const unlinkWithRetries =
  (deps: MoverDeps) =>
    (path: string): ResultAsync<UnlinkResult, Error> => {
      const ops = deps.ops ?? nodeFileOps;

      return withRetry(deps.retry)('unlink')(() => ops.unlink(path))
        .map((): UnlinkResult => 'deleted')
        .orElse((err): ResultAsync<UnlinkResult, Error> => {
          if (errorCode(err) === 'ENOENT') return okAsync('deleted');
          deps.logger.warn(`Cannot delete ${path}: ${err.message}`);
          return quarantine(deps)(path);
        });
    };

// A source that survives both deletion and quarantine is left in place; its
// bytes are already at the destination, so a later pass sees a duplicate.
const removeSource = (deps: MoverDeps, source: string): ResultAsync<void, never> =>
  unlinkWithRetries(deps)(source)
    .map((): void => undefined)
    .orElse((err) => {
      deps.logger.warn(`Could not delete source ${source} after move: ${err.message}`);
      return okAsync<void, never>(undefined);
    });

export const atomicMove =
  (deps: MoverDeps) =>
    (source: string, destination: string, dryRun = false): ResultAsync<void, Error> => {
      if (dryRun) {
        logDryRun(deps.logger, source, destination)(undefined);
        return okAsync(undefined);
      }

      const ops = deps.ops ?? nodeFileOps;
      const now = deps.now ?? Date.now;
      const temp = tempSiblingPath(destination, `${process.pid}.${now()}`);
      const copy = (target: string) =>
        ops.copy(source, target, deps.bufferSize, progressLogger(deps.logger, basename(source)));

      return transfer(deps, 'move', copy, destination, temp).andThen(() => removeSource(deps, source));
    };

export const fallbackCopy =
  (deps: MoverDeps) =>
    (source: string, destination: string): ResultAsync<void, Error> => {
      const ops = deps.ops ?? nodeFileOps;
      const now = deps.now ?? Date.now;
      const temp = tempSiblingPath(destination, `${process.pid}.${now()}.fallback`);
      const copy = (target: string) => ops.copyFile(source, target);

      return transfer(deps, 'fallback', copy, destination, temp).andThen(() => removeSource(deps, source));
    };
