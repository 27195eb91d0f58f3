// src/adapters/jsonFile.ts

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ResultAsync } from 'neverthrow';
import { z } from 'zod';
import type { Checkpoint, Logger, StorageAdapter } from '../types';
import { errorCode, toError } from '../retry';

const cleanupActionSchema = z.object({
  id: z.string(),
  type: z.string(),
  params: z.record(z.unknown()),
  registeredAt: z.number(),
});

const checkpointSchema = z.object({
  fileId: z.string(),
  startedAt: z.number(),
  completedAt: z.number().nullable(),
  status: z.enum(['running', 'completed', 'failed']),
  cleanup: z.array(cleanupActionSchema),
});

const journalSchema = z.record(checkpointSchema);

type Records = Record<string, Checkpoint>;

const readRecords = (filePath: string): Promise<Records> =>
  readFile(filePath, 'utf8').then(
    (raw) => journalSchema.parse(JSON.parse(raw)),
    (e: unknown): Records => {
      if (errorCode(e) === 'ENOENT') return {};
      throw e;
    },
  );

// Write-then-rename, so a crash never leaves a half-written journal.
const writeRecords = (filePath: string, records: Records): Promise<void> => {
  const temp = `${filePath}.${process.pid}.tmp`;
  return mkdir(dirname(filePath), { recursive: true })
    .then(() => writeFile(temp, JSON.stringify(records, null, 2), 'utf8'))
    .then(() => rename(temp, filePath));
};

/**
 * Journal of in-progress moves kept in a single JSON file.
 *
 * Reads return empty results on error so the pipeline keeps going; writes
 * reject, because a move must not start when its temp file could not be
 * recorded. Mutations are serialized through one promise chain.
 */
export const jsonFileStorage = (filePath: string, logger: Logger): StorageAdapter => {
  let tail: Promise<unknown> = Promise.resolve();

  const serialized = <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task, task);
    tail = run.catch(() => undefined);
    return run;
  };

  const mutate = (change: (records: Records) => Records): Promise<void> =>
    serialized(() => readRecords(filePath).then((records) => writeRecords(filePath, change(records))));

  return {
    fetchOne: (fileId) =>
      ResultAsync.fromPromise(readRecords(filePath), toError)
        .map((records) => records[fileId] ?? null)
        .match(
          (checkpoint) => checkpoint,
          (err) => {
            logger.error(`fetchOne error: ${err.message}`);
            return null;
          },
        ),

    fetchAll: () =>
      ResultAsync.fromPromise(readRecords(filePath), toError)
        .map((records) => Object.values(records))
        .match(
          (checkpoints) => checkpoints,
          (err) => {
            logger.error(`fetchAll error: ${err.message}`);
            return [];
          },
        ),

    upsert: (cp) => mutate((records) => ({ ...records, [cp.fileId]: cp })).then(() => cp),

    deleteOne: (fileId) =>
      mutate((records) => {
        const { [fileId]: _removed, ...rest } = records;
        return rest;
      }),
  };
};
