// src/journal.ts

import type { Checkpoint, CleanupRegistry, Logger, StorageAdapter } from './types';
import {
  emptyCheckpoint,
  restarted,
  withCleanup,
  withoutCleanup,
  withStatus,
} from './checkpoint';
import { executeAllCleanups } from './cleanup';
import {
  logCleanupReg,
  logCleanupClear,
  logRecovery,
} from './log';

// Any cleanup still attached to a stored record was left by a run that
// never reached afterSafe; it is executed before the record is reused.
export const load =
  (storage: StorageAdapter, logger: Logger) =>
    (runners: CleanupRegistry) =>
      (fileId: string): Promise<Checkpoint> =>
        storage
          .fetchOne(fileId)
          .then((existing) => existing ?? emptyCheckpoint(fileId))
          .then((cp) => {
            if (cp.cleanup.length === 0) return restarted(cp);

            logRecovery(logger, fileId, cp.cleanup.length)(cp);

            return executeAllCleanups(runners, logger)(cp.cleanup).then(() => restarted(cp));
          })
          .then(storage.upsert);

export const beforeRisky =
  (storage: StorageAdapter, logger: Logger) =>
    (cp: Checkpoint) =>
      (type: string) =>
        (params: Record<string, unknown>): Promise<Checkpoint> =>
          Promise.resolve(withCleanup(cp, { type, params }))
            .then(storage.upsert)
            .then((updated) => {
              logCleanupReg(logger, type)(updated);
              Object.assign(cp, updated);
              return updated;
            });

export const afterSafe =
  (storage: StorageAdapter, logger: Logger) =>
    (cp: Checkpoint) =>
      (type: string): Promise<Checkpoint> =>
        Promise.resolve(withoutCleanup(cp, type))
          .then(storage.upsert)
          .then((updated) => {
            logCleanupClear(logger, type)(updated);
            Object.assign(cp, updated);
            return updated;
          });

// A finished move leaves nothing worth remembering.
export const complete =
  (storage: StorageAdapter) =>
    (cp: Checkpoint): Promise<Checkpoint> => {
      const updated = withStatus(cp, 'completed');
      return storage.deleteOne(cp.fileId).then(() => updated);
    };

export const fail =
  (storage: StorageAdapter) =>
    (cp: Checkpoint): Promise<Checkpoint> =>
      Promise.resolve(withStatus(cp, 'failed')).then(storage.upsert);

// Run at startup, before any worker exists: every stored record is stale.
// Records are dropped even when one of their cleanups fails; the failure is
// logged by executeAllCleanups.
export const sweep =
  (storage: StorageAdapter, logger: Logger) =>
    (runners: CleanupRegistry) =>
      (): Promise<{ cleaned: number; details: string[] }> =>
        storage.fetchAll().then((records) =>
          Promise.all(
            records.map((cp) =>
              executeAllCleanups(runners, logger)(cp.cleanup)
                .then(() => storage.deleteOne(cp.fileId))
                .then(() => cp.fileId),
            ),
          ).then((fileIds) => ({ cleaned: fileIds.length, details: fileIds })),
        );
