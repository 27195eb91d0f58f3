// src/cleanup.ts

import { rm } from 'node:fs/promises';
import { ResultAsync } from 'neverthrow';
import type { CleanupAction, CleanupRegistry, Logger } from './types';
import { logCleanup } from './log';

export const REMOVE_TEMP = 'remove_temp';

const executeCleanup =
  (runners: CleanupRegistry, logger: Logger) =>
    async (action: CleanupAction): Promise<void> => {
      const runner = runners[action.type];

      if (!runner) {
        logger.warn(`⚠️ [${action.type}] no cleanup runner registered`);
        return;
      }

      const result = await ResultAsync.fromPromise(
        runner(action.params),
        (e: unknown) => new Error(`[${action.type}] cleanup failed: ${String(e)}`),
      );

      result.match(
        () => {
          logCleanup(logger, action.type)(action);
        },
        (err: Error) => {
          logger.error(`⚠️ ${err.message}`);
        },
      );
    };

export const executeAllCleanups =
  (runners: CleanupRegistry, logger: Logger) =>
    (actions: CleanupAction[]): Promise<void> =>
      Promise.all(actions.map(executeCleanup(runners, logger))).then(() => undefined);

export const tempFileRunners: CleanupRegistry = {
  [REMOVE_TEMP]: async (params) => {
    const { path } = params;
    if (typeof path !== 'string') throw new Error('missing temp path');
    await rm(path, { force: true });
  },
};
