// src/stability.ts

import { constants } from 'node:fs';
import { open, stat } from 'node:fs/promises';
import { errorCode, sleep, toError } from './retry';
import type { Sleep } from './retry';
import type { Logger } from './types';
import { silentLogger } from './log';

const MiB = 1024 * 1024;

export type StabilityOptions = {
  minStableMs: number;
  maxWaitMs: number;
  pollIntervalMs: number;
  stableMsPerMb: number;
  stableCeilingMs: number;
  waitFloorMs: number;
  waitMsPerMb: number;
};

export const defaultStabilityOptions: StabilityOptions = {
  minStableMs: 2_000,
  maxWaitMs: 30 * 60_000,
  pollIntervalMs: 500,
  stableMsPerMb: 200,
  stableCeilingMs: 60_000,
  waitFloorMs: 60_000,
  waitMsPerMb: 2_000,
};

export type StabilityContext = {
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => number;
};

export const adaptiveWindow = (
  sizeBytes: number,
  options: StabilityOptions,
): { stableMs: number; budgetMs: number } => {
  const sizeMb = Math.max(1, sizeBytes / MiB);
  return {
    stableMs: Math.min(
      Math.max(options.minStableMs, options.stableMsPerMb * sizeMb),
      options.stableCeilingMs,
    ),
    budgetMs: Math.min(
      options.maxWaitMs,
      Math.max(options.waitFloorMs, options.waitMsPerMb * sizeMb),
    ),
  };
};

type Probe = 'unlocked' | 'locked' | 'missing';

// Append without O_CREAT, so a vanished file is not recreated. Writers that
// hold an exclusive handle make this fail.
const probeWriteAccess = (path: string): Promise<Probe> =>
  open(path, constants.O_WRONLY | constants.O_APPEND).then(
    (handle) => handle.close().then(() => 'unlocked' as const),
    (e: unknown) => (errorCode(e) === 'ENOENT' ? 'missing' : 'locked'),
  );

const sizeOf = (path: string): Promise<number | undefined> =>
  stat(path).then(
    (info) => info.size,
    () => undefined,
  );

/**
 * Resolves true once the file size has held still for the adaptive window
 * and the file can be opened for writing. Resolves false on timeout, when the
 * file disappears or cannot be stat'd, for empty files, and when stopped.
 */
export const isStable = async (
  path: string,
  overrides: Partial<StabilityOptions> = {},
  ctx: StabilityContext = {},
): Promise<boolean> => {
  const options = { ...defaultStabilityOptions, ...overrides };
  const logger = ctx.logger ?? silentLogger;
  const now = ctx.now ?? Date.now;
  const pause = ctx.sleep ?? sleep;

  try {
    const initial = await sizeOf(path);
    if (initial === undefined || initial === 0) return false;

    const { stableMs, budgetMs } = adaptiveWindow(initial, options);
    const start = now();
    let lastSize = initial;
    let stableSince: number | null = null;

    for (;;) {
      if (ctx.signal?.aborted) return false;

      const probe = await probeWriteAccess(path);
      if (probe === 'missing') return false;

      if (probe === 'locked') {
        stableSince = null;
        logger.debug(`File appears locked (in use): ${path}`);
      } else {
        const size = await sizeOf(path);
        if (size === undefined) return false;

        if (size !== lastSize) {
          lastSize = size;
          stableSince = null;
        } else {
          stableSince ??= now();
          if (now() - stableSince >= stableMs) return size > 0;
        }
      }

      await pause(options.pollIntervalMs, ctx.signal);
      if (now() - start > budgetMs) {
        logger.warn(`Timeout waiting for stable file: ${path}`);
        return false;
      }
    }
  } catch (e) {
    logger.warn(`Cannot check file stability ${path}: ${toError(e).message}`);
    return false;
  }
};
