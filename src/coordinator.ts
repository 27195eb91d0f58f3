// src/coordinator.ts

import { mkdir } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import type { ResultAsync } from 'neverthrow';
import type {
  IgnoreRules,
  Logger,
  MetadataResolver,
  MoveOutcome,
  ProcessResult,
  StorageAdapter,
} from './types';
import type { ProcessingRegistry } from './registry';
import type { Statistics } from './stats';
import type { FileOps, MoverDeps, TempJournal } from './mover';
import type { RetryPolicy, Sleep } from './retry';
import type { StabilityOptions } from './stability';
import { defaultIgnoreRules, extensionOf, ignoreReason, QUARANTINE_DIR_NAME } from './filters';
import { isStable } from './stability';
import { bucketDir, resolveDestinationBucket, uniqueDestination } from './classify';
import { isDuplicate } from './duplicate';
import { atomicMove, fallbackCopy, unlinkWithRetries } from './mover';
import { pruneEmptyAncestors } from './reaper';
import { defaultRetryPolicy, sleep, toError } from './retry';
import { afterSafe, beforeRisky, complete, fail, load } from './journal';
import { REMOVE_TEMP, tempFileRunners } from './cleanup';
import { logDuplicate, logFailed, logMoved, logProcessing } from './log';

export type PipelineSettings = {
  watchRoot: string;
  archiveRoot: string;
  dryRun: boolean;
  checksumOnDuplicate: boolean;
  bufferSize: number;
};

export type CoordinatorDeps = {
  settings: PipelineSettings;
  registry: ProcessingRegistry;
  metadata: MetadataResolver;
  storage: StorageAdapter;
  stats: Statistics;
  logger: Logger;
  signal?: AbortSignal;
  rules?: IgnoreRules;
  stability?: Partial<StabilityOptions>;
  stabilityAttempts?: number;
  stabilityRetryDelayMs?: number;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  random?: () => number;
  ops?: FileOps;
  now?: () => number;
};

export type Coordinator = {
  process: (path: string) => Promise<ProcessResult>;
};

const failed = (source: string, reason: string): MoveOutcome => ({ kind: 'failed', source, reason });

const waitUntilStable = async (deps: CoordinatorDeps, path: string): Promise<'stable' | 'unstable' | 'cancelled'> => {
  const attempts = deps.stabilityAttempts ?? 10;
  const pause = deps.sleep ?? sleep;

  for (let n = 1; n <= attempts; n += 1) {
    if (deps.signal?.aborted) return 'cancelled';
    const ready = await isStable(path, deps.stability, {
      logger: deps.logger,
      signal: deps.signal,
      sleep: deps.sleep,
      now: deps.now,
    });
    if (ready) return 'stable';
    if (n < attempts) await pause(deps.stabilityRetryDelayMs ?? 1_000, deps.signal);
  }
  return deps.signal?.aborted ? 'cancelled' : 'unstable';
};

// Each move gets a journal record so a temp file orphaned by a crash is
// removed on the next start.
const journaled = async (
  deps: CoordinatorDeps,
  source: string,
  run: (journal: TempJournal) => Promise<MoveOutcome>,
): Promise<MoveOutcome> => {
  const cp = await load(deps.storage, deps.logger)(tempFileRunners)(source);
  const journal: TempJournal = {
    track: (tempPath) =>
      beforeRisky(deps.storage, deps.logger)(cp)(REMOVE_TEMP)({ path: tempPath }).then(() => undefined),
    untrack: () => afterSafe(deps.storage, deps.logger)(cp)(REMOVE_TEMP).then(() => undefined),
  };

  const outcome = await run(journal);
  // The file is already where the outcome says; a journal write failing now
  // only leaves a stale record for the next sweep.
  await (outcome.kind === 'failed' ? fail(deps.storage)(cp) : complete(deps.storage)(cp)).catch((e: unknown) => {
    deps.logger.warn(`Cannot update move journal for ${basename(source)}: ${toError(e).message}`);
  });
  return outcome;
};

const toOutcome = (
  result: ResultAsync<void, Error>,
  source: string,
  destination: string,
): Promise<MoveOutcome> =>
  result.match(
    (): MoveOutcome => ({ kind: 'moved', source, destination }),
    (err): MoveOutcome => failed(source, err.message),
  );

const moverDeps = (deps: CoordinatorDeps, journal?: TempJournal): MoverDeps => ({
  logger: deps.logger,
  retry: {
    policy: deps.retryPolicy ?? defaultRetryPolicy,
    logger: deps.logger,
    signal: deps.signal,
    sleep: deps.sleep,
    random: deps.random,
  },
  bufferSize: deps.settings.bufferSize,
  quarantineDir: join(deps.settings.watchRoot, QUARANTINE_DIR_NAME),
  ops: deps.ops,
  journal,
  now: deps.now,
  reserveName: deps.registry.reserveName,
  releaseName: deps.registry.releaseName,
});

const relocate = (deps: CoordinatorDeps, source: string, destination: string) =>
  (journal?: TempJournal): Promise<MoveOutcome> => {
    const mover = moverDeps(deps, journal);
    const result = atomicMove(mover)(source, destination, deps.settings.dryRun).orElse((err) => {
      deps.logger.warn(`Atomic move failed for ${basename(source)} (${err.message}), trying fallback copy`);
      return fallbackCopy(mover)(source, destination);
    });
    return toOutcome(result, source, destination);
  };

const removeDuplicate = async (deps: CoordinatorDeps, source: string, destination: string): Promise<MoveOutcome> => {
  logDuplicate(deps.logger, basename(source))(source);
  if (deps.settings.dryRun) return { kind: 'duplicate', source, destination };

  const removed = await unlinkWithRetries(moverDeps(deps))(source);
  if (removed.isErr()) deps.logger.warn(`Could not remove duplicate source ${source}: ${removed.error.message}`);
  return { kind: 'duplicate', source, destination };
};

const runPipeline = async (deps: CoordinatorDeps, source: string): Promise<MoveOutcome> => {
  const { settings, logger } = deps;

  const readiness = await waitUntilStable(deps, source);
  if (readiness === 'cancelled') return failed(source, 'cancelled');
  if (readiness === 'unstable') {
    logger.warn(`File not stable after ${deps.stabilityAttempts ?? 10} attempts: ${basename(source)}`);
    return failed(source, 'unstable');
  }

  const timestamp = await deps.metadata.resolve(source);
  const bucket = await resolveDestinationBucket(source, timestamp, logger);
  const destinationDir = bucketDir(settings.archiveRoot, bucket);
  if (!settings.dryRun) await mkdir(destinationDir, { recursive: true });

  if (await isDuplicate(source, destinationDir, { checksum: settings.checksumOnDuplicate, logger })) {
    const outcome = await removeDuplicate(deps, source, join(destinationDir, basename(source)));
    if (!settings.dryRun) await prune(deps, source);
    return outcome;
  }

  const now = new Date((deps.now ?? Date.now)());
  const destination = await uniqueDestination(destinationDir, basename(source), now, deps.registry.reserveName);
  const move = relocate(deps, source, destination);
  let outcome: MoveOutcome;
  try {
    outcome = settings.dryRun ? await move() : await journaled(deps, source, move);
  } finally {
    deps.registry.releaseName(destination);
  }

  if (!settings.dryRun) await prune(deps, source);
  return outcome;
};

const prune = (deps: CoordinatorDeps, source: string): Promise<void> =>
  pruneEmptyAncestors(dirname(source), {
    watchRoot: deps.settings.watchRoot,
    rules: deps.rules ?? defaultIgnoreRules,
    logger: deps.logger,
  });

const record = (deps: CoordinatorDeps, outcome: MoveOutcome): MoveOutcome => {
  const name = basename(outcome.source);
  switch (outcome.kind) {
    case 'moved':
      deps.stats.moved();
      return deps.settings.dryRun ? outcome : logMoved(deps.logger, name, outcome.destination)(outcome);
    case 'duplicate':
      deps.stats.skipped();
      return outcome;
    case 'failed':
      deps.stats.error();
      return logFailed(deps.logger, name, outcome.reason)(outcome);
  }
};

export const createCoordinator = (deps: CoordinatorDeps): Coordinator => ({
  process: async (path) => {
    const source = resolve(path);
    const rules = deps.rules ?? defaultIgnoreRules;

    const reason = await ignoreReason(source, deps.settings.watchRoot, rules);
    if (reason !== undefined) {
      deps.logger.debug(`Skipping ${basename(source)}: ${reason}`);
      return { kind: 'ignored', source, reason };
    }

    const claim = deps.registry.claim(source);
    if (claim !== 'claimed') {
      deps.logger.debug(`Skipping ${basename(source)}: ${claim}`);
      return { kind: 'skipped', source, reason: claim };
    }

    deps.stats.processed(extensionOf(source));
    logProcessing(deps.logger, basename(source))(source);

    try {
      return record(deps, await runPipeline(deps, source));
    } catch (e) {
      const err = toError(e);
      deps.logger.debug(`Traceback for ${source}: ${err.stack ?? err.message}`);
      return record(deps, failed(source, err.message));
    } finally {
      deps.registry.release(source);
    }
  },
});
