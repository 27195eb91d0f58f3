// src/dispatcher.ts

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { IgnoreRules, IngestTask, Logger, ProcessResult, WatchEvent, WatchSource } from './types';
import type { WorkerPool } from './pool';
import type { ProcessingRegistry } from './registry';
import type { Sleep } from './retry';
import { isIgnoredDir, isIgnoredName } from './filters';
import { sleep, toError } from './retry';

export type DispatchDeps = {
  pool: WorkerPool;
  process: (path: string) => Promise<ProcessResult>;
  logger: Logger;
  signal?: AbortSignal;
  now?: () => number;
};

/**
 * Lists every candidate file below `root`, skipping ignored directories and
 * names. Walks with an explicit stack; unreadable directories are logged and
 * skipped. Stops early, returning what it has, once `signal` aborts.
 */
export const scanDirectory = async (
  root: string,
  rules: IgnoreRules,
  signal?: AbortSignal,
  logger?: Logger,
): Promise<string[]> => {
  const files: string[] = [];
  const stack = [root];

  while (stack.length > 0) {
    if (signal?.aborted) break;
    const dir = stack.pop();
    if (dir === undefined) break;

    try {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        if (signal?.aborted) break;
        const path = join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!isIgnoredDir(entry.name, rules)) stack.push(path);
        } else if (entry.isFile() && !isIgnoredName(entry.name, rules)) {
          files.push(path);
        }
      }
    } catch (e) {
      logger?.warn(`Cannot read directory ${dir}: ${toError(e).message}`);
    }
  }
  return files.sort();
};

const toTask = (path: string, source: IngestTask['source'], now: () => number): IngestTask => ({
  path,
  discoveredAt: now(),
  source,
});

const run = (deps: DispatchDeps, task: IngestTask): Promise<ProcessResult> =>
  deps.pool.submit(() => deps.process(task.path));

// Submits every scanned file and resolves once all of them have finished.
export const dispatchScan =
  (deps: DispatchDeps) =>
    async (paths: string[]): Promise<ProcessResult[]> => {
      const now = deps.now ?? Date.now;
      const total = paths.length;
      const step = Math.max(1, Math.floor(total / 10));
      let done = 0;

      deps.logger.info(`Found ${total} files in initial scan`);

      const jobs: Array<Promise<ProcessResult>> = [];
      for (const path of paths) {
        if (deps.signal?.aborted) break;
        jobs.push(
          run(deps, toTask(path, 'scan', now)).then((result) => {
            done += 1;
            if (done % step === 0 || done === total) {
              deps.logger.info(`Initial scan progress: ${done}/${total} (${Math.round((done / total) * 100)}%)`);
            }
            return result;
          }),
        );
      }
      return Promise.all(jobs);
    };

export type WatchDispatcher = {
  close: () => Promise<void>;
  pendingCount: () => number;
};

export type WatchDispatchOptions = {
  quietDelayMs?: number;
};

/**
 * Feeds watch events into the pool. Repeated events for one path restart its
 * quiet timer, so a file still being written is submitted once it goes quiet.
 */
export const createWatchDispatcher = (
  deps: DispatchDeps,
  source: WatchSource,
  { quietDelayMs = 5_000 }: WatchDispatchOptions = {},
): WatchDispatcher => {
  const now = deps.now ?? Date.now;
  const timers = new Map<string, NodeJS.Timeout>();

  const schedule = (event: WatchEvent): void => {
    if (deps.signal?.aborted) return;

    const existing = timers.get(event.path);
    if (existing) clearTimeout(existing);

    timers.set(
      event.path,
      setTimeout(() => {
        timers.delete(event.path);
        if (deps.signal?.aborted) return;
        run(deps, toTask(event.path, 'watch', now)).catch((e: unknown) => {
          deps.logger.error(`Watch job failed for ${event.path}: ${toError(e).message}`);
        });
      }, quietDelayMs),
    );
  };

  const unsubscribe = source.subscribe(schedule, (err) => {
    deps.logger.error(`Watcher error: ${err.message}`);
  });

  return {
    close: () => {
      timers.forEach((timer) => clearTimeout(timer));
      timers.clear();
      return unsubscribe();
    },
    pendingCount: () => timers.size,
  };
};

export type DrainOptions = {
  timeoutMs?: number;
  intervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
};

// Resolves true once nothing is in flight, false if the timeout passes first.
export const drainInFlight = async (
  registry: ProcessingRegistry,
  logger: Logger,
  { timeoutMs = 10_000, intervalMs = 1_000, sleep: pause = sleep, now = Date.now }: DrainOptions = {},
): Promise<boolean> => {
  const deadline = now() + timeoutMs;
  while (registry.inFlightCount() > 0) {
    if (now() >= deadline) {
      logger.warn(`Shutdown timeout with ${registry.inFlightCount()} files still in flight`);
      return false;
    }
    logger.info(`Waiting for ${registry.inFlightCount()} in-flight files...`);
    await pause(intervalMs);
  }
  return true;
};
