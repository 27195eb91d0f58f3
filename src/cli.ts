// src/cli.ts

import { mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Logger, StorageAdapter, WatchSource } from './types';
import type { IngestConfig } from './config';
import type { ReaderSet } from './metadata';
import { loadConfig, parseCliArgs, usage } from './config';
import { createLogger } from './log';
import { toError } from './retry';
import { defaultIgnoreRules } from './filters';
import { createRegistry } from './registry';
import { createStatistics } from './stats';
import { createMetadataResolver, defaultReaders } from './metadata';
import { ffprobeAvailable } from './metadata/video';
import { createCoordinator } from './coordinator';
import { createWorkerPool } from './pool';
import { createWatchDispatcher, dispatchScan, drainInFlight, scanDirectory } from './dispatcher';
import { chokidarWatchSource } from './adapters/chokidar';
import { jsonFileStorage } from './adapters/jsonFile';
import { memoryStorage } from './adapters/memory';
import { sweep } from './journal';
import { tempFileRunners } from './cleanup';

const STATS_INTERVAL_MS = 5 * 60_000;

export const JOURNAL_FILE_NAME = '.media-ingest-journal.json';

export type RunOptions = {
  signal?: AbortSignal;
  watchSource?: WatchSource;
  readers?: ReaderSet;
  logger?: Logger;
  handleSignals?: boolean;
};

const isDirectory = (path: string): Promise<boolean> =>
  stat(path).then(
    (info) => info.isDirectory(),
    () => false,
  );

const prepareRoots = async (config: IngestConfig, logger: Logger): Promise<boolean> => {
  if (!(await isDirectory(config.watchRoot))) {
    logger.error(`Watch directory does not exist: ${config.watchRoot}`);
    return false;
  }
  if (config.dryRun) {
    if (!(await isDirectory(config.archiveRoot))) {
      logger.warn(`Archive root ${config.archiveRoot} does not exist; dry-run will not create it`);
    }
    return true;
  }
  try {
    await mkdir(config.archiveRoot, { recursive: true });
    return true;
  } catch (e) {
    logger.error(`Cannot create archive root ${config.archiveRoot}: ${toError(e).message}`);
    return false;
  }
};

const openJournal = (config: IngestConfig, logger: Logger): StorageAdapter =>
  config.dryRun
    ? memoryStorage()
    : jsonFileStorage(config.journalPath ?? join(config.archiveRoot, JOURNAL_FILE_NAME), logger);

const stopped = (signal: AbortSignal): Promise<void> =>
  signal.aborted
    ? Promise.resolve()
    : new Promise((done) => signal.addEventListener('abort', () => done(), { once: true }));

const wireStop = (controller: AbortController, options: RunOptions, logger: Logger): (() => void) => {
  const forward = (): void => controller.abort();
  options.signal?.addEventListener('abort', forward, { once: true });
  if (options.signal?.aborted) controller.abort();

  const onSignal = (name: string) => (): void => {
    logger.info(`Received ${name}, shutting down...`);
    controller.abort();
  };
  const onInt = onSignal('SIGINT');
  const onTerm = onSignal('SIGTERM');
  if (options.handleSignals ?? true) {
    process.once('SIGINT', onInt);
    process.once('SIGTERM', onTerm);
  }

  return () => {
    options.signal?.removeEventListener('abort', forward);
    process.off('SIGINT', onInt);
    process.off('SIGTERM', onTerm);
  };
};

/**
 * Runs the ingester until stopped. Resolves with the process exit code:
 * 0 after a clean shutdown or `--help`, 1 for bad arguments or unusable
 * directories.
 */
export const run = async (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  options: RunOptions = {},
): Promise<number> => {
  const args = parseCliArgs(argv);
  if (args.isErr()) {
    console.error(`❌ ${args.error.message}\n${usage}`);
    return 1;
  }
  if (args.value.help) {
    console.log(usage);
    return 0;
  }

  const loaded = loadConfig(args.value, env);
  if (loaded.isErr()) {
    console.error(`❌ ${loaded.error.message}`);
    return 1;
  }

  const config: IngestConfig = {
    ...loaded.value,
    watchRoot: resolve(loaded.value.watchRoot),
    archiveRoot: resolve(loaded.value.archiveRoot),
  };
  const logger = options.logger ?? createLogger({ level: config.logLevel, file: config.logFile });

  if (!(await prepareRoots(config, logger))) return 1;

  logger.info(
    `Starting media ingest: watch=${config.watchRoot} target=${config.archiveRoot} ` +
      `workers=${config.workers} dryRun=${config.dryRun} checksum=${config.checksumOnDuplicate} ` +
      `buffer=${config.bufferSizeMb}MB`,
  );
  if (!(await ffprobeAvailable())) {
    logger.warn('ffprobe not found; video files will be sorted by file date');
  }

  const controller = new AbortController();
  const { signal } = controller;
  const unwire = wireStop(controller, options, logger);

  const storage = openJournal(config, logger);
  const recovered = await sweep(storage, logger)(tempFileRunners)();
  if (recovered.cleaned > 0) {
    logger.warn(`Recovered ${recovered.cleaned} interrupted moves: ${recovered.details.join(', ')}`);
  }

  const registry = createRegistry();
  const stats = createStatistics();
  const coordinator = createCoordinator({
    settings: {
      watchRoot: config.watchRoot,
      archiveRoot: config.archiveRoot,
      dryRun: config.dryRun,
      checksumOnDuplicate: config.checksumOnDuplicate,
      bufferSize: config.bufferSizeMb * 1024 * 1024,
    },
    registry,
    metadata: createMetadataResolver(options.readers ?? defaultReaders(), logger),
    storage,
    stats,
    logger,
    signal,
    rules: defaultIgnoreRules,
  });
  const deps = { pool: createWorkerPool(config.workers), process: coordinator.process, logger, signal };

  // The watcher starts before the scan so nothing created meanwhile is
  // missed; the registry cooldown absorbs the overlap.
  const watcher = createWatchDispatcher(
    deps,
    options.watchSource ?? chokidarWatchSource(config.watchRoot, defaultIgnoreRules),
    { quietDelayMs: config.quietDelayMs },
  );

  const files = await scanDirectory(config.watchRoot, defaultIgnoreRules, signal, logger);
  await dispatchScan(deps)(files);
  logger.info(stats.summary());

  const ticker = setInterval(() => logger.info(stats.summary()), STATS_INTERVAL_MS);
  ticker.unref();

  logger.info(`Watching ${config.watchRoot} for new files`);
  await stopped(signal);

  clearInterval(ticker);
  await watcher.close();
  await drainInFlight(registry, logger);
  unwire();
  logger.info(`Shutdown complete. ${stats.summary()}`);
  return 0;
};
