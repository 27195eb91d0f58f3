// Pipeline (public)
export { createCoordinator } from './coordinator';
export { createRegistry } from './registry';
export { createWorkerPool } from './pool';
export { scanDirectory, dispatchScan, createWatchDispatcher, drainInFlight } from './dispatcher';
export { isStable, adaptiveWindow, defaultStabilityOptions } from './stability';
export { atomicMove, fallbackCopy, unlinkWithRetries, quarantine, nodeFileOps } from './mover';
export { withRetry, backoffDelay, isRetryable, defaultRetryPolicy } from './retry';
export { resolveDestinationBucket, bucketDir, uniqueDestination } from './classify';
export { isDuplicate } from './duplicate';
export { pruneEmptyAncestors } from './reaper';
export { ignoreReason, defaultIgnoreRules, categoryOf } from './filters';
export { createMetadataResolver, defaultReaders } from './metadata';
export { createStatistics } from './stats';

// Move journal
export { load, beforeRisky, afterSafe, complete, fail, sweep } from './journal';
export { tempFileRunners, REMOVE_TEMP } from './cleanup';

// Config and logging
export { configSchema, loadConfig, parseCliArgs } from './config';
export { createLogger, silentLogger } from './log';
export { run } from './cli';

// Types (public)
export type {
  Checkpoint,
  CheckpointStatus,
  CleanupAction,
  CleanupRegistry,
  DestinationBucket,
  IgnoreRules,
  IngestTask,
  Logger,
  MetadataResolver,
  MoveOutcome,
  ProcessResult,
  StorageAdapter,
  WatchEvent,
  WatchSource,
} from './types';
export type { CoordinatorDeps, PipelineSettings } from './coordinator';
export type { IngestConfig } from './config';

// Adapters
export { jsonFileStorage } from './adapters/jsonFile';
export { memoryStorage } from './adapters/memory';
export { chokidarWatchSource } from './adapters/chokidar';
