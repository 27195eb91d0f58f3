// src/types.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = Record<LogLevel, (message: string) => void>;

export type CleanupAction = {
  id: string;
  type: string;
  params: Record<string, unknown>;
  registeredAt: number;
};

export type CheckpointStatus = 'running' | 'completed' | 'failed';

// One record per source path with a move in progress. Anything left in
// `cleanup` when the process starts again belongs to a crashed run.
export type Checkpoint = {
  fileId: string;
  startedAt: number;
  completedAt: number | null;
  status: CheckpointStatus;
  cleanup: CleanupAction[];
};

export type CleanupRunner = (
  params: Record<string, unknown>,
) => Promise<void>;

export type CleanupRegistry = Record<string, CleanupRunner>;

export type CleanupSpec = {
  type: string;
  params: Record<string, unknown>;
};

export type StorageAdapter = {
  fetchOne: (fileId: string) => Promise<Checkpoint | null>;
  fetchAll: () => Promise<Checkpoint[]>;
  upsert: (cp: Checkpoint) => Promise<Checkpoint>;
  deleteOne: (fileId: string) => Promise<void>;
};

export type IngestTask = {
  path: string;
  discoveredAt: number;
  source: 'scan' | 'watch';
};

export type DestinationBucket = {
  year: string;
  month: string;
  day: string;
};

export type MoveOutcome =
  | { kind: 'moved'; source: string; destination: string }
  | { kind: 'duplicate'; source: string; destination: string }
  | { kind: 'failed'; source: string; reason: string };

export type SkipReason = 'in-flight' | 'cooling-down';

export type ProcessResult =
  | MoveOutcome
  | { kind: 'ignored'; source: string; reason: string }
  | { kind: 'skipped'; source: string; reason: SkipReason };

export type MediaCategory = 'image' | 'raw' | 'video' | 'none';

export type MetadataReader = (path: string) => Promise<Date | undefined>;

export type MetadataResolver = {
  resolve: (path: string) => Promise<Date | undefined>;
};

export type WatchEvent = {
  path: string;
  kind: 'created' | 'moved';
};

export type WatchSource = {
  subscribe: (
    onEvent: (event: WatchEvent) => void,
    onError: (error: Error) => void,
  ) => () => Promise<void>;
};

export type IgnoreRules = {
  ignoredExtensions: ReadonlySet<string>;
  ignoredPrefixes: readonly string[];
  ignoredDirectories: ReadonlySet<string>;
  allowedExtensions: ReadonlySet<string>;
};
