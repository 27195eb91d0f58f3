// src/checkpoint.ts

import { randomUUID } from 'node:crypto';
import type {
  Checkpoint,
  CheckpointStatus,
  CleanupSpec,
} from './types';

export const emptyCheckpoint = (fileId: string): Checkpoint => ({
  fileId,
  startedAt: Date.now(),
  completedAt: null,
  status: 'running',
  cleanup: [],
});

export const withCleanup = (
  cp: Checkpoint,
  action: CleanupSpec,
): Checkpoint => ({
  ...cp,
  cleanup: [
    ...cp.cleanup,
    {
      ...action,
      id: `${action.type}-${randomUUID()}`,
      registeredAt: Date.now(),
    },
  ],
});

export const withoutCleanup = (cp: Checkpoint, type: string): Checkpoint => ({
  ...cp,
  cleanup: cp.cleanup.filter((c) => c.type !== type),
});

export const withStatus = (
  cp: Checkpoint,
  status: CheckpointStatus,
): Checkpoint => ({
  ...cp,
  status,
  completedAt: status === 'running' ? null : Date.now(),
});

export const restarted = (cp: Checkpoint): Checkpoint => ({
  ...cp,
  cleanup: [],
  startedAt: Date.now(),
  completedAt: null,
  status: 'running',
});
