// src/reaper.ts

import { readdir, rmdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { IgnoreRules, Logger } from './types';
import { isIgnoredDir, isInside } from './filters';
import { toError } from './retry';

export type ReaperOptions = {
  watchRoot: string;
  rules: IgnoreRules;
  logger: Logger;
};

const subdirectories = (dir: string, rules: IgnoreRules): Promise<string[]> =>
  readdir(dir, { withFileTypes: true }).then(
    (entries) =>
      entries
        .filter((entry) => entry.isDirectory() && !isIgnoredDir(entry.name, rules))
        .map((entry) => join(dir, entry.name)),
    () => [],
  );

const removeIfEmpty = async (dir: string, logger: Logger): Promise<boolean> => {
  try {
    const entries = await readdir(dir);
    if (entries.length > 0) return false;
    await rmdir(dir);
    logger.info(`Removed empty directory: ${dir}`);
    return true;
  } catch (e) {
    logger.debug(`Cannot clean directory ${dir}: ${toError(e).message}`);
    return false;
  }
};

/**
 * Removes every directory under `startDir` (inclusive) that ends up empty,
 * children first, then climbs towards the watch root removing emptied
 * parents. Never touches the watch root or anything outside it.
 */
export const pruneEmptyAncestors = async (
  startDir: string,
  { watchRoot, rules, logger }: ReaperOptions,
): Promise<void> => {
  const root = resolve(watchRoot);
  const start = resolve(startDir);
  if (!isInside(start, root)) return;

  const stack: Array<{ dir: string; expanded: boolean }> = [{ dir: start, expanded: false }];
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;

    if (top.expanded) {
      await removeIfEmpty(top.dir, logger);
      continue;
    }

    stack.push({ dir: top.dir, expanded: true });
    for (const child of await subdirectories(top.dir, rules)) {
      stack.push({ dir: child, expanded: false });
    }
  }

  for (let dir = dirname(start); isInside(dir, root); dir = dirname(dir)) {
    if (!(await removeIfEmpty(dir, logger))) break;
  }
};
