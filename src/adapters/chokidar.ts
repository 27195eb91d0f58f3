// src/adapters/chokidar.ts

import { join } from 'node:path';
import { watch } from 'chokidar';
import type { IgnoreRules, WatchSource } from '../types';
import { hasIgnoredDirectory } from '../filters';
import { toError } from '../retry';

// A rename into the tree arrives as 'add' at the new path, so 'created'
// covers moves too. `ignored` sees directories and files alike; each is
// checked as if it were a directory.
export const chokidarWatchSource = (root: string, rules: IgnoreRules): WatchSource => ({
  subscribe: (onEvent, onError) => {
    const watcher = watch(root, {
      ignoreInitial: true,
      persistent: true,
      ignored: (path: string) => hasIgnoredDirectory(join(path, '_'), root, rules),
    });

    watcher.on('add', (path: string) => onEvent({ path, kind: 'created' }));
    watcher.on('error', (e: unknown) => onError(toError(e)));

    return () => watcher.close();
  },
});
