// src/stats.ts

import { pad } from './classify';

export type StatsSnapshot = {
  processed: number;
  moved: number;
  skipped: number;
  errors: number;
  byExtension: Record<string, number>;
  uptimeMs: number;
};

export type Statistics = {
  processed: (ext: string) => void;
  moved: () => void;
  skipped: () => void;
  error: () => void;
  snapshot: () => StatsSnapshot;
  summary: () => string;
};

export const formatUptime = (ms: number): string => {
  const total = Math.floor(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(total % 60)}`;
};

export const createStatistics = (now: () => number = Date.now): Statistics => {
  const startedAt = now();
  const counts = { processed: 0, moved: 0, skipped: 0, errors: 0 };
  const byExtension = new Map<string, number>();

  const snapshot = (): StatsSnapshot => ({
    ...counts,
    byExtension: Object.fromEntries(byExtension),
    uptimeMs: now() - startedAt,
  });

  return {
    processed: (ext) => {
      counts.processed += 1;
      byExtension.set(ext, (byExtension.get(ext) ?? 0) + 1);
    },
    moved: () => {
      counts.moved += 1;
    },
    skipped: () => {
      counts.skipped += 1;
    },
    error: () => {
      counts.errors += 1;
    },
    snapshot,
    summary: () => {
      const s = snapshot();
      const top = Array.from(byExtension.entries())
        .sort((a, b) => b[1] - a[1])
        .slice(0, 5)
        .map(([ext, count]) => `${ext}: ${count}`)
        .join(', ');
      return (
        `📊 processed ${s.processed} | moved ${s.moved} | skipped ${s.skipped} | ` +
        `errors ${s.errors} | uptime ${formatUptime(s.uptimeMs)}` +
        (top ? ` | by type ${top}` : '')
      );
    },
  };
};
