// src/cleanup.spec.ts

import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { executeAllCleanups, REMOVE_TEMP, tempFileRunners } from './cleanup';
import { collectingLogger } from './log';
import type { CleanupAction, CleanupRegistry } from './types';

const action = (id: string, type: string, params: Record<string, unknown> = {}): CleanupAction => ({
    id,
    type,
    params,
    registeredAt: Date.now(),
});

describe('executeAllCleanups', () => {
    test('executes all cleanup actions', async () => {
        const executed: string[] = [];
        const runners: CleanupRegistry = {
            remove_temp: async (params) => {
                executed.push(`remove_temp:${String(params.path)}`);
            },
            release_lock: async (params) => {
                executed.push(`release_lock:${String(params.name)}`);
            },
        };

        await executeAllCleanups(runners, collectingLogger())([
            action('1', 'remove_temp', { path: '/tmp/file1' }),
            action('2', 'release_lock', { name: 'archive' }),
        ]);

        expect(executed).toEqual(['remove_temp:/tmp/file1', 'release_lock:archive']);
    });

    test('handles empty cleanup list', async () => {
        const runners: CleanupRegistry = {
            remove_temp: async () => {
                throw new Error('Should not be called');
            },
        };

        await expect(executeAllCleanups(runners, collectingLogger())([])).resolves.toBeUndefined();
    });

    test('continues execution if one cleanup fails', async () => {
        const executed: string[] = [];
        const runners: CleanupRegistry = {
            failing_cleanup: async () => {
                throw new Error('Cleanup failed');
            },
            succeeding_cleanup: async () => {
                executed.push('success');
            },
        };

        await executeAllCleanups(runners, collectingLogger())([
            action('1', 'failing_cleanup'),
            action('2', 'succeeding_cleanup'),
        ]);

        expect(executed).toEqual(['success']);
    });

    test('warns if cleanup runner not registered', async () => {
        const logger = collectingLogger();

        await executeAllCleanups({}, logger)([action('1', 'nonexistent_cleanup')]);

        expect(logger.records).toEqual([
            { level: 'warn', message: '⚠️ [nonexistent_cleanup] no cleanup runner registered' },
        ]);
    });

    test('logs errors for failed cleanups', async () => {
        const logger = collectingLogger();
        const runners: CleanupRegistry = {
            failing: async () => {
                throw new Error('disk unavailable');
            },
        };

        await executeAllCleanups(runners, logger)([action('1', 'failing')]);

        expect(logger.records).toEqual([
            { level: 'error', message: '⚠️ [failing] cleanup failed: Error: disk unavailable' },
        ]);
    });

    test('passes correct params to cleanup runner', async () => {
        const received: Array<Record<string, unknown>> = [];
        const runners: CleanupRegistry = {
            cleanup_with_params: async (params) => {
                received.push(params);
            },
        };

        await executeAllCleanups(runners, collectingLogger())([
            action('1', 'cleanup_with_params', { id: '123', path: '/tmp', nested: { key: 'value' } }),
        ]);

        expect(received).toEqual([{ id: '123', path: '/tmp', nested: { key: 'value' } }]);
    });

    test('executes cleanups in parallel', async () => {
        const executionOrder: number[] = [];
        const runners: CleanupRegistry = {
            slow: async () => {
                await new Promise((resolve) => setTimeout(resolve, 50));
                executionOrder.push(1);
            },
            fast: async () => {
                await new Promise((resolve) => setTimeout(resolve, 10));
                executionOrder.push(2);
            },
        };

        await executeAllCleanups(runners, collectingLogger())([action('1', 'slow'), action('2', 'fast')]);

        expect(executionOrder).toEqual([2, 1]);
    });
});

describe('tempFileRunners', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'cleanup-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('removes the recorded temp file', async () => {
        const temp = join(dir, 'photo.123.tmp.jpg');
        await writeFile(temp, 'partial');

        await tempFileRunners[REMOVE_TEMP]({ path: temp });

        expect(await readdir(dir)).toEqual([]);
    });

    test('succeeds when the temp file is already gone', async () => {
        await expect(tempFileRunners[REMOVE_TEMP]({ path: join(dir, 'gone.tmp') })).resolves.toBeUndefined();
    });

    test('rejects without a path', async () => {
        await expect(tempFileRunners[REMOVE_TEMP]({})).rejects.toThrow('missing temp path');
    });
});
