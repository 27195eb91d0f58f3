// src/pool.spec.ts

import { describe, expect, test } from 'vitest';
import { createWorkerPool } from './pool';

const deferred = () => {
    let release: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
        release = resolve;
    });
    return { promise, release };
};

describe('createWorkerPool', () => {
    test('rejects a size below one', () => {
        expect(() => createWorkerPool(0)).toThrow(RangeError);
    });

    test('runs at most size jobs at once', async () => {
        const pool = createWorkerPool(2);
        const gates = [deferred(), deferred(), deferred()];
        let running = 0;
        let peak = 0;

        const jobs = gates.map((gate, n) =>
            pool.submit(async () => {
                running += 1;
                peak = Math.max(peak, running);
                await gate.promise;
                running -= 1;
                return n;
            }),
        );
        await Promise.resolve();
        await Promise.resolve();

        expect(pool.active()).toBe(2);
        expect(pool.pending()).toBe(1);

        gates.forEach((gate) => gate.release());

        expect(await Promise.all(jobs)).toEqual([0, 1, 2]);
        expect(peak).toBe(2);
    });

    test('starts queued jobs in submission order', async () => {
        const pool = createWorkerPool(1);
        const order: number[] = [];

        await Promise.all([1, 2, 3].map((n) => pool.submit(async () => order.push(n))));

        expect(order).toEqual([1, 2, 3]);
    });

    test('a failing job rejects only its own promise', async () => {
        const pool = createWorkerPool(1);

        const failing = pool.submit(async () => {
            throw new Error('boom');
        });
        const passing = pool.submit(async () => 'ok');

        await expect(failing).rejects.toThrow('boom');
        await expect(passing).resolves.toBe('ok');
    });

    test('idle resolves once everything has finished', async () => {
        const pool = createWorkerPool(2);
        const gate = deferred();
        let finished = false;
        void pool.submit(async () => {
            await gate.promise;
            finished = true;
        });

        const idle = pool.idle();
        gate.release();
        await idle;

        expect(finished).toBe(true);
        expect(pool.active()).toBe(0);
    });

    test('idle resolves immediately when nothing runs', async () => {
        await expect(createWorkerPool(1).idle()).resolves.toBeUndefined();
    });
});
