// src/config.spec.ts

import { describe, expect, test } from 'vitest';
import { loadConfig, parseCliArgs } from './config';

describe('parseCliArgs', () => {
    test('reads flags', () => {
        const values = parseCliArgs([
            '--watch', '/staging',
            '-t', '/archive',
            '--workers', '6',
            '--dry-run',
            '--no-checksum-dups',
        ])._unsafeUnwrap();

        expect(values).toMatchObject({
            watch: '/staging',
            target: '/archive',
            workers: '6',
            'dry-run': true,
            'no-checksum-dups': true,
        });
    });

    test('rejects unknown flags', () => {
        expect(parseCliArgs(['--bogus']).isErr()).toBe(true);
    });
});

describe('loadConfig', () => {
    test('applies defaults', () => {
        const config = loadConfig({ watch: '/staging', target: '/archive' }, {})._unsafeUnwrap();

        expect(config).toEqual({
            watchRoot: '/staging',
            archiveRoot: '/archive',
            workers: 4,
            dryRun: false,
            checksumOnDuplicate: true,
            bufferSizeMb: 8,
            logLevel: 'info',
            quietDelayMs: 5_000,
        });
    });

    test('falls back to environment variables', () => {
        const config = loadConfig(
            {},
            {
                MEDIA_INGEST_WATCH: '/env/staging',
                MEDIA_INGEST_TARGET: '/env/archive',
                MEDIA_INGEST_WORKERS: '2',
                MEDIA_INGEST_DRY_RUN: 'true',
                MEDIA_INGEST_CHECKSUM_DUPS: '0',
                MEDIA_INGEST_LOG_LEVEL: 'DEBUG',
            },
        )._unsafeUnwrap();

        expect(config).toMatchObject({
            watchRoot: '/env/staging',
            archiveRoot: '/env/archive',
            workers: 2,
            dryRun: true,
            checksumOnDuplicate: false,
            logLevel: 'debug',
        });
    });

    test('flags win over the environment', () => {
        const config = loadConfig(
            { watch: '/flag', target: '/archive', workers: '3' },
            { MEDIA_INGEST_WATCH: '/env', MEDIA_INGEST_WORKERS: '9' },
        )._unsafeUnwrap();

        expect(config.watchRoot).toBe('/flag');
        expect(config.workers).toBe(3);
    });

    test('treats empty values as unset', () => {
        const config = loadConfig({ watch: '/staging', target: '/archive', log: '' }, { MEDIA_INGEST_LOG: '  ' })._unsafeUnwrap();

        expect(config.logFile).toBeUndefined();
    });

    test('clamps the buffer size to at least one megabyte', () => {
        expect(loadConfig({ watch: '/s', target: '/a', 'buffer-size-mb': '0' }, {})._unsafeUnwrap().bufferSizeMb).toBe(1);
        expect(loadConfig({ watch: '/s', target: '/a', 'buffer-size-mb': '16' }, {})._unsafeUnwrap().bufferSizeMb).toBe(16);
    });

    test('requires both roots', () => {
        const error = loadConfig({ target: '/archive' }, {})._unsafeUnwrapErr();

        expect(error.message).toBe('Invalid configuration: watchRoot: watch root is required (--watch)');
    });

    test('rejects a non-numeric worker count', () => {
        expect(loadConfig({ watch: '/s', target: '/a', workers: 'many' }, {}).isErr()).toBe(true);
    });

    test('rejects zero workers', () => {
        expect(loadConfig({ watch: '/s', target: '/a', workers: '0' }, {}).isErr()).toBe(true);
    });

    test('rejects an unknown log level', () => {
        expect(loadConfig({ watch: '/s', target: '/a', 'log-level': 'loud' }, {}).isErr()).toBe(true);
    });
});
