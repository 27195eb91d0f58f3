// src/duplicate.spec.ts

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { isDuplicate } from './duplicate';

describe('isDuplicate', () => {
    let root: string;
    let staging: string;
    let archive: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'duplicate-'));
        staging = join(root, 'staging');
        archive = join(root, 'archive');
        await mkdir(staging);
        await mkdir(archive);
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    test('false when nothing has the same name', async () => {
        await writeFile(join(staging, 'a.jpg'), 'same');

        expect(await isDuplicate(join(staging, 'a.jpg'), archive, { checksum: true })).toBe(false);
    });

    test('false when the destination directory does not exist', async () => {
        await writeFile(join(staging, 'a.jpg'), 'same');

        expect(await isDuplicate(join(staging, 'a.jpg'), join(archive, 'nope'), { checksum: true })).toBe(false);
    });

    test('true for byte-identical files', async () => {
        await writeFile(join(staging, 'a.jpg'), 'same bytes');
        await writeFile(join(archive, 'a.jpg'), 'same bytes');

        expect(await isDuplicate(join(staging, 'a.jpg'), archive, { checksum: true })).toBe(true);
    });

    test('false when sizes differ', async () => {
        await writeFile(join(staging, 'a.jpg'), 'short');
        await writeFile(join(archive, 'a.jpg'), 'much longer');

        expect(await isDuplicate(join(staging, 'a.jpg'), archive, { checksum: false })).toBe(false);
    });

    test('checksum tells apart equal-sized files', async () => {
        await writeFile(join(staging, 'a.jpg'), 'aaaa');
        await writeFile(join(archive, 'a.jpg'), 'bbbb');

        expect(await isDuplicate(join(staging, 'a.jpg'), archive, { checksum: true })).toBe(false);
        expect(await isDuplicate(join(staging, 'a.jpg'), archive, { checksum: false })).toBe(true);
    });

    test('a directory with the same name is not a duplicate', async () => {
        await writeFile(join(staging, 'a.jpg'), 'data');
        await mkdir(join(archive, 'a.jpg'));

        expect(await isDuplicate(join(staging, 'a.jpg'), archive, { checksum: false })).toBe(false);
    });
});
