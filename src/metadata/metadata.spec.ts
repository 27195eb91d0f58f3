// src/metadata/metadata.spec.ts

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, test } from 'vitest';
import { exifReader, parseExifDate, pickTimestamp } from './exif';
import { creationTimeFromProbe, parseCreationTime, summarize } from './video';
import { bucketOf } from '../classify';
import { createMetadataResolver } from './index';
import { collectingLogger } from '../log';

describe('parseExifDate', () => {
    test('reads the EXIF layout as local time', () => {
        expect(parseExifDate('2021:05:01 10:20:30')).toEqual(new Date(2021, 4, 1, 10, 20, 30));
    });

    test('accepts dashes and a T separator', () => {
        expect(parseExifDate('2021-05-01T10:20:30')).toEqual(new Date(2021, 4, 1, 10, 20, 30));
    });

    test('rejects blanks and zeroed dates', () => {
        expect(parseExifDate('')).toBeUndefined();
        expect(parseExifDate('0000:00:00 00:00:00')).toBeUndefined();
        expect(parseExifDate('yesterday')).toBeUndefined();
    });
});

describe('pickTimestamp', () => {
    test('prefers DateTimeOriginal', () => {
        const original = new Date(2020, 1, 2, 3, 4, 5);

        expect(pickTimestamp({ ModifyDate: new Date(2022, 0, 1), DateTimeOriginal: original })).toBe(original);
    });

    test('falls through to later tags and parses strings', () => {
        expect(pickTimestamp({ CreateDate: '2019:07:08 09:10:11' })).toEqual(new Date(2019, 6, 8, 9, 10, 11));
    });

    test('skips invalid values', () => {
        expect(pickTimestamp({ DateTimeOriginal: new Date(Number.NaN), ModifyDate: 'garbage' })).toBeUndefined();
        expect(pickTimestamp(undefined)).toBeUndefined();
    });
});

describe('video creation time', () => {
    test('keeps the wall clock of zoned timestamps', () => {
        expect(parseCreationTime('2021-05-01T10:00:00.000000Z')).toEqual(new Date(2021, 4, 1, 10, 0, 0));
        expect(parseCreationTime('2021-05-01T10:00:00+03:00')).toEqual(new Date(2021, 4, 1, 10, 0, 0));
    });

    test('buckets a late zoned time on the day written in the tag', () => {
        const date = parseCreationTime('2021-05-01T23:30:00Z');

        expect(date && bucketOf(date)).toEqual({ year: '2021', month: '05', day: '01' });
    });

    test('parses unzoned timestamps as local time', () => {
        expect(parseCreationTime('2021-05-01 10:00:00.5')).toEqual(new Date(2021, 4, 1, 10, 0, 0));
    });

    test('reads format tags before stream tags', () => {
        expect(
            creationTimeFromProbe({
                format: { tags: { creation_time: '2021-05-01T10:00:00Z' } },
                streams: [{ tags: { creation_time: '2000-01-01T00:00:00Z' } }],
            }),
        ).toEqual(new Date(2021, 4, 1, 10, 0, 0));
    });

    test('falls back to the first stream with a creation tag', () => {
        expect(
            creationTimeFromProbe({
                format: { tags: { title: 'holiday' } },
                streams: [{ tags: {} }, { tags: { creation_time: '2018-03-04T05:06:07Z' } }],
            }),
        ).toEqual(new Date(2018, 2, 4, 5, 6, 7));
    });

    test('is undefined without tags', () => {
        expect(creationTimeFromProbe({})).toBeUndefined();
    });

    test('summarizes raw ffprobe output down to its tags', () => {
        const summary = summarize({
            format: { tags: { creation_time: '2021-05-01T10:00:00Z', encoder: 'Lavf' } },
            streams: [{ index: 0, codec_type: 'video' }, { index: 1, tags: { language: 'eng' } }],
            chapters: [],
        });

        expect(summary).toEqual({
            format: { tags: { creation_time: '2021-05-01T10:00:00Z', encoder: 'Lavf' } },
            streams: [{ tags: undefined }, { tags: { language: 'eng' } }],
        });
        expect(creationTimeFromProbe(summary)).toEqual(new Date(2021, 4, 1, 10, 0, 0));
    });
});

describe('createMetadataResolver', () => {
    test('routes by media category', async () => {
        const image = new Date(2021, 0, 1);
        const video = new Date(2022, 0, 1);
        const resolver = createMetadataResolver(
            { image: async () => image, video: async () => video },
            collectingLogger(),
        );

        expect(await resolver.resolve('/s/a.JPG')).toBe(image);
        expect(await resolver.resolve('/s/a.mp4')).toBe(video);
        expect(await resolver.resolve('/s/a.cr2')).toBeUndefined();
    });

    test('turns reader failures into no timestamp', async () => {
        const logger = collectingLogger();
        const resolver = createMetadataResolver(
            {
                image: async () => {
                    throw new Error('corrupt header');
                },
            },
            logger,
        );

        expect(await resolver.resolve('/s/a.jpg')).toBeUndefined();
        expect(logger.records).toEqual([
            { level: 'debug', message: 'Cannot read image metadata from /s/a.jpg: corrupt header' },
        ]);
    });

    test('yields nothing for a file that is not really an image', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'metadata-'));
        try {
            await writeFile(join(dir, 'fake.jpg'), 'plain text, no exif here');
            const resolver = createMetadataResolver({ image: exifReader }, collectingLogger());

            expect(await resolver.resolve(join(dir, 'fake.jpg'))).toBeUndefined();
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});
