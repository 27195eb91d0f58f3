// src/metadata/index.ts

import type { Logger, MediaCategory, MetadataReader, MetadataResolver } from '../types';
import { categoryOf } from '../filters';
import { toError } from '../retry';
import { exifReader, rawReader } from './exif';
import { videoReader } from './video';

export type ReaderSet = Partial<Record<MediaCategory, MetadataReader>>;

export const defaultReaders = (): ReaderSet => ({
  image: exifReader,
  raw: rawReader,
  video: videoReader(),
});

// Unreadable or missing metadata is never an error for the pipeline; the
// caller falls back to filesystem timestamps.
export const createMetadataResolver = (readers: ReaderSet, logger: Logger): MetadataResolver => ({
  resolve: async (path) => {
    const category = categoryOf(path);
    const read = readers[category];
    if (!read) return undefined;

    try {
      return await read(path);
    } catch (e) {
      logger.debug(`Cannot read ${category} metadata from ${path}: ${toError(e).message}`);
      return undefined;
    }
  },
});
