// src/metadata/exif.ts

import { parse } from 'exifr';
import type { MetadataReader } from '../types';

// exifr names: CreateDate is DateTimeDigitized, ModifyDate is IFD0 DateTime.
export const TIMESTAMP_TAGS = ['DateTimeOriginal', 'CreateDate', 'ModifyDate'] as const;

const EXIF_DATE = /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})/;

// "2021:05:01 10:00:00" carries no zone; read it as local time.
export const parseExifDate = (value: string): Date | undefined => {
  const match = EXIF_DATE.exec(value.trim());
  if (!match) return undefined;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(year, month - 1, day, hour, minute, second);
  return Number.isNaN(date.getTime()) || year === 0 ? undefined : date;
};

const toDate = (value: unknown): Date | undefined => {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value;
  if (typeof value === 'string') return parseExifDate(value);
  return undefined;
};

export const pickTimestamp = (tags: unknown): Date | undefined => {
  if (typeof tags !== 'object' || tags === null) return undefined;
  const record: Record<string, unknown> = { ...tags };
  for (const tag of TIMESTAMP_TAGS) {
    const date = toDate(record[tag]);
    if (date) return date;
  }
  return undefined;
};

export const exifReader: MetadataReader = async (path) => {
  const tags: unknown = await parse(path, { pick: [...TIMESTAMP_TAGS] });
  return pickTimestamp(tags);
};

// TIFF-based RAW: dates live in IFD0 and the EXIF sub-IFD.
export const rawReader: MetadataReader = async (path) => {
  const tags: unknown = await parse(path, { tiff: true, exif: true, pick: [...TIMESTAMP_TAGS] });
  return pickTimestamp(tags);
};
