// src/metadata/video.ts

import { access } from 'node:fs/promises';
import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData } from 'fluent-ffmpeg';
import ffprobe from 'ffprobe-static';
import type { MetadataReader } from '../types';
import { parseExifDate } from './exif';

type ProbeTags = Record<string, unknown>;

// The part of ffprobe's output we read.
export type ProbeSummary = {
  format?: { tags?: ProbeTags };
  streams?: Array<{ tags?: ProbeTags }>;
};

const creationTag = (tags: ProbeTags | undefined): string | undefined => {
  const value = tags?.creation_time ?? tags?.creation_date;
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

// Files by the wall clock written in the tag; a trailing zone or fraction is
// dropped, so 23:30Z stays on its own day wherever the ingester runs.
export const parseCreationTime = (value: string): Date | undefined => parseExifDate(value);

export const creationTimeFromProbe = (probe: ProbeSummary): Date | undefined => {
  const raw =
    creationTag(probe.format?.tags) ??
    (probe.streams ?? []).map((stream) => creationTag(stream.tags)).find((tag) => tag !== undefined);
  return raw === undefined ? undefined : parseCreationTime(raw);
};

const tagsOf = (value: unknown): ProbeTags | undefined =>
  typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : undefined;

export const summarize = (data: FfprobeData): ProbeSummary => ({
  format: { tags: tagsOf(data.format.tags) },
  streams: data.streams.map((stream) => ({ tags: tagsOf(stream.tags) })),
});

export const probe = (path: string): Promise<ProbeSummary> =>
  new Promise((resolve, reject) => {
    ffmpeg.ffprobe(path, (err, data) => {
      if (err) return reject(err);
      resolve(summarize(data));
    });
  });

export const videoReader = (ffprobePath: string = ffprobe.path): MetadataReader => {
  ffmpeg.setFfprobePath(ffprobePath);
  return async (path) => creationTimeFromProbe(await probe(path));
};

export const ffprobeAvailable = (ffprobePath: string = ffprobe.path): Promise<boolean> =>
  access(ffprobePath).then(
    () => true,
    () => false,
  );
