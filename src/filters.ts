// src/filters.ts

import { access } from 'node:fs/promises';
import { basename, extname, isAbsolute, relative, sep } from 'node:path';
import type { IgnoreRules, MediaCategory } from './types';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg', '.jpeg', '.png', '.webp', '.heic', '.heif', '.gif', '.bmp', '.tiff',
]);

export const RAW_EXTENSIONS: ReadonlySet<string> = new Set([
  '.cr2', '.cr3', '.nef', '.arw', '.raf', '.orf', '.rw2', '.dng', '.sr2',
]);

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4', '.mov', '.avi', '.mkv', '.mts', '.m2ts',
]);

export const QUARANTINE_DIR_NAME = '._failed_locked';

export const defaultIgnoreRules: IgnoreRules = {
  ignoredExtensions: new Set(['.tmp', '.temp', '.crdownload', '.part', '.lnk']),
  ignoredPrefixes: ['.', '~', 'Thumbs.db'],
  ignoredDirectories: new Set(['.hist', '.tmp', 'temp', 'tmp', 'cache', 'thumbnail', 'thumb']),
  allowedExtensions: new Set([...IMAGE_EXTENSIONS, ...RAW_EXTENSIONS, ...VIDEO_EXTENSIONS]),
};

export const extensionOf = (path: string): string => extname(path).toLowerCase();

export const categoryOf = (path: string): MediaCategory => {
  const ext = extensionOf(path);
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  if (RAW_EXTENSIONS.has(ext)) return 'raw';
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  return 'none';
};

export const isIgnoredName = (name: string, rules: IgnoreRules): boolean =>
  rules.ignoredExtensions.has(extensionOf(name)) ||
  rules.ignoredPrefixes.some((prefix) => name.startsWith(prefix));

export const isIgnoredDir = (name: string, rules: IgnoreRules): boolean =>
  rules.ignoredDirectories.has(name.toLowerCase()) ||
  rules.ignoredPrefixes.some((prefix) => name.startsWith(prefix));

export const isInside = (path: string, root: string): boolean => {
  const rel = relative(root, path);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
};

// Directory components are only checked below the watch root, so a root
// that itself lives under e.g. /tmp is not ignored wholesale.
export const hasIgnoredDirectory = (
  path: string,
  watchRoot: string,
  rules: IgnoreRules,
): boolean => {
  if (!isInside(path, watchRoot)) return false;
  const parts = relative(watchRoot, path).split(sep).slice(0, -1);
  return parts.some((part) => isIgnoredDir(part, rules));
};

export const isAllowedMedia = (path: string, rules: IgnoreRules): boolean =>
  rules.allowedExtensions.has(extensionOf(path));

const exists = (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false,
  );

export const ignoreReason = async (
  path: string,
  watchRoot: string,
  rules: IgnoreRules,
): Promise<string | undefined> => {
  if (!(await exists(path))) return 'missing';
  if (isIgnoredName(basename(path), rules)) return 'ignored name';
  if (hasIgnoredDirectory(path, watchRoot, rules)) return 'ignored directory';
  if (!isAllowedMedia(path, rules)) return `unsupported type ${extensionOf(path) || '(none)'}`;
  return undefined;
};
