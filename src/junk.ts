import { basename } from 'node:path';
import type { FileStatus, JunkConfig, JunkVerdict, MediaKind } from './types.js';

export interface JunkSubject {
  path: string;
  size: number;
  kind: MediaKind;
  status: FileStatus;
  width: number | null;
  height: number | null;
}

export interface JunkRule {
  id: string;
  reason: string;
  matches: (subject: JunkSubject, config: JunkConfig) => boolean;
}

const SYSTEM_FILE_NAMES = new Set(['thumbs.db', '.ds_store', 'desktop.ini', 'ehthumbs.db', 'ehthumbs_vista.db']);

const SYSTEM_DIRECTORY_PATTERNS = [
  /(^|[\\/])\.thumbnails[\\/]/i,
  /(^|[\\/])@eaDir[\\/]/i,
  /(^|[\\/])\.AppleDouble[\\/]/i,
  /(^|[\\/])\.picasaoriginals[\\/]/i,
  /(^|[\\/])\.trashes[\\/]/i,
];

const THUMBNAIL_NAME_PATTERNS = [/^\._/, /thumb/i, /^thumbcache_/i];

export function isSystemOrThumbnailPath(path: string, extraPatterns: string[] = []): boolean {
  const name = basename(path);

  if (SYSTEM_FILE_NAMES.has(name.toLowerCase())) {
    return true;
  }

  if (SYSTEM_DIRECTORY_PATTERNS.some((pattern) => pattern.test(path))) {
    return true;
  }

  if (THUMBNAIL_NAME_PATTERNS.some((pattern) => pattern.test(name))) {
    return true;
  }

  return extraPatterns.some((pattern) => new RegExp(pattern, 'i').test(name));
}

/**
 * Evaluated in order; the first matching rule decides the verdict.
 */
export const JUNK_RULES: readonly JunkRule[] = [
  {
    id: 'unreadable',
    reason: 'unreadable',
    matches: (subject) => subject.status === 'error',
  },
  {
    id: 'too-small',
    reason: 'too small',
    matches: (subject, config) => subject.size < config.minBytes,
  },
  {
    id: 'low-resolution',
    reason: 'low resolution',
    matches: (subject, config) =>
      subject.kind === 'image' &&
      subject.width !== null &&
      subject.height !== null &&
      (subject.width < config.minWidth || subject.height < config.minHeight),
  },
  {
    id: 'system-file',
    reason: 'system/thumbnail file',
    matches: (subject, config) => isSystemOrThumbnailPath(subject.path, config.patterns),
  },
];

export function classifyJunk(
  subject: JunkSubject,
  config: JunkConfig,
  rules: readonly JunkRule[] = JUNK_RULES
): JunkVerdict {
  for (const rule of rules) {
    if (rule.matches(subject, config)) {
      return { isJunk: true, ruleId: rule.id, reason: rule.reason };
    }
  }

  return { isJunk: false, ruleId: null, reason: null };
}
