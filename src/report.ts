import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { MediaStore } from './store.js';
import type { DuplicatesReport, JunkReport } from './types.js';

export const DUPLICATES_REPORT_FILE = 'duplicates.json';
export const JUNK_REPORT_FILE = 'junk.json';

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }

  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

/**
 * `reclaimableBytes` counts every member except the canonical one.
 */
export function buildDuplicatesReport(store: MediaStore, now: Date = new Date()): DuplicatesReport {
  const groups = store.listDuplicateGroups().map((group) => ({
    id: group.id,
    relation: group.relation,
    threshold: group.threshold,
    canonical: group.canonicalPath,
    files: group.members.map((member) => member.path),
    reclaimableBytes: group.members
      .filter((member) => member.fileId !== group.canonicalId)
      .reduce((sum, member) => sum + member.size, 0),
  }));

  return {
    generatedAt: now.toISOString(),
    totalGroups: groups.length,
    groups,
  };
}

export function buildJunkReport(store: MediaStore, now: Date = new Date()): JunkReport {
  const files = store.listJunkFiles().map((file) => ({
    path: file.path,
    size: file.size,
    reason: file.junkReason ?? 'unknown',
  }));

  return {
    generatedAt: now.toISOString(),
    totalFiles: files.length,
    files,
  };
}

export async function writeReport(dataDir: string, fileName: string, report: object): Promise<string> {
  await mkdir(dataDir, { recursive: true });
  const target = join(dataDir, fileName);
  await writeFile(target, JSON.stringify(report, null, 2));
  return target;
}
