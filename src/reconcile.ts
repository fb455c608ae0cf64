import { sep } from 'node:path';
import { comparePaths } from './duplicates.js';
import type { DiscoveredFile, ReconcilePlan, TrackedFile } from './types.js';

const RETRYABLE_ERROR_PREFIX = 'io error';

function needsSigning(file: DiscoveredFile, record: TrackedFile): boolean {
  if (record.size !== file.size || record.mtimeMs !== file.mtimeMs) {
    return true;
  }

  if (record.status === 'discovered') {
    return true;
  }

  return record.status === 'error' && (record.errorReason?.startsWith(RETRYABLE_ERROR_PREFIX) ?? false);
}

function isUnder(path: string, dir: string): boolean {
  return path.startsWith(dir.endsWith(sep) ? dir : dir + sep);
}

/**
 * Diffs a directory snapshot against the live records in the store.
 *
 * Size and mtime are the only change oracle: a touched file is "changed"
 * even if its bytes are identical. A tracked record that never finished
 * signing (status `discovered`), or that failed on a transient read error,
 * is also re-queued as changed; a decode failure waits for the file to
 * change. Tracked paths under a directory the walk had to skip are left
 * alone rather than reported missing.
 */
export function reconcile(
  discovered: DiscoveredFile[],
  tracked: TrackedFile[],
  skippedDirectories: string[] = []
): ReconcilePlan {
  const trackedByPath = new Map<string, TrackedFile>();

  for (const record of tracked) {
    if (record.status !== 'removed') {
      trackedByPath.set(record.path, record);
    }
  }

  const plan: ReconcilePlan = { new: [], changed: [], unchanged: [], missing: [] };
  const seen = new Set<string>();
  const ordered = [...discovered].sort((a, b) => comparePaths(a.path, b.path));

  for (const file of ordered) {
    if (seen.has(file.path)) {
      continue;
    }
    seen.add(file.path);

    const record = trackedByPath.get(file.path);

    if (!record) {
      plan.new.push(file);
      continue;
    }

    if (needsSigning(file, record)) {
      plan.changed.push(file);
      continue;
    }

    plan.unchanged.push(file);
  }

  for (const path of trackedByPath.keys()) {
    if (seen.has(path)) {
      continue;
    }

    if (skippedDirectories.some((dir) => isUnder(path, dir))) {
      continue;
    }

    plan.missing.push(path);
  }

  plan.missing.sort(comparePaths);

  return plan;
}
