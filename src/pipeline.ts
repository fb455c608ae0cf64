import { comparePaths, findDuplicateGroups } from './duplicates.js';
import { errorMessage } from './errors.js';
import type { FrameSampler } from './frame-sampler.js';
import { classifyJunk } from './junk.js';
import { logger } from './logger.js';
import { runPool } from './pool.js';
import { reconcile } from './reconcile.js';
import { findMediaFiles } from './scanner.js';
import { signFile } from './signature.js';
import type { MediaStore } from './store.js';
import type { Config, DiscoveredFile, FileFailure, ScanResult, SignatureResult } from './types.js';

export interface ScanOptions {
  config: Config;
  store: MediaStore;
  sampler: FrameSampler;
  root?: string;
  signal?: AbortSignal;
  onDiscovered?: (total: number, queued: number) => void;
  onProgress?: (done: number, total: number, path: string) => void;
}

interface FileCounters {
  signed: number;
  errors: number;
  junk: number;
}

/**
 * Signs and classifies one file, then writes its whole record in a single
 * transaction. A store failure rolls that file back and is reported, never
 * thrown.
 */
async function processFile(
  file: DiscoveredFile,
  options: ScanOptions,
  counters: FileCounters,
  failures: FileFailure[]
): Promise<void> {
  const { config, store, sampler } = options;

  let signature: SignatureResult;
  try {
    signature = await signFile(file, { sampler, frameCount: config.videoSampleFrames });
  } catch (error) {
    logger.error(`Unexpected failure while signing ${file.path}`, { error: errorMessage(error) });
    failures.push({ path: file.path, stage: 'sign', message: errorMessage(error) });
    return;
  }

  const verdict = classifyJunk(
    {
      path: file.path,
      size: file.size,
      kind: file.kind,
      status: signature.status,
      width: signature.width,
      height: signature.height,
    },
    config.junk
  );

  try {
    store.transaction(`record ${file.path}`, () => {
      const fileId = store.upsertFile(file.path, file.size, file.mtimeMs, file.kind);
      store.recordSignature(
        fileId,
        signature.exactSig,
        signature.perceptualSig,
        signature.status,
        signature.errorReason,
        {
          width: signature.width,
          height: signature.height,
          capturedAt: signature.capturedAt,
          exifData: signature.exifData,
        }
      );
      store.recordJunkVerdict(fileId, verdict.isJunk, verdict.reason);
    });
  } catch (error) {
    logger.warn(`Could not record ${file.path}`, { error: errorMessage(error) });
    failures.push({ path: file.path, stage: 'store', message: errorMessage(error) });
    return;
  }

  if (signature.status === 'error') {
    logger.warn(`Cannot sign ${file.path}`, { reason: signature.errorReason });
    counters.errors++;
  } else {
    logger.debug(`Signed ${file.path}`, { exactSig: signature.exactSig, perceptualSig: signature.perceptualSig });
    counters.signed++;
  }

  if (verdict.isJunk) {
    counters.junk++;
  }
}

/**
 * One ingestion pass: walk, diff against the store, tombstone what
 * vanished, sign and classify new or changed files on a bounded pool, then
 * rebuild duplicate groups from every signed file.
 *
 * Rejects only when the root cannot be walked or the store cannot be read.
 */
export async function runScan(options: ScanOptions): Promise<ScanResult> {
  const { config, store, signal } = options;
  const root = options.root ?? config.scanRoot;

  const walk = await findMediaFiles(root, {
    imageExtensions: config.imageExtensions,
    videoExtensions: config.videoExtensions,
    includeHidden: config.includeHidden,
    followSymlinks: config.followSymlinks,
  });

  const skippedDirectories = walk.skippedDirectories.map((dir) => dir.path);
  const plan = reconcile(walk.files, store.listTrackedFiles(), skippedDirectories);
  const queue = [...plan.new, ...plan.changed].sort((a, b) => comparePaths(a.path, b.path));
  const failures: FileFailure[] = [];

  logger.info(`Reconciled ${walk.files.length} files under ${root}`, {
    new: plan.new.length,
    changed: plan.changed.length,
    unchanged: plan.unchanged.length,
    missing: plan.missing.length,
  });

  options.onDiscovered?.(walk.files.length, queue.length);

  let tombstoned = 0;
  try {
    tombstoned = store.tombstoneMissing(plan.missing);
  } catch (error) {
    logger.error('Could not tombstone missing files', { error: errorMessage(error) });
    for (const path of plan.missing) {
      failures.push({ path, stage: 'store', message: errorMessage(error) });
    }
  }

  const counters: FileCounters = { signed: 0, errors: 0, junk: 0 };
  let done = 0;

  const pool = await runPool(
    queue,
    config.concurrency,
    async (file) => {
      await processFile(file, options, counters, failures);
      done++;
      options.onProgress?.(done, queue.length, file.path);
    },
    signal
  );

  if (pool.aborted) {
    logger.warn(`Scan interrupted after ${pool.completed} of ${queue.length} files`);
  }

  let clustered = false;
  let clusterError: string | null = null;

  try {
    const groups = findDuplicateGroups(store.listSignedFiles(), config.nearDuplicateThreshold);
    clustered = store.replaceDuplicateGroups(groups);
  } catch (error) {
    clusterError = errorMessage(error);
    logger.error('Duplicate clustering failed; previous groups kept', { error: clusterError });
  }

  const stats = store.getStats();

  return {
    root,
    discovered: walk.files.length,
    new: plan.new.length,
    changed: plan.changed.length,
    unchanged: plan.unchanged.length,
    missing: plan.missing.length,
    signed: counters.signed,
    errors: counters.errors,
    junk: counters.junk,
    failures,
    exactGroups: stats.exactGroups,
    nearGroups: stats.nearGroups,
    tombstoned,
    skippedDirectories,
    clustered,
    clusterError,
    aborted: pool.aborted,
  };
}
