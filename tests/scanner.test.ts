/**
 * Directory walk and reconciliation against tracked records
 */

import { test, after } from 'node:test';
import assert from 'node:assert/strict';
import { chmod, mkdir, symlink, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../src/logger.js';
import { reconcile } from '../src/reconcile.js';
import { findMediaFiles, getMediaKind, type WalkOptions } from '../src/scanner.js';
import type { DiscoveredFile, TrackedFile } from '../src/types.js';
import { makeTempDir, removeDir } from './helpers.js';

logger.setLevel('silent');

const MTIME_SECONDS = 1_700_000_000;

const options: WalkOptions = {
  imageExtensions: ['.jpg', '.jpeg', '.png'],
  videoExtensions: ['.mp4'],
  includeHidden: false,
  followSymlinks: false,
};

const tempDirs: string[] = [];

after(async () => {
  for (const dir of tempDirs) {
    await chmod(join(dir, 'locked'), 0o755).catch(() => undefined);
    await removeDir(dir);
  }
});

async function touchFile(path: string, content: string = 'x'): Promise<void> {
  await writeFile(path, content);
  await utimes(path, MTIME_SECONDS, MTIME_SECONDS);
}

async function buildTree(): Promise<string> {
  const root = await makeTempDir();
  tempDirs.push(root);

  await mkdir(join(root, 'sub', 'deeper'), { recursive: true });
  await mkdir(join(root, '.hidden'));
  await touchFile(join(root, 'a.jpg'));
  await touchFile(join(root, 'B.PNG'), 'xyz');
  await touchFile(join(root, 'notes.txt'));
  await touchFile(join(root, '.d.jpg'));
  await touchFile(join(root, '.hidden', 'h.jpg'));
  await touchFile(join(root, 'sub', 'clip.mp4'));
  await touchFile(join(root, 'sub', 'deeper', 'c.jpeg'));

  return root;
}

// ============================================================================
// getMediaKind
// ============================================================================

test('getMediaKind: matches the allowlist case-insensitively', () => {
  assert.equal(getMediaKind('/a/IMG_1.JPG', options), 'image');
  assert.equal(getMediaKind('/a/clip.mp4', options), 'video');
  assert.equal(getMediaKind('/a/readme.txt', options), null);
  assert.equal(getMediaKind('/a/noextension', options), null);
});

// ============================================================================
// findMediaFiles
// ============================================================================

test('findMediaFiles: lists media files sorted by path with size and whole-ms mtime', async () => {
  const root = await buildTree();
  const result = await findMediaFiles(root, options);

  assert.deepEqual(result.files, [
    { path: join(root, 'B.PNG'), size: 3, mtimeMs: MTIME_SECONDS * 1000, kind: 'image' },
    { path: join(root, 'a.jpg'), size: 1, mtimeMs: MTIME_SECONDS * 1000, kind: 'image' },
    { path: join(root, 'sub', 'clip.mp4'), size: 1, mtimeMs: MTIME_SECONDS * 1000, kind: 'video' },
    { path: join(root, 'sub', 'deeper', 'c.jpeg'), size: 1, mtimeMs: MTIME_SECONDS * 1000, kind: 'image' },
  ]);
  assert.deepEqual(result.skippedDirectories, []);
});

test('findMediaFiles: includes dot-files and dot-directories when asked', async () => {
  const root = await buildTree();
  const result = await findMediaFiles(root, { ...options, includeHidden: true });

  assert.deepEqual(
    result.files.map((file) => file.path),
    [
      join(root, '.d.jpg'),
      join(root, '.hidden', 'h.jpg'),
      join(root, 'B.PNG'),
      join(root, 'a.jpg'),
      join(root, 'sub', 'clip.mp4'),
      join(root, 'sub', 'deeper', 'c.jpeg'),
    ]
  );
});

test('findMediaFiles: skips symlinks unless following them, and never loops', async () => {
  const root = await buildTree();
  await symlink(join(root, 'a.jpg'), join(root, 'link.jpg'));
  await symlink(root, join(root, 'sub', 'loop'));

  const plain = await findMediaFiles(root, options);
  assert.equal(plain.files.some((file) => file.path === join(root, 'link.jpg')), false);

  const followed = await findMediaFiles(root, { ...options, followSymlinks: true });
  assert.deepEqual(
    followed.files.map((file) => file.path),
    [
      join(root, 'B.PNG'),
      join(root, 'a.jpg'),
      join(root, 'link.jpg'),
      join(root, 'sub', 'clip.mp4'),
      join(root, 'sub', 'deeper', 'c.jpeg'),
    ]
  );
});

test('findMediaFiles: rejects when the root does not exist', async () => {
  await assert.rejects(() => findMediaFiles('/nonexistent/media-dedupe-root', options), /ENOENT/);
});

test(
  'findMediaFiles: records an unreadable subdirectory and keeps walking',
  { skip: process.getuid?.() === 0 ? 'permission bits are not enforced for root' : false },
  async () => {
    const root = await buildTree();
    await mkdir(join(root, 'locked'));
    await touchFile(join(root, 'locked', 'secret.jpg'));
    await chmod(join(root, 'locked'), 0o000);

    const result = await findMediaFiles(root, options);

    assert.deepEqual(
      result.skippedDirectories.map((dir) => dir.path),
      [join(root, 'locked')]
    );
    assert.equal(result.files.length, 4);
  }
);

// ============================================================================
// reconcile
// ============================================================================

function discovered(path: string, size: number = 100, mtimeMs: number = 1000): DiscoveredFile {
  return { path, size, mtimeMs, kind: 'image' };
}

function tracked(
  fileId: number,
  path: string,
  size: number = 100,
  mtimeMs: number = 1000,
  status: TrackedFile['status'] = 'signed',
  errorReason: string | null = null
): TrackedFile {
  return { fileId, path, size, mtimeMs, status, errorReason };
}

test('reconcile: an empty store sees every file as new', () => {
  const plan = reconcile([discovered('/p/b.jpg'), discovered('/p/a.jpg')], []);

  assert.deepEqual(plan.new.map((file) => file.path), ['/p/a.jpg', '/p/b.jpg']);
  assert.deepEqual(plan.changed, []);
  assert.deepEqual(plan.unchanged, []);
  assert.deepEqual(plan.missing, []);
});

test('reconcile: splits files into new, changed, unchanged and missing', () => {
  const plan = reconcile(
    [discovered('/p/same.jpg'), discovered('/p/bigger.jpg', 200), discovered('/p/touched.jpg', 100, 2000), discovered('/p/new.jpg')],
    [
      tracked(1, '/p/same.jpg'),
      tracked(2, '/p/bigger.jpg'),
      tracked(3, '/p/touched.jpg'),
      tracked(4, '/p/gone.jpg'),
      tracked(5, '/p/also-gone.jpg'),
    ]
  );

  assert.deepEqual(plan.new.map((file) => file.path), ['/p/new.jpg']);
  assert.deepEqual(plan.changed.map((file) => file.path), ['/p/bigger.jpg', '/p/touched.jpg']);
  assert.deepEqual(plan.unchanged.map((file) => file.path), ['/p/same.jpg']);
  assert.deepEqual(plan.missing, ['/p/also-gone.jpg', '/p/gone.jpg']);
});

test('reconcile: a record that never finished signing is re-queued', () => {
  const plan = reconcile([discovered('/p/a.jpg')], [tracked(1, '/p/a.jpg', 100, 1000, 'discovered')]);
  assert.deepEqual(plan.changed.map((file) => file.path), ['/p/a.jpg']);
});

test('reconcile: decode errors with matching size and mtime are not retried', () => {
  const plan = reconcile(
    [discovered('/p/a.jpg')],
    [tracked(1, '/p/a.jpg', 100, 1000, 'error', 'decode error: Cannot decode image: unsupported image format')]
  );
  assert.deepEqual(plan.unchanged.map((file) => file.path), ['/p/a.jpg']);
});

test('reconcile: read errors are retried even when size and mtime match', () => {
  const plan = reconcile(
    [discovered('/p/a.jpg'), discovered('/p/b.jpg')],
    [
      tracked(1, '/p/a.jpg', 100, 1000, 'error', "io error: EACCES: permission denied, open '/p/a.jpg'"),
      tracked(2, '/p/b.jpg', 100, 1000, 'error', null),
    ]
  );

  assert.deepEqual(plan.changed.map((file) => file.path), ['/p/a.jpg']);
  assert.deepEqual(plan.unchanged.map((file) => file.path), ['/p/b.jpg']);
});

test('reconcile: a tombstoned path that reappears is new again', () => {
  const plan = reconcile([discovered('/p/back.jpg')], [tracked(1, '/p/back.jpg', 100, 1000, 'removed')]);

  assert.deepEqual(plan.new.map((file) => file.path), ['/p/back.jpg']);
  assert.deepEqual(plan.missing, []);
});

test('reconcile: a path discovered twice is counted once', () => {
  const plan = reconcile([discovered('/p/a.jpg'), discovered('/p/a.jpg')], []);
  assert.equal(plan.new.length, 1);
});

test('reconcile: files under a skipped directory are not reported missing', () => {
  const plan = reconcile(
    [],
    [tracked(1, '/p/locked/a.jpg'), tracked(2, '/p/lockedness.jpg'), tracked(3, '/p/other/b.jpg')],
    ['/p/locked']
  );

  assert.deepEqual(plan.missing, ['/p/lockedness.jpg', '/p/other/b.jpg']);
});
