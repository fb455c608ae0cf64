import { readdir, realpath, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, extname } from 'node:path';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { comparePaths } from './duplicates.js';
import type { DiscoveredFile, MediaKind } from './types.js';

export interface WalkOptions {
  imageExtensions: string[];
  videoExtensions: string[];
  includeHidden: boolean;
  followSymlinks: boolean;
}

export interface SkippedDirectory {
  path: string;
  message: string;
}

export interface WalkResult {
  files: DiscoveredFile[];
  skippedDirectories: SkippedDirectory[];
}

export function getMediaKind(
  filePath: string,
  options: Pick<WalkOptions, 'imageExtensions' | 'videoExtensions'>
): MediaKind | null {
  const ext = extname(filePath).toLowerCase();

  if (options.imageExtensions.includes(ext)) {
    return 'image';
  }

  if (options.videoExtensions.includes(ext)) {
    return 'video';
  }

  return null;
}

/**
 * Walks `root` and stats every file on the extension allowlist. A
 * subdirectory that cannot be listed is recorded in `skippedDirectories`
 * and the walk carries on; only an unreadable root rejects.
 */
export async function findMediaFiles(root: string, options: WalkOptions): Promise<WalkResult> {
  const files: DiscoveredFile[] = [];
  const skippedDirectories: SkippedDirectory[] = [];
  const visited = new Set<string>();

  visited.add(await realpath(root));

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];

    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === root) {
        throw error;
      }

      const message = errorMessage(error);
      logger.warn(`Skipping unreadable directory: ${dir}`, { error: message });
      skippedDirectories.push({ path: dir, message });
      return;
    }

    entries.sort((a, b) => comparePaths(a.name, b.name));

    for (const entry of entries) {
      if (!options.includeHidden && entry.name.startsWith('.')) {
        continue;
      }

      const fullPath = join(dir, entry.name);

      if (entry.isSymbolicLink()) {
        if (options.followSymlinks) {
          await followLink(fullPath);
        }
        continue;
      }

      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (entry.isFile()) {
        await addFile(fullPath);
      }
    }
  }

  async function followLink(linkPath: string): Promise<void> {
    try {
      const target = await stat(linkPath);

      if (target.isFile()) {
        await addFile(linkPath);
        return;
      }

      if (!target.isDirectory()) {
        return;
      }

      const resolved = await realpath(linkPath);

      if (visited.has(resolved)) {
        logger.debug(`Symlink cycle or repeat visit skipped: ${linkPath} -> ${resolved}`);
        return;
      }

      visited.add(resolved);
      await walk(linkPath);
    } catch (error) {
      logger.warn(`Skipping broken symlink: ${linkPath}`, { error: errorMessage(error) });
    }
  }

  async function addFile(filePath: string): Promise<void> {
    const kind = getMediaKind(filePath, options);

    if (!kind) {
      return;
    }

    try {
      const stats = await stat(filePath);
      files.push({
        path: filePath,
        size: stats.size,
        mtimeMs: Math.trunc(stats.mtimeMs),
        kind,
      });
    } catch (error) {
      logger.warn(`File vanished before it could be stat'ed: ${filePath}`, { error: errorMessage(error) });
    }
  }

  await walk(root);

  files.sort((a, b) => comparePaths(a.path, b.path));

  return { files, skippedDirectories };
}
