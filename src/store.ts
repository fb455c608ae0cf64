import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { StoreError, errorMessage } from './errors.js';
import type {
  DuplicateGroup,
  FileStatus,
  MediaFile,
  MediaKind,
  PurgeResult,
  RelationKind,
  SignedFile,
  StoreStats,
  StoredDuplicateGroup,
  TrackedFile,
} from './types.js';

export interface FileDetails {
  width: number | null;
  height: number | null;
  capturedAt?: string | null;
  exifData?: string | null;
}

/**
 * Durable catalog of files, signatures, junk flags and duplicate groups.
 * Every component receives a handle to one of these; nothing reaches for a
 * global connection.
 */
export interface MediaStore {
  /** Create-or-update of identity fields. A size/mtime/kind change resets the record to `discovered`. */
  upsertFile(path: string, size: number, mtimeMs: number, kind: MediaKind): number;
  recordSignature(
    fileId: number,
    exactSig: string | null,
    perceptualSig: string | null,
    status: Exclude<FileStatus, 'discovered' | 'removed'>,
    errorReason: string | null,
    details?: FileDetails
  ): void;
  recordJunkVerdict(fileId: number, isJunk: boolean, reason: string | null): void;
  listSignedFiles(): SignedFile[];
  /** Returns false when the active groups already match and nothing was written. */
  replaceDuplicateGroups(groups: DuplicateGroup[]): boolean;
  tombstoneMissing(paths: string[]): number;
  listTrackedFiles(): TrackedFile[];
  getFile(fileId: number): MediaFile | null;
  getFileByPath(path: string): MediaFile | null;
  listDuplicateGroups(): StoredDuplicateGroup[];
  listJunkFiles(): MediaFile[];
  getStats(): StoreStats;
  purgeRemoved(): PurgeResult;
  transaction<T>(operation: string, fn: () => T): T;
  close(): void;
}

interface FileRow {
  id: number;
  path: string;
  size: number;
  mtime_ms: number;
  kind: MediaKind;
  exact_sig: string | null;
  perceptual_sig: string | null;
  width: number | null;
  height: number | null;
  captured_at: string | null;
  exif_data: string | null;
  status: FileStatus;
  error_reason: string | null;
  is_junk: number;
  junk_reason: string | null;
  group_id: number | null;
  discovered_at: string;
  updated_at: string;
  removed_at: string | null;
}

interface GroupRow {
  id: number;
  relation: RelationKind;
  canonical_file_id: number;
  threshold: number | null;
}

interface MemberRow {
  group_id: number;
  id: number;
  path: string;
  size: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS duplicate_groups (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    relation TEXT NOT NULL CHECK (relation IN ('exact', 'near')),
    canonical_file_id INTEGER NOT NULL,
    threshold INTEGER,
    created_at TEXT NOT NULL,
    retired_at TEXT
  );

  CREATE TABLE IF NOT EXISTS files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT NOT NULL UNIQUE,
    size INTEGER NOT NULL,
    mtime_ms INTEGER NOT NULL,
    kind TEXT NOT NULL CHECK (kind IN ('image', 'video')),
    exact_sig TEXT,
    perceptual_sig TEXT,
    width INTEGER,
    height INTEGER,
    captured_at TEXT,
    exif_data TEXT,
    status TEXT NOT NULL DEFAULT 'discovered'
      CHECK (status IN ('discovered', 'signed', 'error', 'removed')),
    error_reason TEXT,
    is_junk INTEGER NOT NULL DEFAULT 0,
    junk_reason TEXT,
    group_id INTEGER REFERENCES duplicate_groups(id) ON DELETE SET NULL,
    discovered_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    removed_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_files_exact_sig ON files(exact_sig);
  CREATE INDEX IF NOT EXISTS idx_files_status ON files(status);
  CREATE INDEX IF NOT EXISTS idx_files_group_id ON files(group_id);
  CREATE INDEX IF NOT EXISTS idx_files_is_junk ON files(is_junk);
  CREATE INDEX IF NOT EXISTS idx_groups_retired ON duplicate_groups(retired_at);
`;

// Columns added after the first release; older catalogs gain them on open.
const ADDED_FILE_COLUMNS: ReadonlyArray<readonly [name: string, type: string]> = [
  ['captured_at', 'TEXT'],
  ['exif_data', 'TEXT'],
];

function toMediaFile(row: FileRow): MediaFile {
  return {
    id: row.id,
    path: row.path,
    size: row.size,
    mtimeMs: row.mtime_ms,
    kind: row.kind,
    exactSig: row.exact_sig,
    perceptualSig: row.perceptual_sig,
    width: row.width,
    height: row.height,
    capturedAt: row.captured_at,
    exifData: row.exif_data,
    status: row.status,
    errorReason: row.error_reason,
    isJunk: row.is_junk === 1,
    junkReason: row.junk_reason,
    groupId: row.group_id,
    discoveredAt: row.discovered_at,
    updatedAt: row.updated_at,
    removedAt: row.removed_at,
  };
}

/**
 * Identity of a group for change detection. The canonical id is part of it,
 * so a group whose canonical member was tombstoned never matches its
 * rebuilt successor.
 */
function groupKey(group: DuplicateGroup): string {
  const members = [...group.memberIds].sort((a, b) => a - b).join(',');
  return `${group.relation}:${group.threshold ?? ''}:${group.canonicalId}:${members}`;
}

function addMissingColumns(db: Database.Database): void {
  const present = new Set(
    db
      .prepare<[], { name: string }>('PRAGMA table_info(files)')
      .all()
      .map((column) => column.name)
  );

  for (const [name, type] of ADDED_FILE_COLUMNS) {
    if (!present.has(name)) {
      db.exec(`ALTER TABLE files ADD COLUMN ${name} ${type}`);
    }
  }
}

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath);
    db.pragma('busy_timeout = 5000');
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
    addMissingColumns(db);

    return db;
  } catch (error) {
    throw new StoreError(`Cannot open media store at ${dbPath}: ${errorMessage(error)}`, 'open', {
      cause: error,
    });
  }
}

export class SqliteMediaStore implements MediaStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
  }

  transaction<T>(operation: string, fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }

      throw new StoreError(`${operation} failed: ${errorMessage(error)}`, operation, { cause: error });
    }
  }

  upsertFile(path: string, size: number, mtimeMs: number, kind: MediaKind): number {
    const now = new Date().toISOString();
    const existing = this.db
      .prepare<[string], FileRow>('SELECT * FROM files WHERE path = ?')
      .get(path);

    if (!existing) {
      const result = this.db
        .prepare<[string, number, number, MediaKind, string, string]>(
          `INSERT INTO files (path, size, mtime_ms, kind, status, discovered_at, updated_at)
           VALUES (?, ?, ?, ?, 'discovered', ?, ?)`
        )
        .run(path, size, mtimeMs, kind, now, now);

      return Number(result.lastInsertRowid);
    }

    const identical =
      existing.status !== 'removed' &&
      existing.size === size &&
      existing.mtime_ms === mtimeMs &&
      existing.kind === kind;

    if (identical) {
      return existing.id;
    }

    // A revived tombstone is treated as a fresh discovery.
    const discoveredAt = existing.status === 'removed' ? now : existing.discovered_at;

    this.db
      .prepare<[number, number, MediaKind, string, string, number]>(
        `UPDATE files SET
           size = ?, mtime_ms = ?, kind = ?,
           exact_sig = NULL, perceptual_sig = NULL, width = NULL, height = NULL,
           captured_at = NULL, exif_data = NULL,
           status = 'discovered', error_reason = NULL,
           is_junk = 0, junk_reason = NULL,
           group_id = NULL, removed_at = NULL,
           discovered_at = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(size, mtimeMs, kind, discoveredAt, now, existing.id);

    return existing.id;
  }

  recordSignature(
    fileId: number,
    exactSig: string | null,
    perceptualSig: string | null,
    status: Exclude<FileStatus, 'discovered' | 'removed'>,
    errorReason: string | null,
    details: FileDetails = { width: null, height: null }
  ): void {
    if (status === 'error' && (exactSig !== null || perceptualSig !== null)) {
      throw new StoreError('A file in error status cannot carry a signature', 'recordSignature');
    }

    if (status === 'signed' && exactSig === null) {
      throw new StoreError('A signed file needs an exact signature', 'recordSignature');
    }

    const result = this.db
      .prepare<
        [string | null, string | null, number | null, number | null, string | null, string | null, string, string | null, string, number]
      >(
        `UPDATE files SET
           exact_sig = ?, perceptual_sig = ?, width = ?, height = ?, captured_at = ?, exif_data = ?,
           status = ?, error_reason = ?, group_id = NULL, updated_at = ?
         WHERE id = ? AND status != 'removed'`
      )
      .run(
        exactSig,
        perceptualSig,
        details.width,
        details.height,
        details.capturedAt ?? null,
        details.exifData ?? null,
        status,
        errorReason,
        new Date().toISOString(),
        fileId
      );

    if (result.changes === 0) {
      throw new StoreError(`No live file with id ${fileId}`, 'recordSignature');
    }
  }

  recordJunkVerdict(fileId: number, isJunk: boolean, reason: string | null): void {
    const result = this.db
      .prepare<[number, string | null, string, number]>(
        `UPDATE files SET is_junk = ?, junk_reason = ?, updated_at = ?
         WHERE id = ? AND status != 'removed'`
      )
      .run(isJunk ? 1 : 0, isJunk ? reason : null, new Date().toISOString(), fileId);

    if (result.changes === 0) {
      throw new StoreError(`No live file with id ${fileId}`, 'recordJunkVerdict');
    }
  }

  listSignedFiles(): SignedFile[] {
    const rows = this.db
      .prepare<[], Pick<FileRow, 'id' | 'path' | 'exact_sig' | 'perceptual_sig' | 'kind'>>(
        `SELECT id, path, exact_sig, perceptual_sig, kind FROM files
         WHERE status = 'signed' AND exact_sig IS NOT NULL
         ORDER BY path`
      )
      .all();

    const files: SignedFile[] = [];

    for (const row of rows) {
      if (row.exact_sig === null) continue;

      files.push({
        fileId: row.id,
        path: row.path,
        exactSig: row.exact_sig,
        perceptualSig: row.perceptual_sig,
        kind: row.kind,
      });
    }

    return files;
  }

  private activeGroupKeys(): Array<{ key: string; id: number }> {
    const groups = this.db
      .prepare<[], GroupRow>('SELECT id, relation, canonical_file_id, threshold FROM duplicate_groups WHERE retired_at IS NULL')
      .all();
    const members = this.liveMembers();

    return groups.map((group) => {
      const memberIds = (members.get(group.id) ?? []).map((member) => member.id);
      const key = groupKey({
        relation: group.relation,
        canonicalId: group.canonical_file_id,
        threshold: group.threshold,
        memberIds,
      });
      return { key, id: group.id };
    });
  }

  private liveMembers(): Map<number, MemberRow[]> {
    const rows = this.db
      .prepare<[], MemberRow>(
        `SELECT group_id, id, path, size FROM files
         WHERE group_id IS NOT NULL AND status != 'removed'
         ORDER BY path`
      )
      .all();

    const byGroup = new Map<number, MemberRow[]>();

    for (const row of rows) {
      const list = byGroup.get(row.group_id);

      if (list) {
        list.push(row);
      } else {
        byGroup.set(row.group_id, [row]);
      }
    }

    return byGroup;
  }

  replaceDuplicateGroups(groups: DuplicateGroup[]): boolean {
    return this.transaction('replaceDuplicateGroups', () => {
      const wanted = new Map(groups.map((group) => [groupKey(group), group]));
      const kept = new Set<string>();
      const stale: number[] = [];

      for (const { key, id } of this.activeGroupKeys()) {
        if (wanted.has(key) && !kept.has(key)) {
          kept.add(key);
        } else {
          stale.push(id);
        }
      }

      const fresh = [...wanted.entries()].filter(([key]) => !kept.has(key));

      if (stale.length === 0 && fresh.length === 0) {
        return false;
      }

      const now = new Date().toISOString();
      const retire = this.db.prepare<[string, number]>('UPDATE duplicate_groups SET retired_at = ? WHERE id = ?');
      const detach = this.db.prepare<[string, number]>(
        `UPDATE files SET group_id = NULL, updated_at = ? WHERE group_id = ? AND status != 'removed'`
      );

      for (const groupId of stale) {
        retire.run(now, groupId);
        detach.run(now, groupId);
      }

      const insert = this.db.prepare<[RelationKind, number, number | null, string]>(
        'INSERT INTO duplicate_groups (relation, canonical_file_id, threshold, created_at) VALUES (?, ?, ?, ?)'
      );
      const attach = this.db.prepare<[number, string, number]>(
        `UPDATE files SET group_id = ?, updated_at = ? WHERE id = ? AND status = 'signed'`
      );

      for (const [, group] of fresh) {
        const groupId = Number(insert.run(group.relation, group.canonicalId, group.threshold, now).lastInsertRowid);

        for (const memberId of group.memberIds) {
          if (attach.run(groupId, now, memberId).changes === 0) {
            throw new StoreError(`Group member ${memberId} is not a signed file`, 'replaceDuplicateGroups');
          }
        }
      }

      return true;
    });
  }

  tombstoneMissing(paths: string[]): number {
    if (paths.length === 0) {
      return 0;
    }

    return this.transaction('tombstoneMissing', () => {
      const now = new Date().toISOString();
      const statement = this.db.prepare<[string, string, string]>(
        `UPDATE files SET status = 'removed', removed_at = ?, updated_at = ?
         WHERE path = ? AND status != 'removed'`
      );

      let count = 0;
      for (const path of paths) {
        count += statement.run(now, now, path).changes;
      }

      return count;
    });
  }

  listTrackedFiles(): TrackedFile[] {
    return this.db
      .prepare<[], Pick<FileRow, 'id' | 'path' | 'size' | 'mtime_ms' | 'status' | 'error_reason'>>(
        `SELECT id, path, size, mtime_ms, status, error_reason FROM files WHERE status != 'removed' ORDER BY path`
      )
      .all()
      .map((row) => ({
        fileId: row.id,
        path: row.path,
        size: row.size,
        mtimeMs: row.mtime_ms,
        status: row.status,
        errorReason: row.error_reason,
      }));
  }

  getFile(fileId: number): MediaFile | null {
    const row = this.db.prepare<[number], FileRow>('SELECT * FROM files WHERE id = ?').get(fileId);
    return row ? toMediaFile(row) : null;
  }

  getFileByPath(path: string): MediaFile | null {
    const row = this.db.prepare<[string], FileRow>('SELECT * FROM files WHERE path = ?').get(path);
    return row ? toMediaFile(row) : null;
  }

  listDuplicateGroups(): StoredDuplicateGroup[] {
    const groups = this.db
      .prepare<[], GroupRow>(
        `SELECT id, relation, canonical_file_id, threshold FROM duplicate_groups
         WHERE retired_at IS NULL ORDER BY id`
      )
      .all();
    const members = this.liveMembers();
    const result: StoredDuplicateGroup[] = [];

    for (const group of groups) {
      const list = members.get(group.id) ?? [];
      const canonical = list.find((member) => member.id === group.canonical_file_id);

      result.push({
        id: group.id,
        relation: group.relation,
        canonicalId: group.canonical_file_id,
        canonicalPath: canonical?.path ?? '',
        threshold: group.threshold,
        memberIds: list.map((member) => member.id),
        members: list.map((member) => ({ fileId: member.id, path: member.path, size: member.size })),
      });
    }

    return result.sort((a, b) => (a.canonicalPath < b.canonicalPath ? -1 : a.canonicalPath > b.canonicalPath ? 1 : 0));
  }

  listJunkFiles(): MediaFile[] {
    return this.db
      .prepare<[], FileRow>(
        `SELECT * FROM files WHERE is_junk = 1 AND status != 'removed' ORDER BY junk_reason, path`
      )
      .all()
      .map(toMediaFile);
  }

  getStats(): StoreStats {
    const row = this.db
      .prepare<[], Omit<StoreStats, 'exactGroups' | 'nearGroups'>>(
        `SELECT
           COALESCE(SUM(status != 'removed'), 0) AS totalFiles,
           COALESCE(SUM(status != 'removed' AND kind = 'image'), 0) AS images,
           COALESCE(SUM(status != 'removed' AND kind = 'video'), 0) AS videos,
           COALESCE(SUM(status = 'signed'), 0) AS signed,
           COALESCE(SUM(status = 'error'), 0) AS errors,
           COALESCE(SUM(status = 'removed'), 0) AS removed,
           COALESCE(SUM(status != 'removed' AND is_junk = 1), 0) AS junk,
           COALESCE(SUM(status != 'removed' AND group_id IS NOT NULL), 0) AS filesInGroups,
           COALESCE(SUM(CASE WHEN status != 'removed' THEN size ELSE 0 END), 0) AS totalSize
         FROM files`
      )
      .get();

    const groups = this.db
      .prepare<[], { exactGroups: number; nearGroups: number }>(
        `SELECT
           COALESCE(SUM(relation = 'exact'), 0) AS exactGroups,
           COALESCE(SUM(relation = 'near'), 0) AS nearGroups
         FROM duplicate_groups WHERE retired_at IS NULL`
      )
      .get();

    return {
      totalFiles: row?.totalFiles ?? 0,
      images: row?.images ?? 0,
      videos: row?.videos ?? 0,
      signed: row?.signed ?? 0,
      errors: row?.errors ?? 0,
      removed: row?.removed ?? 0,
      junk: row?.junk ?? 0,
      exactGroups: groups?.exactGroups ?? 0,
      nearGroups: groups?.nearGroups ?? 0,
      filesInGroups: row?.filesInGroups ?? 0,
      totalSize: row?.totalSize ?? 0,
    };
  }

  purgeRemoved(): PurgeResult {
    return this.transaction('purgeRemoved', () => {
      const filesPurged = this.db.prepare("DELETE FROM files WHERE status = 'removed'").run().changes;
      const groupsPurged = this.db
        .prepare(
          `DELETE FROM duplicate_groups
           WHERE retired_at IS NOT NULL
             AND id NOT IN (SELECT group_id FROM files WHERE group_id IS NOT NULL)`
        )
        .run().changes;

      return { filesPurged, groupsPurged };
    });
  }

  /**
   * Diagnostic: rows modified since the connection was opened. Not part of
   * `MediaStore`; callers use it to confirm a pass wrote nothing.
   */
  getTotalChanges(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT total_changes() AS n').get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

export function openStore(dbPath: string): SqliteMediaStore {
  return new SqliteMediaStore(dbPath);
}
