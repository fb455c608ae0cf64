export type MediaKind = 'image' | 'video';

export type FileStatus = 'discovered' | 'signed' | 'error' | 'removed';

export type RelationKind = 'exact' | 'near';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface JunkConfig {
  minBytes: number;
  minWidth: number;
  minHeight: number;
  patterns: string[];
}

export interface Config {
  scanRoot: string;
  dbPath: string;
  dataDir: string;
  imageExtensions: string[];
  videoExtensions: string[];
  nearDuplicateThreshold: number;
  junk: JunkConfig;
  videoSampleFrames: number;
  frameTimeoutMs: number;
  concurrency: number;
  includeHidden: boolean;
  followSymlinks: boolean;
  logLevel: LogLevel;
}

export interface DiscoveredFile {
  path: string;
  size: number;
  mtimeMs: number;
  kind: MediaKind;
}

export interface TrackedFile {
  fileId: number;
  path: string;
  size: number;
  mtimeMs: number;
  status: FileStatus;
  errorReason: string | null;
}

export interface MediaFile {
  id: number;
  path: string;
  size: number;
  mtimeMs: number;
  kind: MediaKind;
  exactSig: string | null;
  perceptualSig: string | null;
  width: number | null;
  height: number | null;
  capturedAt: string | null;
  exifData: string | null;
  status: FileStatus;
  errorReason: string | null;
  isJunk: boolean;
  junkReason: string | null;
  groupId: number | null;
  discoveredAt: string;
  updatedAt: string;
  removedAt: string | null;
}

export interface SignedFile {
  fileId: number;
  path: string;
  exactSig: string;
  perceptualSig: string | null;
  kind: MediaKind;
}

export interface ReconcilePlan {
  new: DiscoveredFile[];
  changed: DiscoveredFile[];
  unchanged: DiscoveredFile[];
  missing: string[];
}

export interface SignatureResult {
  status: 'signed' | 'error';
  exactSig: string | null;
  perceptualSig: string | null;
  width: number | null;
  height: number | null;
  capturedAt: string | null;
  exifData: string | null;
  errorReason: string | null;
}

export interface JunkVerdict {
  isJunk: boolean;
  ruleId: string | null;
  reason: string | null;
}

export interface DuplicateGroup {
  relation: RelationKind;
  canonicalId: number;
  threshold: number | null;
  memberIds: number[];
}

export interface StoredDuplicateGroup extends DuplicateGroup {
  id: number;
  canonicalPath: string;
  members: Array<{ fileId: number; path: string; size: number }>;
}

export interface StoreStats {
  totalFiles: number;
  images: number;
  videos: number;
  signed: number;
  errors: number;
  removed: number;
  junk: number;
  exactGroups: number;
  nearGroups: number;
  filesInGroups: number;
  totalSize: number;
}

export interface PurgeResult {
  filesPurged: number;
  groupsPurged: number;
}

export interface FileFailure {
  path: string;
  stage: 'sign' | 'store';
  message: string;
}

export interface ScanResult {
  root: string;
  discovered: number;
  new: number;
  changed: number;
  unchanged: number;
  missing: number;
  signed: number;
  errors: number;
  junk: number;
  failures: FileFailure[];
  exactGroups: number;
  nearGroups: number;
  tombstoned: number;
  skippedDirectories: string[];
  clustered: boolean;
  clusterError: string | null;
  aborted: boolean;
}

export interface DuplicatesReport {
  generatedAt: string;
  totalGroups: number;
  groups: Array<{
    id: number;
    relation: RelationKind;
    threshold: number | null;
    canonical: string;
    files: string[];
    reclaimableBytes: number;
  }>;
}

export interface JunkReport {
  generatedAt: string;
  totalFiles: number;
  files: Array<{
    path: string;
    size: number;
    reason: string;
  }>;
}
