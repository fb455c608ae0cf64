import { hammingDistance, hexToBits } from './phash.js';
import { UnionFind } from './union-find.js';
import type { DuplicateGroup, SignedFile } from './types.js';

export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Rebuilds every duplicate group from the current signature set.
 *
 * Exact groups partition by exact signature. Near groups are the connected
 * components (distance <= threshold) among the remaining files of the same
 * media kind that have a perceptual signature. The canonical member of any
 * group is its lexicographically smallest path.
 */
export function findDuplicateGroups(files: SignedFile[], threshold: number): DuplicateGroup[] {
  const sorted = [...files].sort((a, b) => comparePaths(a.path, b.path));
  const exactGroups = findExactGroups(sorted);

  const claimed = new Set<number>();
  for (const group of exactGroups) {
    for (const id of group.memberIds) {
      claimed.add(id);
    }
  }

  const remaining = sorted.filter((file) => !claimed.has(file.fileId) && file.perceptualSig !== null);
  const nearGroups: DuplicateGroup[] = [];

  for (const kind of ['image', 'video'] as const) {
    const candidates = remaining.filter((file) => file.kind === kind);
    nearGroups.push(...findNearGroups(candidates, threshold));
  }

  const pathById = new Map(sorted.map((file) => [file.fileId, file.path]));

  return [...exactGroups, ...nearGroups].sort((a, b) =>
    comparePaths(pathById.get(a.canonicalId) ?? '', pathById.get(b.canonicalId) ?? '')
  );
}

function findExactGroups(sorted: SignedFile[]): DuplicateGroup[] {
  const bySignature = new Map<string, SignedFile[]>();

  for (const file of sorted) {
    const members = bySignature.get(file.exactSig);

    if (members) {
      members.push(file);
    } else {
      bySignature.set(file.exactSig, [file]);
    }
  }

  const groups: DuplicateGroup[] = [];

  for (const members of bySignature.values()) {
    if (members.length < 2) {
      continue;
    }

    groups.push({
      relation: 'exact',
      canonicalId: members[0].fileId,
      threshold: null,
      memberIds: members.map((file) => file.fileId),
    });
  }

  return groups;
}

/**
 * `candidates` must be sorted by path. Pairs are pruned with the pigeonhole
 * principle: split every signature into threshold+1 bit segments, and any
 * two signatures within the threshold agree exactly on at least one segment.
 * Only pairs sharing a segment are measured, which yields the same
 * components as comparing every pair.
 */
export function findNearGroups(candidates: SignedFile[], threshold: number): DuplicateGroup[] {
  const uf = new UnionFind(candidates.length);
  const signatures = candidates.map((file) => file.perceptualSig ?? '');

  for (const bucket of buildBuckets(signatures, threshold)) {
    for (let i = 0; i < bucket.length; i++) {
      for (let j = i + 1; j < bucket.length; j++) {
        const a = bucket[i];
        const b = bucket[j];

        if (uf.find(a) === uf.find(b)) {
          continue;
        }

        if (hammingDistance(signatures[a], signatures[b]) <= threshold) {
          uf.union(a, b);
        }
      }
    }
  }

  return uf.sets(2).map((indices) => ({
    relation: 'near' as const,
    canonicalId: candidates[indices[0]].fileId,
    threshold,
    memberIds: indices.map((index) => candidates[index].fileId),
  }));
}

function segmentBounds(width: number, segments: number): Array<[number, number]> {
  const bounds: Array<[number, number]> = [];
  const base = Math.floor(width / segments);
  const extra = width % segments;
  let start = 0;

  for (let s = 0; s < segments; s++) {
    const length = base + (s < extra ? 1 : 0);
    bounds.push([start, start + length]);
    start += length;
  }

  return bounds;
}

function buildBuckets(signatures: string[], threshold: number): number[][] {
  const byWidth = new Map<number, number[]>();

  signatures.forEach((signature, index) => {
    const width = signature.length * 4;
    const indices = byWidth.get(width);

    if (indices) {
      indices.push(index);
    } else {
      byWidth.set(width, [index]);
    }
  });

  const buckets: number[][] = [];

  for (const [width, indices] of byWidth) {
    const segments = threshold + 1;

    // Too few bits to split: every pair is a candidate.
    if (segments > width) {
      buckets.push(indices);
      continue;
    }

    const bounds = segmentBounds(width, segments);
    const keyed = new Map<string, number[]>();

    for (const index of indices) {
      const bits = hexToBits(signatures[index]);

      bounds.forEach(([start, end], segment) => {
        const key = `${segment}:${bits.subarray(start, end).join('')}`;
        const bucket = keyed.get(key);

        if (bucket) {
          bucket.push(index);
        } else {
          keyed.set(key, [index]);
        }
      });
    }

    for (const bucket of keyed.values()) {
      if (bucket.length > 1) {
        buckets.push(bucket);
      }
    }
  }

  return buckets;
}
