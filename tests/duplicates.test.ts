/**
 * Duplicate clustering: exact partition, near transitive closure and
 * segment pruning.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { comparePaths, findDuplicateGroups, findNearGroups } from '../src/duplicates.js';
import { hammingDistance } from '../src/phash.js';
import { UnionFind } from '../src/union-find.js';
import type { MediaKind, SignedFile } from '../src/types.js';
import { seededRandom } from './helpers.js';

let nextId = 1;

function signed(path: string, exactSig: string, perceptualSig: string | null, kind: MediaKind = 'image'): SignedFile {
  return { fileId: nextId++, path, exactSig, perceptualSig, kind };
}

function randomSignature(random: () => number): string {
  let hex = '';
  for (let i = 0; i < 16; i++) {
    hex += Math.floor(random() * 16).toString(16);
  }
  return hex;
}

function flipBits(signature: string, count: number, random: () => number): string {
  const bits = signature.split('').flatMap((digit) => {
    const nibble = parseInt(digit, 16);
    return [(nibble >> 3) & 1, (nibble >> 2) & 1, (nibble >> 1) & 1, nibble & 1];
  });

  const flipped = new Set<number>();
  while (flipped.size < count) {
    flipped.add(Math.floor(random() * bits.length));
  }
  for (const index of flipped) {
    bits[index] ^= 1;
  }

  let hex = '';
  for (let i = 0; i < bits.length; i += 4) {
    hex += ((bits[i] << 3) | (bits[i + 1] << 2) | (bits[i + 2] << 1) | bits[i + 3]).toString(16);
  }
  return hex;
}

/** Every pair compared; the reference the pruned search must agree with. */
function bruteForceComponents(candidates: SignedFile[], threshold: number): number[][] {
  const uf = new UnionFind(candidates.length);

  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      const a = candidates[i].perceptualSig ?? '';
      const b = candidates[j].perceptualSig ?? '';
      if (hammingDistance(a, b) <= threshold) {
        uf.union(i, j);
      }
    }
  }

  return uf.sets(2).map((indices) => indices.map((index) => candidates[index].fileId));
}

function syntheticLibrary(seed: number, bases: number, variants: number, maxFlips: number): SignedFile[] {
  const random = seededRandom(seed);
  const files: SignedFile[] = [];
  let n = 0;

  for (let b = 0; b < bases; b++) {
    const base = randomSignature(random);
    for (let v = 0; v < variants; v++) {
      const sig = flipBits(base, Math.floor(random() * (maxFlips + 1)), random);
      files.push(signed(`/lib/${String(n).padStart(4, '0')}.jpg`, `exact-${n}`, sig));
      n++;
    }
  }

  return files;
}

// ============================================================================
// comparePaths
// ============================================================================

test('comparePaths: orders by code unit, not locale', () => {
  assert.deepEqual(['/b', '/B', '/a', '/_'].sort(comparePaths), ['/B', '/_', '/a', '/b']);
});

// ============================================================================
// Exact groups
// ============================================================================

test('findDuplicateGroups: groups identical bytes and picks the smallest path as canonical', () => {
  const c = signed('/photos/c.jpg', 'same', '0000000000000000');
  const a = signed('/photos/a.jpg', 'same', '0000000000000000');
  const b = signed('/photos/b.jpg', 'same', '0000000000000000');
  const other = signed('/photos/z.jpg', 'different', 'ffffffffffffffff');

  const groups = findDuplicateGroups([c, other, a, b], 8);

  assert.deepEqual(groups, [
    { relation: 'exact', canonicalId: a.fileId, threshold: null, memberIds: [a.fileId, b.fileId, c.fileId] },
  ]);
});

test('findDuplicateGroups: exact members are not offered to near clustering', () => {
  const a = signed('/x/a.png', 'dup', '0000000000000000');
  const b = signed('/x/b.png', 'dup', '0000000000000000');
  const d = signed('/x/d.png', 'unique', '0000000000000001');

  const groups = findDuplicateGroups([a, b, d], 8);

  assert.equal(groups.length, 1);
  assert.equal(groups[0].relation, 'exact');
  assert.deepEqual(groups[0].memberIds, [a.fileId, b.fileId]);
});

test('findDuplicateGroups: exact groups form even without perceptual signatures', () => {
  const a = signed('/v/a.mp4', 'clip', null, 'video');
  const b = signed('/v/b.mp4', 'clip', null, 'video');

  const groups = findDuplicateGroups([b, a], 8);

  assert.deepEqual(groups, [
    { relation: 'exact', canonicalId: a.fileId, threshold: null, memberIds: [a.fileId, b.fileId] },
  ]);
});

test('findDuplicateGroups: a single file forms no group', () => {
  assert.deepEqual(findDuplicateGroups([signed('/only.jpg', 'x', '0000000000000000')], 8), []);
  assert.deepEqual(findDuplicateGroups([], 8), []);
});

// ============================================================================
// Near groups
// ============================================================================

test('findDuplicateGroups: near membership is transitive', () => {
  // A-B and B-C are 5 bits apart; A-C is 10.
  const a = signed('/n/a.jpg', 'ea', '0000000000000000');
  const b = signed('/n/b.jpg', 'eb', '1f00000000000000');
  const c = signed('/n/c.jpg', 'ec', '1f1f000000000000');

  assert.equal(hammingDistance('0000000000000000', '1f1f000000000000'), 10);

  const groups = findDuplicateGroups([c, b, a], 5);

  assert.deepEqual(groups, [
    { relation: 'near', canonicalId: a.fileId, threshold: 5, memberIds: [a.fileId, b.fileId, c.fileId] },
  ]);
});

test('findDuplicateGroups: distance equal to the threshold counts as near', () => {
  const a = signed('/t/a.jpg', 'ta', '0000000000000000');
  const b = signed('/t/b.jpg', 'tb', '0700000000000000');

  assert.equal(findDuplicateGroups([a, b], 3).length, 1);
  assert.equal(findDuplicateGroups([a, b], 2).length, 0);
});

test('findDuplicateGroups: images and videos never share a near group', () => {
  const image = signed('/m/a.jpg', 'i', '0000000000000000', 'image');
  const video = signed('/m/b.mp4', 'v', '0000000000000000', 'video');

  assert.deepEqual(findDuplicateGroups([image, video], 8), []);
});

test('findDuplicateGroups: files without a perceptual signature are left out of near groups', () => {
  const a = signed('/s/a.mp4', 'va', null, 'video');
  const b = signed('/s/b.mp4', 'vb', null, 'video');

  assert.deepEqual(findDuplicateGroups([a, b], 64), []);
});

test('findDuplicateGroups: groups come back ordered by canonical path', () => {
  const z1 = signed('/z/1.jpg', 'zz', '0000000000000000');
  const z2 = signed('/z/2.jpg', 'zz', '0000000000000000');
  const a1 = signed('/a/1.jpg', 'a1', 'ffffffffffffffff');
  const a2 = signed('/a/2.jpg', 'a2', 'fffffffffffffffe');

  const groups = findDuplicateGroups([z2, a2, z1, a1], 4);

  assert.deepEqual(
    groups.map((group) => [group.relation, group.canonicalId]),
    [
      ['near', a1.fileId],
      ['exact', z1.fileId],
    ]
  );
});

test('findNearGroups: threshold 0 groups only identical perceptual signatures', () => {
  const a = signed('/0/a.jpg', 'a', '00000000000000ff');
  const b = signed('/0/b.jpg', 'b', '00000000000000ff');
  const c = signed('/0/c.jpg', 'c', '00000000000000fe');

  const groups = findNearGroups([a, b, c], 0);

  assert.deepEqual(groups, [{ relation: 'near', canonicalId: a.fileId, threshold: 0, memberIds: [a.fileId, b.fileId] }]);
});

test('findNearGroups: a threshold of the full width joins everything', () => {
  const a = signed('/w/a.jpg', 'a', '0000000000000000');
  const b = signed('/w/b.jpg', 'b', 'ffffffffffffffff');

  const groups = findNearGroups([a, b], 64);

  assert.deepEqual(groups[0].memberIds, [a.fileId, b.fileId]);
});

test('findNearGroups: pruned search matches comparing every pair', () => {
  for (const [seed, threshold, maxFlips] of [
    [101, 4, 3],
    [202, 8, 6],
    [303, 12, 10],
    [404, 2, 3],
  ]) {
    const candidates = syntheticLibrary(seed, 15, 6, maxFlips);
    const expected = bruteForceComponents(candidates, threshold);
    const actual = findNearGroups(candidates, threshold).map((group) => group.memberIds);

    assert.ok(expected.length > 0, `seed ${seed} should produce some groups`);
    assert.deepEqual(actual, expected, `seed ${seed}, threshold ${threshold}`);
  }
});
