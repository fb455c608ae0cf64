/**
 * 64-bit DCT perceptual hash over a square luminance grid.
 *
 * The grid is transformed with an unnormalised 2-D DCT-II, the lowest 8x8
 * frequencies are kept and every coefficient is compared against their
 * median. Bits are emitted row-major, most significant first, and rendered
 * as 16 hex characters.
 */

export const GRID_SIZE = 32;
export const HASH_SIZE = 8;
export const HASH_BITS = HASH_SIZE * HASH_SIZE;

const cosineTable = buildCosineTable(GRID_SIZE);

function buildCosineTable(n: number): Float64Array {
  const table = new Float64Array(n * n);

  for (let k = 0; k < n; k++) {
    for (let i = 0; i < n; i++) {
      table[k * n + i] = Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
  }

  return table;
}

/**
 * Returns only the `keep` x `keep` lowest-frequency coefficients, which is
 * all the hash needs.
 */
function lowFrequencyDct(pixels: ArrayLike<number>, n: number, keep: number): Float64Array {
  const rows = new Float64Array(n * keep);

  // Along x for every row.
  for (let y = 0; y < n; y++) {
    for (let u = 0; u < keep; u++) {
      let sum = 0;
      for (let x = 0; x < n; x++) {
        sum += pixels[y * n + x] * cosineTable[u * n + x];
      }
      rows[y * keep + u] = 2 * sum;
    }
  }

  const out = new Float64Array(keep * keep);

  // Then along y.
  for (let v = 0; v < keep; v++) {
    for (let u = 0; u < keep; u++) {
      let sum = 0;
      for (let y = 0; y < n; y++) {
        sum += rows[y * keep + u] * cosineTable[v * n + y];
      }
      out[v * keep + u] = 2 * sum;
    }
  }

  return out;
}

function median(values: Float64Array): number {
  const sorted = Array.from(values).sort((a, b) => a - b);
  const mid = sorted.length >> 1;

  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }

  return sorted[mid];
}

export function bitsToHex(bits: ArrayLike<number>): string {
  let hex = '';

  for (let i = 0; i < bits.length; i += 4) {
    const nibble = (bits[i] << 3) | (bits[i + 1] << 2) | (bits[i + 2] << 1) | bits[i + 3];
    hex += nibble.toString(16);
  }

  return hex;
}

export function hexToBits(hex: string): Uint8Array {
  const bits = new Uint8Array(hex.length * 4);

  for (let i = 0; i < hex.length; i++) {
    const nibble = parseInt(hex[i], 16);

    if (Number.isNaN(nibble)) {
      throw new Error(`Invalid hex digit "${hex[i]}" in signature ${hex}`);
    }

    bits[i * 4] = (nibble >> 3) & 1;
    bits[i * 4 + 1] = (nibble >> 2) & 1;
    bits[i * 4 + 2] = (nibble >> 1) & 1;
    bits[i * 4 + 3] = nibble & 1;
  }

  return bits;
}

/**
 * `pixels` holds GRID_SIZE * GRID_SIZE luminance values, row-major.
 */
export function perceptualHashFromGrid(pixels: ArrayLike<number>): string {
  if (pixels.length !== GRID_SIZE * GRID_SIZE) {
    throw new Error(`Expected ${GRID_SIZE * GRID_SIZE} luminance values, got ${pixels.length}`);
  }

  const coefficients = lowFrequencyDct(pixels, GRID_SIZE, HASH_SIZE);
  const threshold = median(coefficients);
  const bits = new Uint8Array(HASH_BITS);

  for (let i = 0; i < HASH_BITS; i++) {
    bits[i] = coefficients[i] > threshold ? 1 : 0;
  }

  return bitsToHex(bits);
}

const POPCOUNT = [0, 1, 1, 2, 1, 2, 2, 3, 1, 2, 2, 3, 2, 3, 3, 4];

export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) {
    throw new Error(`Cannot compare signatures of different widths (${a.length} vs ${b.length})`);
  }

  let distance = 0;

  for (let i = 0; i < a.length; i++) {
    distance += POPCOUNT[parseInt(a[i], 16) ^ parseInt(b[i], 16)];
  }

  return distance;
}

/**
 * Per-bit majority vote across several signatures of equal width. A tie
 * resolves to 0.
 */
export function combineSignatures(signatures: string[]): string | null {
  if (signatures.length === 0) {
    return null;
  }

  if (signatures.length === 1) {
    return signatures[0];
  }

  const width = signatures[0].length;
  const counts = new Uint16Array(width * 4);

  for (const signature of signatures) {
    if (signature.length !== width) {
      throw new Error('Cannot combine signatures of different widths');
    }

    const bits = hexToBits(signature);
    for (let i = 0; i < bits.length; i++) {
      counts[i] += bits[i];
    }
  }

  const majority = new Uint8Array(counts.length);
  for (let i = 0; i < counts.length; i++) {
    majority[i] = counts[i] * 2 > signatures.length ? 1 : 0;
  }

  return bitsToHex(majority);
}
