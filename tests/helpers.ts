import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import sharp from 'sharp';
import { parseConfig, type ConfigInput } from '../src/config.js';
import type { FrameSampler } from '../src/frame-sampler.js';
import type { Config } from '../src/types.js';

export async function makeTempDir(prefix: string = 'media-dedupe-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Small deterministic PRNG (mulberry32). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * An 8x8 checkerboard of random grey levels, `size` pixels square, as raw
 * RGB.
 */
export function blockPattern(seed: number, size: number = 256): Buffer {
  const random = seededRandom(seed);
  const levels = Array.from({ length: 64 }, () => Math.floor(random() * 256));
  const block = size / 8;
  const pixels = Buffer.alloc(size * size * 3);

  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const level = levels[Math.floor(y / block) * 8 + Math.floor(x / block)];
      const offset = (y * size + x) * 3;
      pixels[offset] = level;
      pixels[offset + 1] = level;
      pixels[offset + 2] = level;
    }
  }

  return pixels;
}

export async function blockImagePng(seed: number, size: number = 256): Promise<Buffer> {
  return sharp(blockPattern(seed, size), { raw: { width: size, height: size, channels: 3 } })
    .png()
    .toBuffer();
}

export async function writeBlockImage(path: string, seed: number, size: number = 256): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, await blockImagePng(seed, size));
}

export async function writeResizedCopy(source: Buffer, path: string, size: number): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, await sharp(source).resize(size, size).png().toBuffer());
}

export function testConfig(scanRoot: string, overrides: ConfigInput = {}): Config {
  return parseConfig({
    scanRoot,
    dbPath: ':memory:',
    dataDir: join(scanRoot, '.data'),
    concurrency: 3,
    ...overrides,
    junk: { minBytes: 0, minWidth: 0, minHeight: 0, ...overrides.junk },
  });
}

export class FakeFrameSampler implements FrameSampler {
  readonly calls: Array<{ videoPath: string; count: number }> = [];

  constructor(private readonly frames: (videoPath: string) => Promise<Buffer[]> | Buffer[] = () => []) {}

  async extractFrames(videoPath: string, count: number): Promise<Buffer[]> {
    this.calls.push({ videoPath, count });
    return this.frames(videoPath);
  }
}
