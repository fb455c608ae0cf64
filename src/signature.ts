import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import sharp from 'sharp';
import { SignatureError, classifyError, errorMessage } from './errors.js';
import { readExif } from './exif.js';
import type { FrameSampler } from './frame-sampler.js';
import { logger } from './logger.js';
import { GRID_SIZE, combineSignatures, perceptualHashFromGrid } from './phash.js';
import type { DiscoveredFile, SignatureResult } from './types.js';

const READ_CHUNK_BYTES = 1024 * 1024;

export interface ImageSignature {
  perceptualSig: string;
  width: number | null;
  height: number | null;
  capturedAt: string | null;
  exifData: string | null;
}

// EXIF orientations 5-8 turn the picture a quarter, so stored width is displayed height.
const QUARTER_TURN_ORIENTATION = 5;

export interface SignOptions {
  sampler: FrameSampler;
  frameCount: number;
}

/**
 * SHA-256 of the file's bytes, read in bounded chunks.
 */
export async function computeExactSignature(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(filePath, { highWaterMark: READ_CHUNK_BYTES });

  for await (const chunk of stream) {
    hash.update(chunk);
  }

  return hash.digest('hex');
}

/**
 * Decodes an image (path or in-memory buffer), turns it upright, reduces it
 * to a GRID_SIZE x GRID_SIZE luminance grid and hashes it. Width and height
 * are the upright dimensions.
 */
export async function computeImageSignature(input: string | Buffer): Promise<ImageSignature> {
  const source = typeof input === 'string' ? input : '<frame>';

  try {
    const metadata = await sharp(input).metadata();
    const { data, info } = await sharp(input)
      .rotate()
      .removeAlpha()
      .greyscale()
      .resize(GRID_SIZE, GRID_SIZE, { fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    const luma = new Float64Array(GRID_SIZE * GRID_SIZE);
    for (let i = 0; i < luma.length; i++) {
      luma[i] = data[i * info.channels];
    }

    const width = metadata.width ?? null;
    const height = metadata.height ?? null;
    const turned = (metadata.orientation ?? 1) >= QUARTER_TURN_ORIENTATION;

    return {
      perceptualSig: perceptualHashFromGrid(luma),
      width: turned ? height : width,
      height: turned ? width : height,
      ...readExif(metadata.exif, source),
    };
  } catch (error) {
    throw new SignatureError(`Cannot decode image: ${errorMessage(error)}`, classifyError(error), source, {
      cause: error,
    });
  }
}

async function computeVideoSignature(
  filePath: string,
  options: SignOptions
): Promise<Pick<ImageSignature, 'perceptualSig' | 'width' | 'height'> | null> {
  let frames: Buffer[] = [];

  try {
    frames = await options.sampler.extractFrames(filePath, options.frameCount);
  } catch (error) {
    logger.warn(`Frame sampling failed, keeping exact signature only: ${filePath}`, {
      error: errorMessage(error),
    });
    return null;
  }

  const signatures: ImageSignature[] = [];

  for (const frame of frames) {
    try {
      signatures.push(await computeImageSignature(frame));
    } catch (error) {
      logger.debug(`Skipping undecodable frame from ${filePath}`, { error: errorMessage(error) });
    }
  }

  const combined = combineSignatures(signatures.map((signature) => signature.perceptualSig));

  if (combined === null) {
    return null;
  }

  return {
    perceptualSig: combined,
    width: signatures[0].width,
    height: signatures[0].height,
  };
}

function failed(error: unknown): SignatureResult {
  const kind = classifyError(error);

  return {
    status: 'error',
    exactSig: null,
    perceptualSig: null,
    width: null,
    height: null,
    capturedAt: null,
    exifData: null,
    errorReason: `${kind} error: ${errorMessage(error)}`,
  };
}

/**
 * Never rejects: read and decode failures come back as an `error` result.
 * A video whose frames cannot be sampled is still signed, with no
 * perceptual signature.
 */
export async function signFile(file: DiscoveredFile, options: SignOptions): Promise<SignatureResult> {
  let exactSig: string;

  try {
    exactSig = await computeExactSignature(file.path);
  } catch (error) {
    return failed(error);
  }

  if (file.kind === 'image') {
    try {
      const image = await computeImageSignature(file.path);
      return { status: 'signed', exactSig, errorReason: null, ...image };
    } catch (error) {
      return failed(error);
    }
  }

  const video = await computeVideoSignature(file.path, options);

  return {
    status: 'signed',
    exactSig,
    perceptualSig: video?.perceptualSig ?? null,
    width: video?.width ?? null,
    height: video?.height ?? null,
    capturedAt: null,
    exifData: null,
    errorReason: null,
  };
}
