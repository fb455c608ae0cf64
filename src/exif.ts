import exifReader from 'exif-reader';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

export interface ExifSummary {
  /** Wall-clock capture time as `YYYY-MM-DDTHH:MM:SS`, no zone. */
  capturedAt: string | null;
  /** Decoded tags grouped by IFD, as JSON. */
  exifData: string | null;
}

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const MAX_TEXT_BYTES = 200;

// First valid entry wins.
const CAPTURE_TAGS: ReadonlyArray<readonly [section: string, tag: string]> = [
  ['Photo', 'DateTimeOriginal'],
  ['Photo', 'DateTimeDigitized'],
  ['Image', 'DateTime'],
];

const EXIF_DATE = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})/;

function isRecord(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function entriesOf(value: object): Array<[string, unknown]> {
  return Object.entries(value);
}

function field(value: unknown, name: string): unknown {
  if (!isRecord(value)) {
    return undefined;
  }

  return entriesOf(value).find(([key]) => key === name)?.[1];
}

function toCaptureTime(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 19);
  }

  if (typeof value === 'string') {
    const match = EXIF_DATE.exec(value.trim());
    if (!match) return null;

    const [, year, month, day, hour, minute, second] = match;
    return `${year}-${month}-${day}T${hour}:${minute}:${second}`;
  }

  return null;
}

/**
 * Picks the capture time from decoded EXIF sections, preferring the moment
 * the shutter fired over the digitised and last-modified stamps.
 */
export function pickCaptureTime(tags: unknown): string | null {
  for (const [section, tag] of CAPTURE_TAGS) {
    const time = toCaptureTime(field(field(tags, section), tag));
    if (time !== null) {
      return time;
    }
  }

  return null;
}

function toJson(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string') {
    return value.replace(/\0+$/, '');
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  // Short byte strings are usually padded text; maker notes and thumbnails are dropped.
  if (value instanceof Uint8Array) {
    if (value.length > MAX_TEXT_BYTES) return undefined;
    return Buffer.from(value).toString('utf8').replace(/\0+$/, '');
  }

  if (Array.isArray(value)) {
    return value.map((item) => toJson(item) ?? null);
  }

  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};

    for (const [key, item] of entriesOf(value)) {
      const converted = toJson(item);
      if (converted !== undefined) {
        out[key] = converted;
      }
    }

    return out;
  }

  return undefined;
}

/**
 * Serialises every decoded IFD section. Returns null when no section holds
 * a tag.
 */
export function exifToJson(tags: unknown): string | null {
  if (!isRecord(tags)) {
    return null;
  }

  const sections: { [key: string]: JsonValue } = {};

  for (const [name, section] of entriesOf(tags)) {
    if (!isRecord(section)) continue;

    const converted = toJson(section);
    if (isRecord(converted) && entriesOf(converted).length > 0) {
      sections[name] = converted;
    }
  }

  return Object.keys(sections).length > 0 ? JSON.stringify(sections) : null;
}

/**
 * Decodes the raw EXIF block sharp hands back from `metadata()`. A block
 * that cannot be parsed is logged and treated as absent.
 */
export function readExif(block: Buffer | undefined, source: string): ExifSummary {
  if (!block || block.length === 0) {
    return { capturedAt: null, exifData: null };
  }

  let tags: unknown;
  try {
    tags = exifReader(block);
  } catch (error) {
    logger.warn(`Cannot read EXIF from ${source}`, { error: errorMessage(error) });
    return { capturedAt: null, exifData: null };
  }

  return { capturedAt: pickCaptureTime(tags), exifData: exifToJson(tags) };
}
