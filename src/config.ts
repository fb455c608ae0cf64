import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_FILE = join(process.cwd(), 'config.json');

const DEFAULT_IMAGE_EXTENSIONS = [
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff', '.tif',
  '.webp', '.heic', '.heif', '.avif',
];

const DEFAULT_VIDEO_EXTENSIONS = [
  '.mp4', '.mov', '.avi', '.mkv', '.wmv', '.flv', '.webm',
  '.m4v', '.mpg', '.mpeg', '.3gp',
];

const extensionList = z
  .array(z.string().min(1))
  .transform((list) => list.map((ext) => normalizeExtension(ext)));

const JunkSchema = z.object({
  minBytes: z.number().int().min(0).default(10_000),
  minWidth: z.number().int().min(0).default(64),
  minHeight: z.number().int().min(0).default(64),
  patterns: z
    .array(z.string())
    .default([])
    .superRefine((patterns, ctx) => {
      patterns.forEach((pattern, index) => {
        try {
          new RegExp(pattern, 'i');
        } catch {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index],
            message: `Invalid regular expression: ${pattern}`,
          });
        }
      });
    }),
});

const ConfigSchema = z.object({
  scanRoot: z.string().min(1).default('~/Pictures'),
  dbPath: z.string().min(1).default(join('data', 'media-dedupe.db')),
  dataDir: z.string().min(1).default('data'),
  imageExtensions: extensionList.default(DEFAULT_IMAGE_EXTENSIONS),
  videoExtensions: extensionList.default(DEFAULT_VIDEO_EXTENSIONS),
  nearDuplicateThreshold: z.number().int().min(0).max(64).default(8),
  junk: JunkSchema.default({}),
  videoSampleFrames: z.number().int().min(0).max(100).default(3),
  frameTimeoutMs: z.number().int().positive().default(30_000),
  concurrency: z.number().int().min(1).max(64).default(4),
  includeHidden: z.boolean().default(false),
  followSymlinks: z.boolean().default(false),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type ConfigInput = z.input<typeof ConfigSchema>;

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

/**
 * Validates a raw config object and resolves every path against `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): Config {
  const result = ConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.');
    throw new ConfigError(`Invalid config value for "${key || '(root)'}": ${issue.message}`, key);
  }

  const config = result.data;
  const overlap = config.imageExtensions.filter((ext) => config.videoExtensions.includes(ext));

  if (overlap.length > 0) {
    throw new ConfigError(
      `Extensions listed as both image and video: ${overlap.join(', ')}`,
      'videoExtensions'
    );
  }

  return {
    ...config,
    scanRoot: resolve(baseDir, expandPath(config.scanRoot)),
    dbPath: config.dbPath === ':memory:' ? config.dbPath : resolve(baseDir, expandPath(config.dbPath)),
    dataDir: resolve(baseDir, expandPath(config.dataDir)),
  };
}

export async function loadConfig(configFile: string = DEFAULT_CONFIG_FILE): Promise<Config> {
  let raw: unknown = {};

  try {
    const data = await readFile(configFile, 'utf-8');
    raw = JSON.parse(data);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Config file is not valid JSON: ${configFile}`);
    }

    logger.warn(`Config file not found, using defaults: ${configFile}`);
  }

  return parseConfig(raw, process.cwd());
}
