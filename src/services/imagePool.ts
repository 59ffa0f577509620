import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import path from 'node:path';
import { type Image, loadImage } from '@napi-rs/canvas';
import type { BackgroundFile } from '../types';
import { UnreadableImageError } from '../utils/error';
import { type Logger, silentLogger } from './logger';

export const BACKGROUND_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'gif']);

export interface ImagePool {
  images: BackgroundFile[];
  skipped: UnreadableImageError[];
}

export function hasImageExtension(filename: string, extensions: Set<string> = BACKGROUND_EXTENSIONS): boolean {
  return extensions.has(path.extname(filename).slice(1).toLowerCase());
}

/** Background candidates in `dir`, sorted by file name so the pool order is stable. */
export function listBackgroundFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    return [];
  }
  return readdirSync(dir)
    .filter((filename) => !filename.startsWith('.') && hasImageExtension(filename))
    .sort()
    .map((filename) => path.join(dir, filename));
}

export async function decodeBackground(file: string): Promise<Image> {
  try {
    const image = await loadImage(readFileSync(file));
    if (!(image.width > 0) || !(image.height > 0)) {
      throw new Error('image has no pixels');
    }
    return image;
  } catch (error) {
    throw new UnreadableImageError(file, error);
  }
}

/**
 * Checks that every candidate decodes, keeping only its path and size. Pixels
 * are not held between cards.
 */
export async function loadImagePool(dir: string, logger: Logger = silentLogger): Promise<ImagePool> {
  const images: BackgroundFile[] = [];
  const skipped: UnreadableImageError[] = [];

  for (const file of listBackgroundFiles(dir)) {
    try {
      const { width, height } = await decodeBackground(file);
      images.push({ file, width, height });
    } catch (error) {
      const issue = error instanceof UnreadableImageError ? error : new UnreadableImageError(file, error);
      logger.warn(issue.message);
      skipped.push(issue);
    }
  }

  return { images, skipped };
}

export function pickBackground(pool: BackgroundFile[], index: number): BackgroundFile {
  return pool[index % pool.length];
}
