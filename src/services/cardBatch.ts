import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { Canvas } from '@napi-rs/canvas';
import { resolveDeviceProfile } from '../constants/devices';
import { toFontSpec } from '../constants/project';
import { resolveBackgroundStyle, resolveTheme } from '../constants/themes';
import type { CardFonts, OutputFormat, RenderJob, WordCardConfig } from '../types';
import { readWordList } from '../utils/csv';
import { NoBackgroundImagesError, RenderFailureError, WordCardError } from '../utils/error';
import { encodeCard, renderCard } from './cardRenderer';
import { loadCardFonts } from './fontRegistry';
import { decodeBackground, loadImagePool, pickBackground } from './imagePool';
import { createConsoleLogger, type Logger } from './logger';

export interface GenerateCardsOptions {
  config: WordCardConfig;
  logger?: Logger;
  onProgress?: (percent: number, stage: string) => void;
  /** Swaps out the canvas renderer for a single word. */
  render?: (job: RenderJob, fonts: CardFonts) => Canvas;
}

export interface CardOutput {
  index: number;
  english: string;
  file: string;
  background: string;
}

export interface SkippedWord {
  index: number;
  english: string;
  reason: string;
}

export interface BatchReport {
  written: CardOutput[];
  skippedWords: SkippedWord[];
  skippedImages: string[];
  invalidLines: number;
}

const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

export function cardFileName(index: number, english: string, total: number, format: OutputFormat): string {
  const width = Math.max(3, String(total).length);
  const number = String(index + 1).padStart(width, '0');
  const name = english.replace(UNSAFE_FILENAME_CHARS, '_');
  return `${number}_${name}.${format}`;
}

export async function generateCards(options: GenerateCardsOptions): Promise<BatchReport> {
  const { config, onProgress = () => undefined, render = renderCard } = options;
  const logger = options.logger ?? createConsoleLogger();
  const perfStart = performance.now();
  const perf = {
    loadMs: 0,
    decodeMs: 0,
    renderMs: 0,
    encodeMs: 0,
    writeMs: 0
  };

  const profile = resolveDeviceProfile(config.device);
  const theme = resolveTheme(config.theme);
  const style = resolveBackgroundStyle(config.bgStyle);
  const fontSpec = toFontSpec(config);

  onProgress(0, 'Reading word list...');
  const wordList = readWordList(config.wordsFile);
  for (const row of wordList.rejected) {
    logger.warn(`Skipping malformed word line "${row}"`);
  }

  onProgress(5, 'Loading background images...');
  const loadStart = performance.now();
  const pool = await loadImagePool(config.imagesDir, logger);
  perf.loadMs = performance.now() - loadStart;
  if (!pool.images.length) {
    throw new NoBackgroundImagesError(config.imagesDir);
  }
  logger.info(`Found ${pool.images.length} background images and ${wordList.words.length} words`);

  const fonts = loadCardFonts(fontSpec, config.platform, config.fontsDir, logger);
  mkdirSync(config.outputDir, { recursive: true });

  const written: CardOutput[] = [];
  const skippedWords: SkippedWord[] = [];
  const total = wordList.words.length;

  for (const [index, line] of wordList.words.entries()) {
    const { english } = line.entry;
    onProgress(10 + ((index + 1) / total) * 85, `Rendering card ${index + 1} of ${total}...`);
    const background = pickBackground(pool.images, index);

    try {
      const decodeStart = performance.now();
      const image = await decodeBackground(background.file);
      perf.decodeMs += performance.now() - decodeStart;
      const job: RenderJob = { index, line, background: { file: background.file, image }, profile, theme, style, fontSpec };

      const renderStart = performance.now();
      const canvas = render(job, fonts);
      perf.renderMs += performance.now() - renderStart;

      const encodeStart = performance.now();
      const bytes = encodeCard(canvas, config.format);
      perf.encodeMs += performance.now() - encodeStart;

      const writeStart = performance.now();
      const file = path.join(config.outputDir, cardFileName(index, english, total, config.format));
      writeFileSync(file, bytes);
      perf.writeMs += performance.now() - writeStart;

      written.push({ index, english, file, background: background.file });
      logger.info(`Generated ${file}`);
    } catch (error) {
      const failure =
        error instanceof WordCardError
          ? error
          : new RenderFailureError(`Unable to render "${english}"`, { wordIndex: index, cause: error });
      logger.error(`Skipping word ${index + 1} "${english}": ${failure.message}`);
      skippedWords.push({ index, english, reason: failure.message });
    }
  }

  onProgress(100, 'Done');
  logger.info(
    `Wrote ${written.length} cards to ${config.outputDir}; skipped ${skippedWords.length} words, ` +
      `${pool.skipped.length} images, ${wordList.invalidRows} malformed lines`
  );

  if (config.perfDebug) {
    const totalMs = performance.now() - perfStart;
    console.log(
      '[card-perf]',
      JSON.stringify({
        words: total,
        images: pool.images.length,
        totalMs: Number(totalMs.toFixed(1)),
        loadMs: Number(perf.loadMs.toFixed(1)),
        decodeMs: Number(perf.decodeMs.toFixed(1)),
        renderMs: Number(perf.renderMs.toFixed(1)),
        encodeMs: Number(perf.encodeMs.toFixed(1)),
        writeMs: Number(perf.writeMs.toFixed(1))
      })
    );
  }

  return {
    written,
    skippedWords,
    skippedImages: pool.skipped.map((issue) => issue.file),
    invalidLines: wordList.invalidRows
  };
}
