import path from 'node:path';
import type { FontSpec, OutputFormat, WordCardConfig } from '../types';
import { InvalidConfigurationError } from '../utils/error';
import { isDeviceMode } from './devices';
import { isBackgroundShape, isThemeName } from './themes';

export const OUTPUT_FORMATS: OutputFormat[] = ['png', 'jpg'];

export const DEFAULT_FONT_SIZE_EN = 60;
export const DEFAULT_FONT_SIZE_CN = 45;
export const PHONETIC_SIZE_RATIO = 0.3;

export type WordCardConfigInput = Partial<Omit<WordCardConfig, 'theme' | 'device' | 'bgStyle' | 'format'>> & {
  theme?: string;
  device?: string;
  bgStyle?: string;
  format?: string;
};

export function defaultPhoneticSize(fontSizeEn: number): number {
  return Math.round(fontSizeEn * PHONETIC_SIZE_RATIO);
}

function requirePath(value: string | undefined, label: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new InvalidConfigurationError(`Missing ${label}`);
  }
  return trimmed;
}

function optionalPath(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function pickEnum<T extends string>(value: string | undefined, fallback: T, guard: (candidate: string) => candidate is T, label: string): T {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (!guard(normalized)) {
    throw new InvalidConfigurationError(`Unknown ${label} "${value}"`);
  }
  return normalized;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function normalizeConfig(input: WordCardConfigInput): WordCardConfig {
  const safeSize = (value: unknown, defaultValue: number) =>
    typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.round(value) : defaultValue;

  const fontSizeEn = safeSize(input.fontSizeEn, DEFAULT_FONT_SIZE_EN);
  const format = input.format?.trim().toLowerCase() === 'jpeg' ? 'jpg' : input.format;

  return {
    imagesDir: requirePath(input.imagesDir, 'images directory'),
    wordsFile: requirePath(input.wordsFile, 'word list file'),
    outputDir: requirePath(input.outputDir, 'output directory'),
    fontSizeEn,
    fontSizeCn: safeSize(input.fontSizeCn, DEFAULT_FONT_SIZE_CN),
    fontSizePhonetic: safeSize(input.fontSizePhonetic, defaultPhoneticSize(fontSizeEn)),
    fontPathEn: optionalPath(input.fontPathEn),
    fontPathCn: optionalPath(input.fontPathCn),
    fontsDir: optionalPath(input.fontsDir) ?? path.resolve(process.cwd(), 'fonts'),
    theme: pickEnum(input.theme, 'standard', isThemeName, 'theme'),
    device: pickEnum(input.device, 'auto', isDeviceMode, 'device mode'),
    bgStyle: pickEnum(input.bgStyle, 'rectangle', isBackgroundShape, 'background style'),
    format: pickEnum(format, 'png', isOutputFormat, 'output format'),
    platform: input.platform ?? process.platform,
    perfDebug: input.perfDebug ?? false
  };
}

export function toFontSpec(config: WordCardConfig): FontSpec {
  return {
    pathEn: config.fontPathEn,
    pathCn: config.fontPathCn,
    sizeEn: config.fontSizeEn,
    sizeCn: config.fontSizeCn,
    sizePhonetic: config.fontSizePhonetic
  };
}
