import { normalizeConfig } from './constants/project';
import type { WordCardConfig } from './types';

type Env = Record<string, string | undefined>;

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function loadConfigFromEnv(env: Env = process.env): WordCardConfig {
  return normalizeConfig({
    imagesDir: env.WORDCARD_IMAGES_DIR,
    wordsFile: env.WORDCARD_WORDS_FILE,
    outputDir: env.WORDCARD_OUTPUT_DIR ?? 'output_images',
    fontSizeEn: readNumber(env.WORDCARD_FONT_SIZE_EN),
    fontSizeCn: readNumber(env.WORDCARD_FONT_SIZE_CN),
    fontSizePhonetic: readNumber(env.WORDCARD_FONT_SIZE_PHONETIC),
    fontPathEn: env.WORDCARD_FONT_PATH_EN,
    fontPathCn: env.WORDCARD_FONT_PATH_CN,
    fontsDir: env.WORDCARD_FONTS_DIR,
    theme: env.WORDCARD_THEME,
    device: env.WORDCARD_DEVICE,
    bgStyle: env.WORDCARD_BG_STYLE,
    format: env.WORDCARD_FORMAT,
    perfDebug: env.WORDCARD_PERF_DEBUG === '1'
  });
}
