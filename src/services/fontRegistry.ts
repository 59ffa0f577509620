import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { GlobalFonts } from '@napi-rs/canvas';
import fontkit from '@pdf-lib/fontkit';
import type { CardFont, CardFonts, FontScript, FontSpec, GlyphCoverage } from '../types';
import { getErrorMessage } from '../utils/error';
import { FALLBACK_FAMILY, resolveFontFile } from '../utils/fonts';
import { type Logger, silentLogger } from './logger';

// Registration is process-wide in the canvas backend, so keep one family per file.
const registeredFamilies = new Map<string, string>();
const coverageCache = new Map<string, GlyphCoverage | undefined>();

function registerFontFile(file: string, logger: Logger): string | undefined {
  const known = registeredFamilies.get(file);
  if (known) {
    return known;
  }
  const family = `WordCard ${path.parse(file).name}`;
  if (!GlobalFonts.registerFromPath(file, family)) {
    logger.warn(`Unable to register font ${file}, falling back to ${FALLBACK_FAMILY}`);
    return undefined;
  }
  registeredFamilies.set(file, family);
  return family;
}

export function loadGlyphCoverage(file: string, logger: Logger = silentLogger): GlyphCoverage | undefined {
  if (coverageCache.has(file)) {
    return coverageCache.get(file);
  }
  let coverage: GlyphCoverage | undefined;
  try {
    const font = fontkit.create(readFileSync(file));
    // Collections (.ttc) come back without per-font lookups; leave them unchecked.
    if (typeof font.hasGlyphForCodePoint === 'function') {
      coverage = { covers: (codePoint) => font.hasGlyphForCodePoint(codePoint) };
    }
  } catch (error) {
    logger.warn(`Unable to read glyph coverage from ${file}: ${getErrorMessage(error)}`);
  }
  coverageCache.set(file, coverage);
  return coverage;
}

function loadCardFont(
  script: FontScript,
  requested: string | undefined,
  platform: NodeJS.Platform,
  fontsDir: string,
  logger: Logger
): CardFont {
  if (requested && !existsSync(requested)) {
    logger.warn(`Font ${requested} not found, looking for a system ${script} font`);
  }
  const file = resolveFontFile(script, requested, platform, existsSync, fontsDir);
  if (!file) {
    logger.warn(`No ${script} font found, using ${FALLBACK_FAMILY}`);
    return { family: FALLBACK_FAMILY };
  }
  const family = registerFontFile(file, logger);
  if (!family) {
    return { family: FALLBACK_FAMILY };
  }
  return { family, file, coverage: loadGlyphCoverage(file, logger) };
}

export function loadCardFonts(
  fontSpec: FontSpec,
  platform: NodeJS.Platform,
  fontsDir: string,
  logger: Logger = silentLogger
): CardFonts {
  return {
    en: loadCardFont('en', fontSpec.pathEn, platform, fontsDir, logger),
    cn: loadCardFont('cn', fontSpec.pathCn, platform, fontsDir, logger)
  };
}
