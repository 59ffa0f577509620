import path from 'node:path';
import type { CardFont, FontScript, GlyphCoverage } from '../types';

export type FontPlatform = 'win32' | 'darwin' | 'linux';

const GENERIC_FAMILIES = new Set(['serif', 'sans-serif', 'monospace']);

export const FALLBACK_FAMILY = 'sans-serif';

export const SYSTEM_FONT_CANDIDATES: Record<FontPlatform, Record<FontScript, string[]>> = {
  win32: {
    en: ['C:/Windows/Fonts/arial.ttf', 'C:/Windows/Fonts/calibri.ttf'],
    cn: ['C:/Windows/Fonts/simhei.ttf', 'C:/Windows/Fonts/msyh.ttc', 'C:/Windows/Fonts/simsun.ttc']
  },
  darwin: {
    en: ['/System/Library/Fonts/Helvetica.ttc', '/Library/Fonts/Arial.ttf'],
    cn: ['/System/Library/Fonts/PingFang.ttc', '/Library/Fonts/Arial Unicode.ttf']
  },
  linux: {
    en: ['/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf', '/usr/share/fonts/TTF/Arial.ttf'],
    cn: [
      '/usr/share/fonts/truetype/droid/DroidSansFallbackFull.ttf',
      '/usr/share/fonts/opentype/noto/NotoSansCJK-Regular.ttc',
      '/usr/share/fonts/noto-cjk/NotoSansCJK-Regular.ttc'
    ]
  }
};

/** File names looked up in the project's `fonts/` directory when nothing else is found. */
export const BUNDLED_FONT_FILES: Record<FontScript, string[]> = {
  en: ['NotoSans-Regular.ttf', 'DejaVuSans.ttf'],
  cn: ['NotoSansSC-Regular.ttf', 'NotoSansSC-Regular.otf', 'NotoSansCJKsc-Regular.otf']
};

export function toFontPlatform(platform: NodeJS.Platform): FontPlatform {
  if (platform === 'win32' || platform === 'darwin') {
    return platform;
  }
  return 'linux';
}

export function resolveFontFile(
  script: FontScript,
  requested: string | undefined,
  platform: NodeJS.Platform,
  fileExists: (filePath: string) => boolean,
  bundledDir: string
): string | undefined {
  if (requested && fileExists(requested)) {
    return requested;
  }
  const candidates = [
    ...SYSTEM_FONT_CANDIDATES[toFontPlatform(platform)][script],
    ...BUNDLED_FONT_FILES[script].map((name) => path.join(bundledDir, name))
  ];
  return candidates.find((candidate) => fileExists(candidate));
}

function quoteFamily(family: string): string {
  return GENERIC_FAMILIES.has(family) ? family : `"${family}"`;
}

/** Canvas font shorthand listing the primary script family first, so mixed runs fall back per glyph. */
export function buildFontString(fontSize: number, primary: CardFont, secondary: CardFont): string {
  const families = Array.from(new Set([primary.family, secondary.family, FALLBACK_FAMILY]));
  return `${fontSize}px ${families.map(quoteFamily).join(', ')}`;
}

/**
 * Characters of `text` that none of the given fonts can draw. Whitespace is
 * never reported.
 */
export function findMissingGlyphs(text: string, coverages: GlyphCoverage[]): string[] {
  const missing = new Set<string>();
  for (const char of Array.from(text)) {
    if (/\s/.test(char)) {
      continue;
    }
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) {
      continue;
    }
    if (!coverages.some((coverage) => coverage.covers(codePoint))) {
      missing.add(char);
    }
  }
  return Array.from(missing);
}
