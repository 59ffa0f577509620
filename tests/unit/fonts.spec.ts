import path from 'node:path';
import { expect, test } from '@playwright/test';
import { loadGlyphCoverage } from '../../src/services/fontRegistry';
import { buildFontString, findMissingGlyphs, resolveFontFile } from '../../src/utils/fonts';
import { createRecordingLogger } from './helpers';

const bundledDir = '/project/fonts';
const existing = (...files: string[]) => (file: string) => files.includes(file);

test('a requested font that exists wins', () => {
  expect(resolveFontFile('en', '/my/font.ttf', 'linux', existing('/my/font.ttf'), bundledDir)).toBe('/my/font.ttf');
});

test('a missing requested font falls back to system fonts for the platform', () => {
  const exists = existing('/usr/share/fonts/TTF/Arial.ttf', 'C:/Windows/Fonts/msyh.ttc');
  expect(resolveFontFile('en', '/missing.ttf', 'linux', exists, bundledDir)).toBe('/usr/share/fonts/TTF/Arial.ttf');
  expect(resolveFontFile('cn', undefined, 'win32', exists, bundledDir)).toBe('C:/Windows/Fonts/msyh.ttc');
  expect(resolveFontFile('en', undefined, 'freebsd', exists, bundledDir)).toBe('/usr/share/fonts/TTF/Arial.ttf');
});

test('bundled fonts are used when no system font exists', () => {
  const bundled = path.join(bundledDir, 'NotoSansSC-Regular.otf');
  expect(resolveFontFile('cn', undefined, 'darwin', existing(bundled), bundledDir)).toBe(bundled);
  expect(resolveFontFile('cn', undefined, 'darwin', existing(), bundledDir)).toBeUndefined();
});

test('font strings list the primary family first and end generic', () => {
  expect(buildFontString(60, { family: 'WordCard Arial' }, { family: 'WordCard PingFang' })).toBe(
    '60px "WordCard Arial", "WordCard PingFang", sans-serif'
  );
  expect(buildFontString(45, { family: 'WordCard Arial' }, { family: 'WordCard Arial' })).toBe('45px "WordCard Arial", sans-serif');
  expect(buildFontString(18, { family: 'sans-serif' }, { family: 'sans-serif' })).toBe('18px sans-serif');
});

test('missing glyphs are the characters no font covers', () => {
  const latin = { covers: (codePoint: number) => codePoint < 0x80 };
  const cat = { covers: (codePoint: number) => codePoint === 0x732b };
  expect(findMissingGlyphs('a 猫 猫 狗', [latin])).toEqual(['猫', '狗']);
  expect(findMissingGlyphs('a 猫 狗', [latin, cat])).toEqual(['狗']);
  expect(findMissingGlyphs(' \t', [])).toEqual([]);
});

test('an unreadable font file has no known coverage', () => {
  const logger = createRecordingLogger();
  const file = path.join(__dirname, 'no-such-font.ttf');
  expect(loadGlyphCoverage(file, logger)).toBeUndefined();
  expect(logger.lines).toHaveLength(1);
  expect(logger.lines[0].level).toBe('warn');
  expect(loadGlyphCoverage(file, logger)).toBeUndefined();
  expect(logger.lines).toHaveLength(1);
});
