import { expect, test } from '@playwright/test';
import { THEMES } from '../../src/constants/themes';
import type { CardFonts } from '../../src/types';
import { RenderFailureError } from '../../src/utils/error';
import { fitTextField, layoutCard, splitLinesToFit, tokenizeText, type TextMeasurer, type TextStyle } from '../../src/utils/layout';

// Every character is half as wide as the font is tall.
const measure: TextMeasurer = (text, style) => Array.from(text).length * style.fontSize * 0.5;
const fonts: CardFonts = { en: { family: 'sans-serif' }, cn: { family: 'sans-serif' } };
const styleFor = (fontSize: number): TextStyle => ({ font: `${fontSize}px sans-serif`, fontSize });
const fontSizes = { en: 60, cn: 45, phonetic: 18 };

test('CJK characters become their own tokens', () => {
  expect(tokenizeText('hi 你好 there')).toEqual([
    { text: 'hi', spaceBefore: false },
    { text: '你', spaceBefore: true },
    { text: '好', spaceBefore: false },
    { text: 'there', spaceBefore: true }
  ]);
  expect(tokenizeText('abc你')).toEqual([
    { text: 'abc', spaceBefore: false },
    { text: '你', spaceBefore: false }
  ]);
});

test('lines are filled greedily at word boundaries', () => {
  const width = (text: string) => measure(text, styleFor(60));
  expect(splitLinesToFit(tokenizeText('the quick brown fox'), 320, width)).toEqual(['the quick', 'brown fox']);
});

test('text that fits keeps the requested size', () => {
  const field = fitTextField('the quick brown fox', 60, 320, styleFor, measure);
  expect(field.fontSize).toBe(60);
  expect(field.lines).toEqual([
    { text: 'the quick', width: 270 },
    { text: 'brown fox', width: 270 }
  ]);
});

test('a long word shrinks until it fits on one line', () => {
  const field = fitTextField('abcdefghijklmnopqrst', 60, 320, styleFor, measure);
  expect(field.fontSize).toBe(32);
  expect(field.lines).toEqual([{ text: 'abcdefghijklmnopqrst', width: 320 }]);
});

test('a word too long at the minimum size is broken between characters', () => {
  const field = fitTextField('abcdefghijklmnopqrstuvwxyz', 60, 320, styleFor, measure);
  expect(field.fontSize).toBe(30);
  expect(field.lines).toEqual([
    { text: 'abcdefghijklmnopqrstu', width: 315 },
    { text: 'vwxyz', width: 75 }
  ]);
});

test('Chinese wraps between characters without shrinking', () => {
  const field = fitTextField('一二三四五六七八九十一二三四五六七八九十', 45, 320, styleFor, measure);
  expect(field.fontSize).toBe(45);
  expect(field.lines.map((line) => line.text)).toEqual(['一二三四五六七八九十一二三四', '五六七八九十']);
});

test('card layout centres the block and wraps it in a padded panel', () => {
  const layout = layoutCard({
    canvas: { width: 1000, height: 1000 },
    english: 'apple',
    chinese: '苹果',
    fonts,
    fontSizes,
    theme: THEMES.standard,
    measure
  });

  expect(layout.lines.map((line) => [line.role, line.text, line.fontSize])).toEqual([
    ['english', 'apple', 60],
    ['chinese', '苹果', 45]
  ]);
  expect(layout.lines[0].font).toBe('60px sans-serif');
  expect(layout.lines[0].x).toBe(500);
  expect(layout.lines[0].baseline).toBeCloseTo(482);
  expect(layout.lines[1].baseline).toBeCloseTo(558.5);
  expect(layout.textRect.x).toBeCloseTo(425);
  expect(layout.textRect.y).toBeCloseTo(428);
  expect(layout.textRect.width).toBeCloseTo(150);
  expect(layout.textRect.height).toBeCloseTo(144);
  expect(layout.panelRect).toEqual({ x: 385, y: 388, width: 230, height: 224 });
  expect(layout.divider?.y).toBeCloseTo(509);
  expect(layout.divider?.x1).toBeCloseTo(425);
  expect(layout.divider?.x2).toBeCloseTo(575);
});

test('phonetic line sits between English and Chinese', () => {
  const layout = layoutCard({
    canvas: { width: 1000, height: 1000 },
    english: 'apple',
    chinese: '苹果',
    phonetic: '/ˈæp.əl/',
    fonts,
    fontSizes,
    theme: THEMES.standard,
    measure
  });

  expect(layout.lines.map((line) => line.role)).toEqual(['english', 'phonetic', 'chinese']);
  expect(layout.lines[0].baseline).toBeCloseTo(469.4);
  expect(layout.lines[1].baseline).toBeCloseTo(507.2);
  expect(layout.lines[2].baseline).toBeCloseTo(571.1);
  expect(layout.textRect.height).toBeCloseTo(169.2);
  expect(layout.divider?.y).toBeCloseTo(521.6);
});

test('minimal theme has no divider and no padding', () => {
  const layout = layoutCard({
    canvas: { width: 1000, height: 1000 },
    english: 'apple',
    chinese: '苹果',
    fonts,
    fontSizes,
    theme: THEMES.minimal,
    measure
  });
  expect(layout.divider).toBeUndefined();
  expect(layout.panelRect).toEqual({ x: 425, y: 428, width: 150, height: 144 });
});

test('a block too tall for the canvas shrinks every field together', () => {
  const layout = layoutCard({
    canvas: { width: 300, height: 200 },
    english: 'hello world',
    chinese: '你好',
    fonts,
    fontSizes,
    theme: THEMES.standard,
    measure
  });

  expect(layout.lines.map((line) => [line.text, line.fontSize])).toEqual([
    ['hello', 51],
    ['world', 51],
    ['你好', 38]
  ]);
  expect(layout.textRect.y).toBeCloseTo(8.4);
  expect(layout.textRect.height).toBeCloseTo(183.2);
  expect(layout.panelRect).toEqual({ x: 46, y: 6, width: 208, height: 188 });
});

const placements = [
  { canvas: { width: 300, height: 200 }, english: 'hello world', chinese: '你好' },
  {
    canvas: { width: 200, height: 1000 },
    english: 'the quick brown fox jumps over the lazy dog',
    chinese: '敏捷的棕色狐狸跳过了懒狗'
  },
  { canvas: { width: 240, height: 160 }, english: 'good morning', phonetic: '/ɡʊd ˈmɔːnɪŋ/', chinese: '早上好' }
];

for (const placement of placements) {
  const { width, height } = placement.canvas;
  test(`text stays inside the edge margin of a ${width}x${height} canvas`, () => {
    const layout = layoutCard({ ...placement, fonts, fontSizes, theme: THEMES.elegant, measure });
    const margin = Math.round(Math.min(width, height) * 0.03);
    const { textRect, panelRect } = layout;

    expect(textRect.x).toBeGreaterThanOrEqual(margin);
    expect(textRect.y).toBeGreaterThanOrEqual(margin);
    expect(textRect.x + textRect.width).toBeLessThanOrEqual(width - margin);
    expect(textRect.y + textRect.height).toBeLessThanOrEqual(height - margin);

    expect(panelRect.x).toBeLessThanOrEqual(textRect.x);
    expect(panelRect.y).toBeLessThanOrEqual(textRect.y);
    expect(panelRect.x + panelRect.width).toBeGreaterThanOrEqual(textRect.x + textRect.width);
    expect(panelRect.y + panelRect.height).toBeGreaterThanOrEqual(textRect.y + textRect.height);
  });
}

test('text that cannot fit even at the smallest size fails to lay out', () => {
  expect(() =>
    layoutCard({
      canvas: { width: 100, height: 40 },
      english: 'apple',
      chinese: '苹果',
      fonts,
      fontSizes,
      theme: THEMES.standard,
      measure
    })
  ).toThrow(RenderFailureError);
});
