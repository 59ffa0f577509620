import type { CardFonts, Rect, Size, TextRole, ThemeSpec } from '../types';
import { clampRect, expandRect, roundRectOutward } from './canvasLayout';
import { RenderFailureError } from './error';
import { buildFontString } from './fonts';

export interface TextStyle {
  font: string;
  fontSize: number;
}

export type TextMeasurer = (text: string, style: TextStyle) => number;

export const MAX_WIDTH_RATIO = 0.8;
export const MIN_FONT_RATIO = 0.5;
export const LINE_HEIGHT = 1.2;
export const BASELINE_RATIO = 0.9;
export const PHONETIC_GAP_RATIO = 0.2;
export const CHINESE_GAP_RATIO = 0.4;
export const EDGE_MARGIN_RATIO = 0.03;
const DIVIDER_MAX_WIDTH_RATIO = 0.4;
// Each step takes another 5% off every requested size, down to the floor.
const BLOCK_SHRINK_STEP = 0.05;

// Han, kana, hangul, CJK punctuation and full-width forms wrap per character.
const CJK_CHAR = /[\u1100-\u11ff\u2e80-\u303f\u3040-\u30ff\u3100-\u31ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uf900-\ufaff\uff00-\uffef]/;

export interface TextToken {
  text: string;
  spaceBefore: boolean;
}

export interface MeasuredLine {
  text: string;
  width: number;
}

export interface FittedField {
  lines: MeasuredLine[];
  fontSize: number;
  style: TextStyle;
}

export interface LayoutLine {
  role: TextRole;
  text: string;
  font: string;
  fontSize: number;
  color: string;
  /** Horizontal centre of the line. */
  x: number;
  baseline: number;
  width: number;
}

export interface Divider {
  x1: number;
  x2: number;
  y: number;
}

export interface CardLayout {
  panelRect: Rect;
  textRect: Rect;
  lines: LayoutLine[];
  divider?: Divider;
}

export interface LayoutInput {
  canvas: Size;
  english: string;
  chinese: string;
  phonetic?: string;
  fonts: CardFonts;
  fontSizes: { en: number; cn: number; phonetic: number };
  theme: ThemeSpec;
  measure: TextMeasurer;
}

export function tokenizeText(text: string): TextToken[] {
  const tokens: TextToken[] = [];
  for (const word of text.split(/\s+/).filter(Boolean)) {
    let buffer = '';
    let startsWord = true;
    const push = (value: string) => {
      tokens.push({ text: value, spaceBefore: startsWord && tokens.length > 0 });
      startsWord = false;
    };
    for (const char of Array.from(word)) {
      if (CJK_CHAR.test(char)) {
        if (buffer) {
          push(buffer);
          buffer = '';
        }
        push(char);
      } else {
        buffer += char;
      }
    }
    if (buffer) {
      push(buffer);
    }
  }
  return tokens;
}

/**
 * Greedy line filling. A token wider than `maxWidth` gets a line of its own
 * unless `breakWords` is set, in which case it is split between characters.
 */
export function splitLinesToFit(
  tokens: TextToken[],
  maxWidth: number,
  measureWidth: (text: string) => number,
  breakWords = false
): string[] {
  const lines: string[] = [];
  let current = '';

  for (const token of tokens) {
    const pieces = breakWords && measureWidth(token.text) > maxWidth ? Array.from(token.text) : [token.text];
    pieces.forEach((piece, pieceIndex) => {
      const separator = pieceIndex === 0 && token.spaceBefore ? ' ' : '';
      const candidate = current ? `${current}${separator}${piece}` : piece;
      if (!current || measureWidth(candidate) <= maxWidth) {
        current = candidate;
      } else {
        lines.push(current);
        current = piece;
      }
    });
  }

  if (current) {
    lines.push(current);
  }
  return lines;
}

export function minFontSize(requestedSize: number): number {
  return Math.max(1, Math.ceil(requestedSize * MIN_FONT_RATIO));
}

export function fitTextField(
  text: string,
  requestedSize: number,
  maxWidth: number,
  styleFor: (fontSize: number) => TextStyle,
  measure: TextMeasurer,
  minSize = minFontSize(requestedSize)
): FittedField {
  const tokens = tokenizeText(text);
  if (!tokens.length) {
    return { lines: [], fontSize: requestedSize, style: styleFor(requestedSize) };
  }

  const measureLines = (style: TextStyle, breakWords: boolean): MeasuredLine[] => {
    const width = (value: string) => measure(value, style);
    return splitLinesToFit(tokens, maxWidth, width, breakWords).map((line) => ({ text: line, width: width(line) }));
  };

  for (let size = requestedSize; size >= minSize; size -= 1) {
    const style = styleFor(size);
    const lines = measureLines(style, false);
    if (lines.every((line) => line.width <= maxWidth)) {
      return { lines, fontSize: size, style };
    }
  }

  const style = styleFor(minSize);
  return { lines: measureLines(style, true), fontSize: minSize, style };
}

interface Section {
  role: TextRole;
  field: FittedField;
  gapBefore: number;
}

const lineHeightOf = (field: FittedField) => field.fontSize * LINE_HEIGHT;

function blockHeightOf(sections: Section[]): number {
  return sections.reduce(
    (sum, section, index) => sum + (index > 0 ? section.gapBefore : 0) + section.field.lines.length * lineHeightOf(section.field),
    0
  );
}

function blockWidthOf(sections: Section[]): number {
  return Math.max(0, ...sections.flatMap((section) => section.field.lines.map((line) => line.width)));
}

/**
 * Text block that fits inside the canvas less `edgeMargin` on every side.
 * All three fields shrink together until it does; past every floor the word
 * cannot be placed.
 */
function fitSections(input: LayoutInput, edgeMargin: number): Section[] {
  const { canvas, fonts, fontSizes, measure } = input;
  const maxWidth = canvas.width * MAX_WIDTH_RATIO;
  const availableWidth = canvas.width - edgeMargin * 2;
  const availableHeight = canvas.height - edgeMargin * 2;
  const latinStyle = (fontSize: number): TextStyle => ({ font: buildFontString(fontSize, fonts.en, fonts.cn), fontSize });
  const cjkStyle = (fontSize: number): TextStyle => ({ font: buildFontString(fontSize, fonts.cn, fonts.en), fontSize });
  const lastStep = Math.round((1 - MIN_FONT_RATIO) / BLOCK_SHRINK_STEP);

  for (let step = 0; step <= lastStep; step += 1) {
    const scale = 1 - step * BLOCK_SHRINK_STEP;
    const sizeFor = (requested: number) => Math.max(minFontSize(requested), Math.round(requested * scale));

    const english = fitTextField(input.english, sizeFor(fontSizes.en), maxWidth, latinStyle, measure, minFontSize(fontSizes.en));
    const phonetic = fitTextField(
      input.phonetic ?? '',
      sizeFor(fontSizes.phonetic),
      maxWidth,
      latinStyle,
      measure,
      minFontSize(fontSizes.phonetic)
    );
    const chinese = fitTextField(input.chinese, sizeFor(fontSizes.cn), maxWidth, cjkStyle, measure, minFontSize(fontSizes.cn));

    const sections: Section[] = [
      { role: 'english' as const, field: english, gapBefore: 0 },
      { role: 'phonetic' as const, field: phonetic, gapBefore: phonetic.fontSize * PHONETIC_GAP_RATIO },
      { role: 'chinese' as const, field: chinese, gapBefore: chinese.fontSize * CHINESE_GAP_RATIO }
    ].filter((section) => section.field.lines.length > 0);

    if (blockHeightOf(sections) <= availableHeight && blockWidthOf(sections) <= availableWidth) {
      return sections;
    }
  }

  throw new RenderFailureError(
    `Text for "${input.english}" does not fit a ${canvas.width}x${canvas.height} canvas even at the smallest font size`
  );
}

export function layoutCard(input: LayoutInput): CardLayout {
  const { canvas, theme } = input;
  const edgeMargin = Math.round(Math.min(canvas.width, canvas.height) * EDGE_MARGIN_RATIO);
  const sections = fitSections(input, edgeMargin);

  const blockHeight = blockHeightOf(sections);
  const blockWidth = blockWidthOf(sections);
  const centerX = canvas.width / 2;
  const top = (canvas.height - blockHeight) / 2;

  const lines: LayoutLine[] = [];
  let divider: Divider | undefined;
  let cursor = top;

  for (const [index, section] of sections.entries()) {
    if (index > 0) {
      cursor += section.gapBefore;
      if (section.role === 'chinese' && theme.decoration) {
        const dividerWidth = Math.min(blockWidth, canvas.width * DIVIDER_MAX_WIDTH_RATIO);
        divider = {
          x1: centerX - dividerWidth / 2,
          x2: centerX + dividerWidth / 2,
          y: cursor - section.gapBefore / 2
        };
      }
    }
    const { field } = section;
    for (const line of field.lines) {
      lines.push({
        role: section.role,
        text: line.text,
        font: field.style.font,
        fontSize: field.fontSize,
        color: theme.textColor,
        x: centerX,
        baseline: cursor + field.fontSize * BASELINE_RATIO,
        width: line.width
      });
      cursor += lineHeightOf(field);
    }
  }

  const textRect: Rect = {
    x: centerX - blockWidth / 2,
    y: top,
    width: blockWidth,
    height: blockHeight
  };
  const panelRect = clampRect(roundRectOutward(expandRect(textRect, theme.padding)), canvas, edgeMargin);

  return divider ? { panelRect, textRect, lines, divider } : { panelRect, textRect, lines };
}
