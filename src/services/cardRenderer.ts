import { type Canvas, type Image, type SKRSContext2D, createCanvas } from '@napi-rs/canvas';
import type { Backdrop, CardFont, CardFonts, DeviceProfile, FontSpec, OutputFormat, RenderJob, Size, TextRole } from '../types';
import { getCoverCrop } from '../utils/canvasLayout';
import { RenderFailureError, WordCardError } from '../utils/error';
import { findMissingGlyphs } from '../utils/fonts';
import { type CardLayout, type TextMeasurer, layoutCard } from '../utils/layout';
import { drawPanel } from './panelRenderer';
import { drawCardText } from './textRenderer';

const JPEG_QUALITY = 95;

export function resolveCanvasSize(image: Size, profile: DeviceProfile): Size {
  return profile.canvasSize ? { ...profile.canvasSize } : { width: image.width, height: image.height };
}

/** Background scaled to cover the profile's canvas, centre-cropped. */
export function prepareCanvas(image: Image, profile: DeviceProfile): Canvas {
  const size = resolveCanvasSize(image, profile);
  const canvas = createCanvas(size.width, size.height);
  const ctx = canvas.getContext('2d');
  const crop = getCoverCrop(image, size);
  ctx.drawImage(image, crop.sx, crop.sy, crop.sw, crop.sh, 0, 0, size.width, size.height);
  return canvas;
}

export function applyBackdrop(canvas: Canvas, backdrop: Backdrop): void {
  const ctx = canvas.getContext('2d');
  if (backdrop.blur > 0) {
    // Blurred copy drawn over the sharp original keeps the edges opaque.
    const snapshot = createCanvas(canvas.width, canvas.height);
    snapshot.getContext('2d').drawImage(canvas, 0, 0);
    ctx.save();
    ctx.filter = `blur(${backdrop.blur}px)`;
    ctx.drawImage(snapshot, 0, 0);
    ctx.restore();
  }
  if (backdrop.brightness < 1) {
    ctx.save();
    ctx.fillStyle = `rgba(0, 0, 0, ${Number((1 - backdrop.brightness).toFixed(3))})`;
    ctx.fillRect(0, 0, canvas.width, canvas.height);
    ctx.restore();
  }
}

export function createCanvasMeasurer(ctx: SKRSContext2D): TextMeasurer {
  return (text, style) => {
    ctx.font = style.font;
    return ctx.measureText(text).width;
  };
}

export function scaleFontSizes(fontSpec: FontSpec, profile: DeviceProfile): { en: number; cn: number; phonetic: number } {
  const scale = (size: number) => Math.max(1, Math.round(size * profile.fontScale));
  return {
    en: scale(fontSpec.sizeEn),
    cn: scale(fontSpec.sizeCn),
    phonetic: scale(fontSpec.sizePhonetic)
  };
}

export function computeCardLayout(job: RenderJob, fonts: CardFonts, canvas: Canvas): CardLayout {
  const { entry, phonetic } = job.line;
  return layoutCard({
    canvas: { width: canvas.width, height: canvas.height },
    english: entry.english,
    chinese: entry.chinese,
    phonetic,
    fonts,
    fontSizes: scaleFontSizes(job.fontSpec, job.profile),
    theme: job.theme,
    measure: createCanvasMeasurer(canvas.getContext('2d'))
  });
}

function fontStackFor(role: TextRole, fonts: CardFonts): CardFont[] {
  return role === 'chinese' ? [fonts.cn, fonts.en] : [fonts.en, fonts.cn];
}

function assertGlyphCoverage(layout: CardLayout, fonts: CardFonts, wordIndex: number): void {
  for (const line of layout.lines) {
    const stack = fontStackFor(line.role, fonts);
    const coverages = stack.flatMap((font) => (font.coverage ? [font.coverage] : []));
    // Only decidable when every font in the stack is a known file.
    if (coverages.length < stack.length) {
      continue;
    }
    const missing = findMissingGlyphs(line.text, coverages);
    if (missing.length) {
      throw new RenderFailureError(`No glyph for ${missing.map((char) => `"${char}"`).join(', ')} in the selected fonts`, {
        wordIndex
      });
    }
  }
}

export function renderCard(job: RenderJob, fonts: CardFonts): Canvas {
  try {
    const canvas = prepareCanvas(job.background.image, job.profile);
    applyBackdrop(canvas, job.theme.backdrop);
    const layout = computeCardLayout(job, fonts, canvas);
    assertGlyphCoverage(layout, fonts, job.index);
    drawPanel(canvas, layout.panelRect, job.theme, job.style);
    drawCardText(canvas.getContext('2d'), layout, job.theme);
    return canvas;
  } catch (error) {
    if (error instanceof RenderFailureError && error.wordIndex === undefined) {
      throw new RenderFailureError(error.message, { wordIndex: job.index, cause: error.cause });
    }
    if (error instanceof WordCardError) {
      throw error;
    }
    throw new RenderFailureError(`Unable to render "${job.line.entry.english}"`, { wordIndex: job.index, cause: error });
  }
}

export function encodeCard(canvas: Canvas, format: OutputFormat): Buffer {
  return format === 'jpg' ? canvas.toBuffer('image/jpeg', JPEG_QUALITY) : canvas.toBuffer('image/png');
}
