import { type Canvas, type Path2D, type SKRSContext2D, createCanvas } from '@napi-rs/canvas';
import type { BackgroundStyle, PanelFill, Rect, ThemeSpec } from '../types';
import { InvalidGeometryError } from '../utils/error';
import { buildPanelOutline, toPath2D } from '../utils/outline';

function fillOutline(canvas: Canvas, ctx: SKRSContext2D, path: Path2D, rect: Rect, fill: PanelFill): void {
  switch (fill.kind) {
    case 'solid':
      ctx.fillStyle = fill.color;
      ctx.fill(path);
      return;
    case 'blurred': {
      // Blur reads from a copy so the filter never samples pixels it has already written.
      const snapshot = createCanvas(canvas.width, canvas.height);
      snapshot.getContext('2d').drawImage(canvas, 0, 0);
      ctx.save();
      ctx.clip(path);
      ctx.filter = `blur(${fill.radius}px)`;
      ctx.drawImage(snapshot, 0, 0);
      ctx.restore();
      ctx.fillStyle = fill.overlay;
      ctx.fill(path);
      return;
    }
    case 'gradient': {
      const gradient = ctx.createLinearGradient(0, rect.y, 0, rect.y + rect.height);
      gradient.addColorStop(0, fill.top);
      gradient.addColorStop(1, fill.bottom);
      ctx.fillStyle = gradient;
      ctx.fill(path);
      return;
    }
    case 'none':
      return;
  }
}

/**
 * Paint the theme's panel behind the text block. Rectangle and wave panels
 * differ only in the outline handed to the shared fill step.
 */
export function drawPanel(canvas: Canvas, rect: Rect, theme: ThemeSpec, style: BackgroundStyle): void {
  if (!(rect.width > 0) || !(rect.height > 0)) {
    throw new InvalidGeometryError(`Panel must have a positive size, got ${rect.width}x${rect.height}`);
  }
  if (theme.panelFill.kind === 'none') {
    return;
  }

  const radius = theme.cornerStyle === 'rounded' ? theme.cornerRadius : 0;
  const path = toPath2D(buildPanelOutline(style.shape, rect, radius));
  const ctx = canvas.getContext('2d');

  ctx.save();
  try {
    fillOutline(canvas, ctx, path, rect, theme.panelFill);
  } finally {
    ctx.restore();
  }
}
