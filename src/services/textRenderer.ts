import type { SKRSContext2D } from '@napi-rs/canvas';
import type { ThemeSpec } from '../types';
import type { CardLayout, Divider, LayoutLine } from '../utils/layout';

const DIVIDER_ALPHA = 0.6;
const DIVIDER_DOT_RADIUS = 3;
const DIVIDER_DOT_GAP = 15;

function drawLine(ctx: SKRSContext2D, line: LayoutLine, theme: ThemeSpec): void {
  ctx.font = line.font;
  const effect = theme.textEffect;

  if (effect.kind === 'shadow') {
    ctx.fillStyle = effect.color;
    ctx.fillText(line.text, line.x + effect.offset, line.baseline + effect.offset);
  } else {
    ctx.strokeStyle = effect.color;
    ctx.lineWidth = Math.max(2, line.fontSize * effect.widthRatio);
    ctx.lineJoin = 'round';
    ctx.strokeText(line.text, line.x, line.baseline);
  }

  ctx.fillStyle = line.color;
  ctx.fillText(line.text, line.x, line.baseline);
}

function drawDivider(ctx: SKRSContext2D, divider: Divider, color: string): void {
  ctx.globalAlpha = DIVIDER_ALPHA;
  ctx.strokeStyle = color;
  ctx.fillStyle = color;
  ctx.lineWidth = 2;
  ctx.beginPath();
  ctx.moveTo(divider.x1, divider.y);
  ctx.lineTo(divider.x2, divider.y);
  ctx.stroke();

  for (const x of [divider.x1 - DIVIDER_DOT_GAP, divider.x2 + DIVIDER_DOT_GAP]) {
    ctx.beginPath();
    ctx.arc(x, divider.y, DIVIDER_DOT_RADIUS, 0, Math.PI * 2);
    ctx.fill();
  }
}

export function drawCardText(ctx: SKRSContext2D, layout: CardLayout, theme: ThemeSpec): void {
  ctx.save();
  try {
    if (layout.divider) {
      ctx.save();
      drawDivider(ctx, layout.divider, theme.textColor);
      ctx.restore();
    }
    ctx.textAlign = 'center';
    ctx.textBaseline = 'alphabetic';
    for (const line of layout.lines) {
      drawLine(ctx, line, theme);
    }
  } finally {
    ctx.restore();
  }
}
