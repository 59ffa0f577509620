import { Path2D } from '@napi-rs/canvas';
import type { BackgroundShape, Rect } from '../types';

export type OutlineCommand =
  | { op: 'moveTo'; x: number; y: number }
  | { op: 'lineTo'; x: number; y: number }
  | { op: 'quadraticCurveTo'; cpx: number; cpy: number; x: number; y: number }
  | { op: 'closePath' };

export const WAVE_CYCLES = 3;
export const WAVE_MAX_AMPLITUDE = 18;
export const WAVE_AMPLITUDE_RATIO = 0.08;
const WAVE_SAMPLE_STEP = 4;

export function rectangleOutline(rect: Rect, radius: number): OutlineCommand[] {
  const { x, y, width, height } = rect;
  const r = Math.max(0, Math.min(radius, width / 2, height / 2));
  if (r === 0) {
    return [
      { op: 'moveTo', x, y },
      { op: 'lineTo', x: x + width, y },
      { op: 'lineTo', x: x + width, y: y + height },
      { op: 'lineTo', x, y: y + height },
      { op: 'closePath' }
    ];
  }
  return [
    { op: 'moveTo', x: x + r, y },
    { op: 'lineTo', x: x + width - r, y },
    { op: 'quadraticCurveTo', cpx: x + width, cpy: y, x: x + width, y: y + r },
    { op: 'lineTo', x: x + width, y: y + height - r },
    { op: 'quadraticCurveTo', cpx: x + width, cpy: y + height, x: x + width - r, y: y + height },
    { op: 'lineTo', x: x + r, y: y + height },
    { op: 'quadraticCurveTo', cpx: x, cpy: y + height, x, y: y + height - r },
    { op: 'lineTo', x, y: y + r },
    { op: 'quadraticCurveTo', cpx: x, cpy: y, x: x + r, y },
    { op: 'closePath' }
  ];
}

export function waveAmplitude(rect: Rect): number {
  return Math.min(WAVE_MAX_AMPLITUDE, rect.height * WAVE_AMPLITUDE_RATIO);
}

/**
 * Panel whose top and bottom edges are cosine waves bending inward from the
 * rectangle's edges. The horizontal centre is a crest on both edges, so the
 * shape mirrors around it.
 */
export function waveOutline(rect: Rect): OutlineCommand[] {
  const { x, y, width, height } = rect;
  const amplitude = waveAmplitude(rect);
  const wavelength = width / WAVE_CYCLES;
  const centerX = x + width / 2;
  let samples = Math.max(8, Math.ceil(width / WAVE_SAMPLE_STEP));
  if (samples % 2 === 1) {
    samples += 1;
  }

  const inset = (px: number) => amplitude * (1 - Math.cos((2 * Math.PI * (px - centerX)) / wavelength));
  const xs = Array.from({ length: samples + 1 }, (_, i) => x + (width * i) / samples);

  const commands: OutlineCommand[] = [];
  xs.forEach((px, i) => {
    commands.push({ op: i === 0 ? 'moveTo' : 'lineTo', x: px, y: y + inset(px) });
  });
  for (const px of [...xs].reverse()) {
    commands.push({ op: 'lineTo', x: px, y: y + height - inset(px) });
  }
  commands.push({ op: 'closePath' });
  return commands;
}

export function buildPanelOutline(shape: BackgroundShape, rect: Rect, cornerRadius: number): OutlineCommand[] {
  return shape === 'wave' ? waveOutline(rect) : rectangleOutline(rect, cornerRadius);
}

export function toPath2D(commands: OutlineCommand[]): Path2D {
  const path = new Path2D();
  for (const command of commands) {
    switch (command.op) {
      case 'moveTo':
        path.moveTo(command.x, command.y);
        break;
      case 'lineTo':
        path.lineTo(command.x, command.y);
        break;
      case 'quadraticCurveTo':
        path.quadraticCurveTo(command.cpx, command.cpy, command.x, command.y);
        break;
      case 'closePath':
        path.closePath();
        break;
    }
  }
  return path;
}
