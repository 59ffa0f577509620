import { mkdtempSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createCanvas } from '@napi-rs/canvas';
import type { Logger } from '../../src/services/logger';

export function makeTempDir(prefix = 'word-cards-'): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function solidPng(width: number, height: number, color = '#ffffff'): Buffer {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = color;
  ctx.fillRect(0, 0, width, height);
  return canvas.toBuffer('image/png');
}

export function writeSolidPng(file: string, width: number, height: number, color = '#ffffff'): string {
  writeFileSync(file, solidPng(width, height, color));
  return file;
}

export interface RecordingLogger extends Logger {
  lines: { level: 'info' | 'warn' | 'error'; message: string }[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  return {
    lines,
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message })
  };
}
