import { expect, test } from '@playwright/test';
import { createCanvas, type Canvas } from '@napi-rs/canvas';
import { BACKGROUND_SHAPES, THEMES, THEME_NAMES } from '../../src/constants/themes';
import { drawPanel } from '../../src/services/panelRenderer';
import { drawCardText } from '../../src/services/textRenderer';
import { InvalidGeometryError } from '../../src/utils/error';

const SIZE = 200;
const panel = { x: 50, y: 50, width: 100, height: 100 };

function filledCanvas(color: string): Canvas {
  const canvas = createCanvas(SIZE, SIZE);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = color;
  ctx.fillRect(0, 0, SIZE, SIZE);
  return canvas;
}

function pixels(canvas: Canvas): Uint8ClampedArray {
  return canvas.getContext('2d').getImageData(0, 0, SIZE, SIZE).data;
}

function redAt(data: Uint8ClampedArray, x: number, y: number): number {
  return data[(y * SIZE + x) * 4];
}

function outside(x: number, y: number): boolean {
  return x < panel.x || y < panel.y || x >= panel.x + panel.width || y >= panel.y + panel.height;
}

for (const theme of THEME_NAMES) {
  for (const shape of BACKGROUND_SHAPES) {
    test(`${theme} ${shape} panel paints only inside its rectangle`, () => {
      const canvas = filledCanvas('#ffffff');
      const before = pixels(canvas);
      drawPanel(canvas, panel, THEMES[theme], { shape });
      const after = pixels(canvas);

      let changedOutside = 0;
      for (let y = 0; y < SIZE; y += 1) {
        for (let x = 0; x < SIZE; x += 1) {
          if (outside(x, y) && redAt(before, x, y) !== redAt(after, x, y)) {
            changedOutside += 1;
          }
        }
      }
      expect(changedOutside).toBe(0);

      if (theme === 'minimal') {
        expect(Buffer.from(after).equals(Buffer.from(before))).toBe(true);
      } else {
        expect(redAt(after, 100, 100)).toBeLessThan(250);
      }
    });
  }
}

test('standard panel darkens white by half', () => {
  const canvas = filledCanvas('#ffffff');
  drawPanel(canvas, panel, THEMES.standard, { shape: 'rectangle' });
  const red = redAt(pixels(canvas), 100, 100);
  expect(red).toBeGreaterThanOrEqual(126);
  expect(red).toBeLessThanOrEqual(129);
});

test('an empty panel rectangle is rejected', () => {
  const canvas = filledCanvas('#ffffff');
  expect(() => drawPanel(canvas, { x: 0, y: 0, width: 0, height: 10 }, THEMES.standard, { shape: 'rectangle' })).toThrow(
    InvalidGeometryError
  );
  expect(() => drawPanel(canvas, { x: 0, y: 0, width: 10, height: -1 }, THEMES.minimal, { shape: 'wave' })).toThrow(
    InvalidGeometryError
  );
});

test('divider line and its end dots use the text colour', () => {
  const canvas = filledCanvas('#000000');
  const layout = {
    panelRect: panel,
    textRect: panel,
    lines: [],
    divider: { x1: 60, x2: 140, y: 100 }
  };
  drawCardText(canvas.getContext('2d'), layout, THEMES.dark);
  const data = pixels(canvas);

  expect(redAt(data, 100, 100)).toBeGreaterThan(100);
  expect(redAt(data, 45, 100)).toBeGreaterThan(100);
  expect(redAt(data, 155, 100)).toBeGreaterThan(100);
  expect(redAt(data, 100, 60)).toBe(0);
});
