import type { BackgroundShape, BackgroundStyle, ThemeName, ThemeSpec } from '../types';
import { InvalidConfigurationError } from '../utils/error';

export const THEME_NAMES: ThemeName[] = ['standard', 'focus', 'elegant', 'dark', 'minimal'];
export const BACKGROUND_SHAPES: BackgroundShape[] = ['rectangle', 'wave'];

function freezeTheme(theme: ThemeSpec): ThemeSpec {
  Object.freeze(theme.backdrop);
  Object.freeze(theme.panelFill);
  Object.freeze(theme.textEffect);
  return Object.freeze(theme);
}

const THEME_TABLE: Record<ThemeName, ThemeSpec> = {
  standard: {
    name: 'standard',
    backdrop: { blur: 0, brightness: 1 },
    panelFill: { kind: 'solid', color: 'rgba(0, 0, 0, 0.5)' },
    cornerStyle: 'rounded',
    cornerRadius: 30,
    textColor: '#ffffff',
    textEffect: { kind: 'shadow', offset: 2, color: 'rgba(0, 0, 0, 1)' },
    padding: 40,
    decoration: true
  },
  focus: {
    name: 'focus',
    backdrop: { blur: 8, brightness: 0.6 },
    panelFill: { kind: 'blurred', radius: 12, overlay: 'rgba(20, 20, 20, 0.35)' },
    cornerStyle: 'rounded',
    cornerRadius: 30,
    textColor: '#ffffff',
    textEffect: { kind: 'shadow', offset: 3, color: 'rgba(0, 0, 0, 0.78)' },
    padding: 40,
    decoration: true
  },
  elegant: {
    name: 'elegant',
    backdrop: { blur: 5, brightness: 0.85 },
    panelFill: { kind: 'gradient', top: 'rgba(40, 40, 40, 0.47)', bottom: 'rgba(40, 40, 40, 0.24)' },
    cornerStyle: 'rounded',
    cornerRadius: 30,
    textColor: '#ffffff',
    textEffect: { kind: 'shadow', offset: 2, color: 'rgba(0, 0, 0, 0.7)' },
    padding: 60,
    decoration: true
  },
  dark: {
    name: 'dark',
    backdrop: { blur: 3, brightness: 0.5 },
    panelFill: { kind: 'solid', color: 'rgba(10, 10, 10, 0.78)' },
    cornerStyle: 'square',
    cornerRadius: 0,
    textColor: '#e6e6e6',
    textEffect: { kind: 'stroke', widthRatio: 0.06, color: 'rgba(0, 0, 0, 0.9)' },
    padding: 40,
    decoration: true
  },
  // No panel and an untouched photo: the shadow is what keeps text readable.
  minimal: {
    name: 'minimal',
    backdrop: { blur: 0, brightness: 1 },
    panelFill: { kind: 'none' },
    cornerStyle: 'square',
    cornerRadius: 0,
    textColor: '#ffffff',
    textEffect: { kind: 'shadow', offset: 4, color: 'rgba(0, 0, 0, 0.9)' },
    padding: 0,
    decoration: false
  }
};

export const THEMES: Readonly<Record<ThemeName, ThemeSpec>> = Object.freeze({
  standard: freezeTheme(THEME_TABLE.standard),
  focus: freezeTheme(THEME_TABLE.focus),
  elegant: freezeTheme(THEME_TABLE.elegant),
  dark: freezeTheme(THEME_TABLE.dark),
  minimal: freezeTheme(THEME_TABLE.minimal)
});

export function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some((theme) => theme === value);
}

export function isBackgroundShape(value: string): value is BackgroundShape {
  return BACKGROUND_SHAPES.some((shape) => shape === value);
}

export function resolveTheme(name: string): ThemeSpec {
  const normalized = name.trim().toLowerCase();
  if (!isThemeName(normalized)) {
    throw new InvalidConfigurationError(`Unknown theme "${name}" (expected one of ${THEME_NAMES.join(', ')})`);
  }
  return THEMES[normalized];
}

export function resolveBackgroundStyle(shape: string): BackgroundStyle {
  const normalized = shape.trim().toLowerCase();
  if (!isBackgroundShape(normalized)) {
    throw new InvalidConfigurationError(
      `Unknown background style "${shape}" (expected one of ${BACKGROUND_SHAPES.join(', ')})`
    );
  }
  return { shape: normalized };
}
