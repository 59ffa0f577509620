import type { Image } from '@napi-rs/canvas';

export type DeviceMode = 'auto' | 'mobile' | 'tablet' | 'desktop';
export type ThemeName = 'standard' | 'focus' | 'elegant' | 'dark' | 'minimal';
export type BackgroundShape = 'rectangle' | 'wave';
export type CornerStyle = 'square' | 'rounded';
export type OutputFormat = 'png' | 'jpg';

export type TextRole = 'english' | 'phonetic' | 'chinese';
export type FontScript = 'en' | 'cn';

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface WordEntry {
  readonly english: string;
  readonly chinese: string;
}

export interface WordLine {
  entry: WordEntry;
  phonetic?: string;
}

export interface DeviceProfile {
  name: DeviceMode;
  /** `null` keeps the background's own size. */
  canvasSize: Size | null;
  fontScale: number;
}

export type PanelFill =
  | { readonly kind: 'solid'; readonly color: string }
  | { readonly kind: 'blurred'; readonly radius: number; readonly overlay: string }
  | { readonly kind: 'gradient'; readonly top: string; readonly bottom: string }
  | { readonly kind: 'none' };

export type TextEffect =
  | { readonly kind: 'shadow'; readonly offset: number; readonly color: string }
  | { readonly kind: 'stroke'; readonly widthRatio: number; readonly color: string };

/** Whole-background treatment applied before the panel is drawn. */
export interface Backdrop {
  readonly blur: number;
  /** 1 leaves the photo as is, lower values darken it. */
  readonly brightness: number;
}

export interface ThemeSpec {
  readonly name: ThemeName;
  readonly backdrop: Backdrop;
  readonly panelFill: PanelFill;
  readonly cornerStyle: CornerStyle;
  readonly cornerRadius: number;
  readonly textColor: string;
  readonly textEffect: TextEffect;
  readonly padding: number;
  readonly decoration: boolean;
}

export interface BackgroundStyle {
  shape: BackgroundShape;
}

export interface FontSpec {
  pathEn?: string;
  pathCn?: string;
  sizeEn: number;
  sizeCn: number;
  sizePhonetic: number;
}

export interface GlyphCoverage {
  covers(codePoint: number): boolean;
}

export interface CardFont {
  /** Family name used in canvas font strings. */
  family: string;
  file?: string;
  coverage?: GlyphCoverage;
}

export interface CardFonts {
  en: CardFont;
  cn: CardFont;
}

/** A background known to decode; its pixels are loaded again for each card. */
export interface BackgroundFile {
  file: string;
  width: number;
  height: number;
}

export interface BackgroundImage {
  file: string;
  image: Image;
}

export interface RenderJob {
  index: number;
  line: WordLine;
  background: BackgroundImage;
  profile: DeviceProfile;
  theme: ThemeSpec;
  style: BackgroundStyle;
  fontSpec: FontSpec;
}

export interface WordCardConfig {
  imagesDir: string;
  wordsFile: string;
  outputDir: string;
  fontSizeEn: number;
  fontSizeCn: number;
  fontSizePhonetic: number;
  fontPathEn?: string;
  fontPathCn?: string;
  fontsDir: string;
  theme: ThemeName;
  device: DeviceMode;
  bgStyle: BackgroundShape;
  format: OutputFormat;
  platform: NodeJS.Platform;
  perfDebug: boolean;
}
