export * from './types';
export * from './utils/error';
export { DEVICE_MODES, isDeviceMode, resolveDeviceProfile } from './constants/devices';
export { BACKGROUND_SHAPES, THEMES, THEME_NAMES, resolveBackgroundStyle, resolveTheme } from './constants/themes';
export { OUTPUT_FORMATS, normalizeConfig, toFontSpec, type WordCardConfigInput } from './constants/project';
export { loadConfigFromEnv } from './config';
export { parseWordList, readWordList } from './utils/csv';
export { layoutCard, fitTextField, minFontSize, splitLinesToFit, tokenizeText } from './utils/layout';
export type { CardLayout, LayoutLine, TextMeasurer } from './utils/layout';
export { buildPanelOutline, toPath2D } from './utils/outline';
export { resolveFontFile, findMissingGlyphs } from './utils/fonts';
export { drawPanel } from './services/panelRenderer';
export { drawCardText } from './services/textRenderer';
export { applyBackdrop, encodeCard, prepareCanvas, renderCard } from './services/cardRenderer';
export { loadCardFonts } from './services/fontRegistry';
export { decodeBackground, listBackgroundFiles, loadImagePool } from './services/imagePool';
export { cardFileName, generateCards, type BatchReport, type GenerateCardsOptions } from './services/cardBatch';
export { listCardFrames, planSlideshow, type SlideshowPlan } from './services/slideshow';
export { createConsoleLogger, silentLogger, type Logger } from './services/logger';
