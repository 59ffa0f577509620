export type WordCardErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'NO_BACKGROUND_IMAGES'
  | 'UNREADABLE_IMAGE'
  | 'RENDER_FAILURE'
  | 'INVALID_GEOMETRY';

export class WordCardError extends Error {
  readonly code: WordCardErrorCode;

  constructor(code: WordCardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WordCardError';
    this.code = code;
  }
}

export class InvalidConfigurationError extends WordCardError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'InvalidConfigurationError';
  }
}

export class NoBackgroundImagesError extends WordCardError {
  constructor(imagesDir: string) {
    super('NO_BACKGROUND_IMAGES', `No usable background images in ${imagesDir}`);
    this.name = 'NoBackgroundImagesError';
  }
}

export class UnreadableImageError extends WordCardError {
  readonly file: string;

  constructor(file: string, cause?: unknown) {
    super('UNREADABLE_IMAGE', `Unable to decode image ${file}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'UnreadableImageError';
    this.file = file;
  }
}

export class RenderFailureError extends WordCardError {
  readonly wordIndex?: number;

  constructor(message: string, options: { wordIndex?: number; cause?: unknown } = {}) {
    super('RENDER_FAILURE', message, { cause: options.cause });
    this.name = 'RenderFailureError';
    this.wordIndex = options.wordIndex;
  }
}

export class InvalidGeometryError extends WordCardError {
  constructor(message: string) {
    super('INVALID_GEOMETRY', message);
    this.name = 'InvalidGeometryError';
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error === undefined || error === null) {
    return 'Unknown error';
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};
