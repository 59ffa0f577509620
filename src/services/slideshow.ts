import { listBackgroundFiles } from './imagePool';

export interface SlideshowFrame {
  file: string;
  start: number;
  duration: number;
}

export interface SlideshowPlan {
  frames: SlideshowFrame[];
  fade: number;
  totalDuration: number;
}

export interface SlideshowOptions {
  /** Seconds the whole slideshow should last. */
  targetDuration?: number;
  /** Fade-in/out length per frame, in seconds. */
  fade?: number;
}

/** Card images in the order the slideshow stage plays them. */
export function listCardFrames(dir: string): string[] {
  return listBackgroundFiles(dir);
}

export function planSlideshow(frames: string[], options: SlideshowOptions = {}): SlideshowPlan {
  const { targetDuration = 60, fade = 0.5 } = options;
  if (!frames.length) {
    return { frames: [], fade: 0, totalDuration: 0 };
  }
  const duration = targetDuration / frames.length;
  return {
    frames: frames.map((file, index) => ({ file, start: index * duration, duration })),
    fade: Math.min(fade, duration / 2),
    totalDuration: duration * frames.length
  };
}
