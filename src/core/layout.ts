import type { Insets, PlayerStatus, TubeTheme } from '../types';

/** What the player shell shows for a given session */
export type PlayerView = 'placeholder' | 'loading' | 'error' | 'surface';

export const DEFAULT_ASPECT_RATIO = 16 / 9;

const ZERO: Insets = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export const DEFAULT_THEME: Readonly<TubeTheme> = Object.freeze({
  accentColor: '#ff0000',
  bufferColor: '#9e9e9e',
  seekBarMargin: ZERO,
  fullscreenSeekBarMargin: ZERO,
  bottomBarMargin: Object.freeze({ top: 0, right: 8, bottom: 15, left: 16 }),
  fullscreenBottomBarMargin: Object.freeze({ top: 0, right: 8, bottom: 10, left: 16 }),
});

/** Merge theme overrides over the default theme. The result is frozen. */
export function createTheme(overrides: Partial<TubeTheme> = {}): Readonly<TubeTheme> {
  return Object.freeze({ ...DEFAULT_THEME, ...overrides });
}

/**
 * Pick the view for a status. Playback states only show the surface
 * once media is loaded.
 */
export function selectView(status: PlayerStatus, hasMedia: boolean): PlayerView {
  switch (status) {
    case 'loading':
      return 'loading';
    case 'error':
      return 'error';
    case 'playing':
    case 'paused':
    case 'stopped':
      return hasMedia ? 'surface' : 'placeholder';
    case 'initial':
      return 'placeholder';
  }
}

/** Player box for the available width. Invalid ratios fall back to 16:9. */
export function computeDimensions(
  availableWidth: number,
  aspectRatio: number = DEFAULT_ASPECT_RATIO
): { width: number; height: number } {
  const ratio = aspectRatio > 0 && Number.isFinite(aspectRatio) ? aspectRatio : DEFAULT_ASPECT_RATIO;
  const width = Math.max(0, availableWidth);
  return { width, height: width / ratio };
}

/** CSS margin shorthand for insets */
export function insetsToCss({ top, right, bottom, left }: Insets): string {
  return `${top}px ${right}px ${bottom}px ${left}px`;
}

/** Format seconds as m:ss, or h:mm:ss past an hour. */
export function formatTime(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const ss = String(s).padStart(2, '0');
  return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${ss}` : `${m}:${ss}`;
}

/** Menu label for a playback rate */
export function rateLabel(rate: number): string {
  return rate === 1 ? '1.0x (Normal)' : `${Number.isInteger(rate) ? rate.toFixed(1) : rate}x`;
}
