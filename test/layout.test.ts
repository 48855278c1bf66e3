import { describe, expect, it } from 'vitest';
import {
  DEFAULT_THEME,
  computeDimensions,
  createTheme,
  formatTime,
  insetsToCss,
  rateLabel,
  selectView,
} from '../src/core/layout';
import { isHlsUrl } from '../src/core/platform';

describe('selectView', () => {
  it('maps statuses to views', () => {
    expect(selectView('initial', false)).toBe('placeholder');
    expect(selectView('loading', true)).toBe('loading');
    expect(selectView('error', true)).toBe('error');
    expect(selectView('playing', true)).toBe('surface');
    expect(selectView('paused', true)).toBe('surface');
  });

  it('shows the placeholder for playback states without media', () => {
    expect(selectView('stopped', false)).toBe('placeholder');
    expect(selectView('playing', false)).toBe('placeholder');
  });
});

describe('computeDimensions', () => {
  it('derives the height from the width and ratio', () => {
    const wide = computeDimensions(640);
    expect(wide.width).toBe(640);
    expect(wide.height).toBeCloseTo(360);
    expect(computeDimensions(640, 4 / 3).height).toBeCloseTo(480);
  });

  it('falls back to 16:9 for unusable ratios', () => {
    expect(computeDimensions(320, 0).height).toBeCloseTo(180);
    expect(computeDimensions(320, Number.NaN).height).toBeCloseTo(180);
  });

  it('clamps negative widths', () => {
    expect(computeDimensions(-10)).toEqual({ width: 0, height: 0 });
  });
});

describe('createTheme', () => {
  it('overrides only the given fields and freezes the result', () => {
    const theme = createTheme({ accentColor: '#3b82f6' });

    expect(theme.accentColor).toBe('#3b82f6');
    expect(theme.bufferColor).toBe(DEFAULT_THEME.bufferColor);
    expect(theme.bottomBarMargin).toEqual({ top: 0, right: 8, bottom: 15, left: 16 });
    expect(Object.isFrozen(theme)).toBe(true);
  });
});

describe('formatting', () => {
  it('formats times', () => {
    expect(formatTime(0)).toBe('0:00');
    expect(formatTime(65.9)).toBe('1:05');
    expect(formatTime(3725)).toBe('1:02:05');
    expect(formatTime(Number.NaN)).toBe('0:00');
    expect(formatTime(-4)).toBe('0:00');
  });

  it('labels playback rates', () => {
    expect(rateLabel(0.5)).toBe('0.5x');
    expect(rateLabel(1)).toBe('1.0x (Normal)');
    expect(rateLabel(1.5)).toBe('1.5x');
    expect(rateLabel(2)).toBe('2.0x');
  });

  it('renders insets as a CSS margin', () => {
    expect(insetsToCss({ top: 0, right: 8, bottom: 10, left: 16 })).toBe('0px 8px 10px 16px');
  });
});

describe('isHlsUrl', () => {
  it('recognises playlist URLs', () => {
    expect(isHlsUrl('https://cdn.test/live/index.m3u8')).toBe(true);
    expect(isHlsUrl('https://cdn.test/api/manifest/hls_variant/id/1')).toBe(true);
    expect(isHlsUrl('https://cdn.test/videoplayback?itag=137')).toBe(false);
    expect(isHlsUrl('relative/index.m3u8?token=x')).toBe(true);
  });
});
