import type { PlatformInfo } from '../types';

let cached: PlatformInfo | null = null;

/**
 * Detect how this browser can play HLS sources.
 * Results are cached after first call.
 */
export function detectPlatform(): PlatformInfo {
  if (cached) return cached;

  if (typeof document === 'undefined') {
    // SSR / non-browser
    cached = { supportsNativeHLS: false, supportsHlsJs: false };
    return cached;
  }

  const probe = document.createElement('video');
  const supportsNativeHLS = probe.canPlayType('application/vnd.apple.mpegurl') !== '';

  // hls.js requires MSE
  const supportsHlsJs =
    typeof MediaSource !== 'undefined' &&
    typeof MediaSource.isTypeSupported === 'function';

  cached = { supportsNativeHLS, supportsHlsJs };
  return cached;
}

/** Whether a stream URL points at an HLS playlist (live streams are served this way). */
export function isHlsUrl(url: string): boolean {
  try {
    return new URL(url).pathname.endsWith('.m3u8') || /\/manifest\/hls_/.test(url);
  } catch {
    return /\.m3u8(\?|$)/.test(url);
  }
}
