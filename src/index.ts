/**
 * tube-player
 *
 * Framework-agnostic YouTube playback.
 *
 * Core:
 *   TubeController:  resolves a locator and loads its streams
 *   YouTubeApi:      video metadata & stream manifests
 *   HtmlMediaEngine: <video>/<audio> playback, hls.js for live streams
 *   detectPlatform:  HLS playback capability detection
 *
 * React:
 *   import { TubePlayer, useTubeController } from 'tube-player/react';
 */

// Controller
export { TubeController, PLAYBACK_RATES } from './core/controller';
export type { TubeControllerOptions } from './core/controller';

// Metadata service
export { YouTubeApi, formatsToManifest, parseVideoId, withHighestBitrate } from './core/api';
export type { ExtractedFormat, YouTubeApiOptions } from './core/api';

// Media engine
export { HtmlMediaEngine } from './core/engine';
export type { HtmlMediaEngineConfig } from './core/engine';

// Errors
export {
  TubeError,
  ResolutionError,
  NoStreamError,
  PlayerError,
  StateError,
} from './core/errors';
export type { TubeErrorCode } from './core/errors';

// Layout helpers
export {
  DEFAULT_ASPECT_RATIO,
  DEFAULT_THEME,
  createTheme,
  selectView,
  computeDimensions,
  formatTime,
  rateLabel,
} from './core/layout';
export type { PlayerView } from './core/layout';

// Platform detection
export { detectPlatform } from './core/platform';

// Types
export type {
  PlayerStatus,
  VideoDescriptor,
  StreamInfo,
  StreamManifest,
  Progress,
  EngineErrorInfo,
  TrackInfo,
  MetadataService,
  MediaEngine,
  MediaEngineEvents,
  OpenOptions,
  InitializeOptions,
  ControllerState,
  ControllerEvents,
  Insets,
  TubeTheme,
  PlatformInfo,
  EventHandler,
  EventUnsubscribe,
} from './types';
