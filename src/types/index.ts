import type { TubeError } from '../core/errors';

/** Coarse lifecycle status of a playback session */
export type PlayerStatus = 'initial' | 'loading' | 'playing' | 'paused' | 'stopped' | 'error';

/** Metadata record for a resolved video */
export interface VideoDescriptor {
  id: string;
  title: string;
  author: string | null;
  /** Duration in seconds (0 when unknown, e.g. live streams) */
  duration: number;
  thumbnail: string | null;
}

/** A single stream variant */
export interface StreamInfo {
  url: string;
  /** Bits per second */
  bitrate: number;
  /** Quality label, e.g. "1080p" or "160kbps" */
  label: string;
  mimeType?: string;
}

/** Stream variants available for a descriptor */
export interface StreamManifest {
  videoOnly: StreamInfo[];
  audioOnly: StreamInfo[];
}

/** Position update, both values in seconds */
export interface Progress {
  position: number;
  duration: number;
}

/** Engine error as reported by the underlying media element */
export interface EngineErrorInfo {
  message: string;
  code?: number;
  fatal: boolean;
}

/** Informational track metadata */
export interface TrackInfo {
  width: number;
  height: number;
  hasAudioTrack: boolean;
}

/** Resolves locators to descriptors and stream manifests */
export interface MetadataService {
  getVideoDescriptor(locator: string): Promise<VideoDescriptor>;
  getStreamManifest(descriptor: VideoDescriptor): Promise<StreamManifest>;
  /** Release the client. Called exactly once by the owning controller. */
  close(): void;
}

/** Events emitted by a media engine, keyed by payload */
export interface MediaEngineEvents {
  playing: boolean;
  completed: void;
  position: Progress;
  error: EngineErrorInfo;
  tracks: TrackInfo;
}

export interface OpenOptions {
  /** Start playback immediately after opening */
  play: boolean;
}

/** Opaque media player the controller drives */
export interface MediaEngine {
  /** Whether a source is currently loaded */
  readonly hasMedia: boolean;
  readonly position: number;
  readonly duration: number;
  open(url: string, options: OpenOptions): Promise<void>;
  setAudioTrack(url: string): Promise<void>;
  /**
   * Resolves once the audio track set by `setAudioTrack` is attached.
   * Engines without it get a fixed settle delay instead.
   */
  waitForTracks?(): Promise<void>;
  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  seek(seconds: number): Promise<void>;
  setRate(rate: number): Promise<void>;
  on<K extends keyof MediaEngineEvents>(event: K, handler: EventHandler<MediaEngineEvents[K]>): EventUnsubscribe;
  /** Render into a <video> element, for engines that draw through the DOM */
  attach?(element: HTMLVideoElement): void;
  detach?(): void;
  dispose(): void;
}

/** Options for a single initialize call */
export interface InitializeOptions {
  /** Start playing once loaded (default: true) */
  autoPlay?: boolean;
  /** Positive width/height ratio the surface should use */
  aspectRatio?: number;
}

/** Snapshot of the controller's session */
export interface ControllerState {
  status: PlayerStatus;
  locator: string | null;
  descriptor: VideoDescriptor | null;
  position: number;
  duration: number;
  rate: number;
  aspectRatio: number | null;
  initialized: boolean;
}

/** Events emitted by the controller, keyed by payload */
export interface ControllerEvents<C = unknown> {
  status: PlayerStatus;
  progress: Progress;
  /** Fired at most once, after the first successful initialize */
  ready: C;
  /** Diagnostic channel carrying the cause behind an `error` status */
  error: TubeError;
}

/** Spacing in CSS pixels */
export interface Insets {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/** Visual configuration threaded through the player shell */
export interface TubeTheme {
  /** Seek bar position/thumb colour */
  accentColor: string;
  bufferColor: string;
  seekBarMargin: Insets;
  fullscreenSeekBarMargin: Insets;
  bottomBarMargin: Insets;
  fullscreenBottomBarMargin: Insets;
}

/** Platform detection results */
export interface PlatformInfo {
  supportsNativeHLS: boolean;
  supportsHlsJs: boolean;
}

/** Type-safe event handler */
export type EventHandler<P> = (payload: P) => void;
export type EventUnsubscribe = () => void;
