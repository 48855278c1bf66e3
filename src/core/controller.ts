import { YouTubeApi, withHighestBitrate } from './api';
import { Emitter } from './emitter';
import { HtmlMediaEngine } from './engine';
import {
  NoStreamError,
  PlayerError,
  ResolutionError,
  StateError,
  TubeError,
  toTubeError,
} from './errors';
import type {
  ControllerEvents,
  ControllerState,
  EventHandler,
  EventUnsubscribe,
  InitializeOptions,
  MediaEngine,
  MetadataService,
  PlayerStatus,
  VideoDescriptor,
} from '../types';

/** Menu of playback speeds offered by the player shell */
export const PLAYBACK_RATES: readonly number[] = [0.5, 1, 1.5, 2];

export interface TubeControllerOptions {
  /** Metadata/extraction service (default: YouTubeApi) */
  metadata?: MetadataService;
  /** Media engine (default: HtmlMediaEngine) */
  engine?: MediaEngine;
  /** Enable debug logging */
  debug?: boolean;
  /** Wait in ms before autoplay when the engine cannot acknowledge track attachment */
  settleDelay?: number;
  /** Upper bound in ms for resolution, manifest and track-attachment waits */
  resolveTimeout?: number;
  onStatusChange?: (status: PlayerStatus) => void;
  onProgress?: (position: number, duration: number) => void;
  onReady?: (controller: TubeController) => void;
  onError?: (error: TubeError) => void;
}

type ControllerConfig = Required<Pick<TubeControllerOptions, 'debug' | 'settleDelay' | 'resolveTimeout'>>;

const DEFAULT_CONFIG: ControllerConfig = {
  debug: false,
  settleDelay: 500,
  resolveTimeout: 15_000,
};

interface Session {
  locator: string | null;
  status: PlayerStatus;
  rate: number;
  aspectRatio: number | null;
  descriptor: VideoDescriptor | null;
  generation: number;
}

interface InFlight {
  locator: string;
  generation: number;
  promise: Promise<void>;
}

/**
 * Playback session controller.
 *
 * Resolves a YouTube locator to its best video-only and audio-only streams,
 * loads them into a media engine and reports a coarse lifecycle status.
 *
 * @example
 * ```js
 * const engine = new HtmlMediaEngine();
 * engine.attach(document.querySelector('video'));
 * const controller = new TubeController({
 *   engine,
 *   onStatusChange: (status) => console.log(status),
 * });
 * await controller.initialize('https://www.youtube.com/watch?v=aqz-KE-bpKQ');
 * ```
 */
export class TubeController {
  private config: ControllerConfig;
  private metadata: MetadataService;
  private _engine: MediaEngine;
  private emitter = new Emitter<ControllerEvents<TubeController>>('Tube Controller');
  private session: Session = {
    locator: null,
    status: 'initial',
    rate: 1,
    aspectRatio: null,
    descriptor: null,
    generation: 0,
  };
  private inFlight: InFlight | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readyEmitted = false;
  private _disposed = false;

  constructor(options: TubeControllerOptions = {}) {
    const { metadata, engine, onStatusChange, onProgress, onReady, onError } = options;
    this.config = {
      debug: options.debug ?? DEFAULT_CONFIG.debug,
      settleDelay: options.settleDelay ?? DEFAULT_CONFIG.settleDelay,
      resolveTimeout: options.resolveTimeout ?? DEFAULT_CONFIG.resolveTimeout,
    };
    this.metadata = metadata ?? new YouTubeApi({ debug: this.config.debug });
    this._engine = engine ?? new HtmlMediaEngine({ debug: this.config.debug });

    if (onStatusChange) this.on('status', onStatusChange);
    if (onProgress) this.on('progress', ({ position, duration }) => onProgress(position, duration));
    if (onReady) this.on('ready', onReady);
    if (onError) this.on('error', onError);

    this.bindEngineEvents();
  }

  private log(...args: unknown[]) {
    if (this.config.debug) console.log('[Tube Controller]', ...args);
  }

  // ─── Observers ───

  on<K extends keyof ControllerEvents>(
    event: K,
    handler: EventHandler<ControllerEvents<TubeController>[K]>
  ): EventUnsubscribe {
    return this.emitter.on(event, handler);
  }

  off<K extends keyof ControllerEvents>(event: K, handler: EventHandler<ControllerEvents<TubeController>[K]>): void {
    this.emitter.off(event, handler);
  }

  once<K extends keyof ControllerEvents>(
    event: K,
    handler: EventHandler<ControllerEvents<TubeController>[K]>
  ): EventUnsubscribe {
    return this.emitter.once(event, handler);
  }

  // ─── Session ───

  /**
   * Resolve a locator and load its streams into the engine.
   *
   * Failures never reject: they end in the `error` status and are reported
   * on the `error` channel. Only a disposed controller rejects, with StateError.
   */
  initialize(locator: string, options: InitializeOptions = {}): Promise<void> {
    if (this._disposed) return Promise.reject(new StateError('Controller is disposed'));

    if (!this.inFlight && locator === this.session.locator && this._engine.hasMedia) {
      this.log('Already initialized with', locator);
      return Promise.resolve();
    }
    if (this.inFlight?.locator === locator) {
      this.log('Initialization already in flight for', locator);
      return this.inFlight.promise;
    }

    const generation = ++this.session.generation;
    this.setStatus('loading');

    // Calls run one after another; a newer call makes older ones stale.
    const promise = this.queue.then(() => this.load(generation, locator, options));
    this.queue = promise;
    this.inFlight = { locator, generation, promise };
    return promise.finally(() => {
      if (this.inFlight?.generation === generation) this.inFlight = null;
    });
  }

  private async load(generation: number, locator: string, options: InitializeOptions): Promise<void> {
    const stale = () => this._disposed || generation !== this.session.generation;
    if (stale()) {
      this.log('Skipping superseded initialization of', locator);
      return;
    }

    const { autoPlay = true, aspectRatio } = options;
    try {
      if (!locator.trim()) throw new ResolutionError('Locator is empty');
      if (aspectRatio !== undefined && !(aspectRatio > 0 && Number.isFinite(aspectRatio))) {
        throw new ResolutionError(`Aspect ratio must be a positive number, got ${aspectRatio}`);
      }

      this.log('Fetching video info for', locator);
      const descriptor = await this.bounded(this.metadata.getVideoDescriptor(locator), 'Video lookup', resolutionTimeout);
      if (stale()) return;

      const manifest = await this.bounded(this.metadata.getStreamManifest(descriptor), 'Manifest fetch', resolutionTimeout);
      if (stale()) return;

      const video = withHighestBitrate(manifest.videoOnly);
      if (!video) throw new NoStreamError('video', descriptor.id);
      const audio = withHighestBitrate(manifest.audioOnly);
      if (!audio) throw new NoStreamError('audio', descriptor.id);
      this.log(`Selected video ${video.label} (${video.bitrate}), audio ${audio.label} (${audio.bitrate})`);

      // The engine no longer holds the recorded session from here on.
      this.session.locator = null;
      this.session.descriptor = null;

      if (this._engine.hasMedia) {
        this.log('Stopping previous playback');
        await this._engine.stop();
        if (stale()) return;
      }

      await this._engine.open(video.url, { play: false });
      if (stale()) return;
      await this._engine.setAudioTrack(audio.url);
      if (stale()) return;

      await this.settle();
      if (stale()) return;

      if (this.session.rate !== 1) await this._engine.setRate(this.session.rate);
      const started = autoPlay && (await this.startPlayback());
      if (stale()) return;

      this.session.locator = locator;
      this.session.descriptor = descriptor;
      this.session.aspectRatio = aspectRatio ?? null;
      this.inFlight = null;
      this.setStatus(started ? 'playing' : 'paused');
      this.log('Initialization complete. Status:', this.session.status);

      if (!this.readyEmitted) {
        this.readyEmitted = true;
        this.emitter.emit('ready', this);
      }
    } catch (err) {
      if (stale()) {
        this.log('Discarding failure of superseded initialization:', err);
        return;
      }
      this.inFlight = null;
      this.session.locator = null;
      this.session.descriptor = null;
      this.fail(toTubeError(err, (message, opts) => new PlayerError(message, true, opts)));
    }
  }

  /**
   * Start playback after loading. A refusal by the autoplay policy leaves
   * the session paused instead of failing it.
   */
  private async startPlayback(): Promise<boolean> {
    try {
      await this._engine.play();
      return true;
    } catch (err) {
      if (!isAutoplayBlocked(err)) throw err;
      this.log('Autoplay blocked, staying paused');
      return false;
    }
  }

  /** Wait until the engine has attached the audio track. */
  private async settle(): Promise<void> {
    if (this._engine.waitForTracks) {
      await this.bounded(this._engine.waitForTracks(), 'Audio track attachment', trackTimeout);
      return;
    }
    await delay(this.config.settleDelay);
  }

  private async bounded<T>(task: Promise<T>, label: string, onTimeout: (message: string) => TubeError): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(onTimeout(`${label} timed out after ${this.config.resolveTimeout}ms`)),
        this.config.resolveTimeout
      );
    });
    try {
      return await Promise.race([task, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ─── Playback Controls ───

  async play(): Promise<void> {
    this.assertAlive();
    this.log('Play requested');
    await this._engine.play();
  }

  async pause(): Promise<void> {
    this.assertAlive();
    this.log('Pause requested');
    await this._engine.pause();
  }

  async stop(): Promise<void> {
    this.assertAlive();
    this.log('Stop requested');
    await this._engine.stop();
  }

  async seek(seconds: number): Promise<void> {
    this.assertAlive();
    await this._engine.seek(Math.max(0, seconds));
  }

  /** Apply a playback-speed multiplier. */
  async setRate(rate: number): Promise<void> {
    this.assertAlive();
    if (!(rate > 0 && Number.isFinite(rate))) throw new RangeError(`Invalid playback rate: ${rate}`);
    this.log('Rate:', rate);
    this.session.rate = rate;
    await this._engine.setRate(rate);
  }

  // ─── State ───

  get status(): PlayerStatus {
    return this.session.status;
  }

  get locator(): string | null {
    return this.session.locator;
  }

  get descriptor(): VideoDescriptor | null {
    return this.session.descriptor;
  }

  get aspectRatio(): number | null {
    return this.session.aspectRatio;
  }

  get rate(): number {
    return this.session.rate;
  }

  get position(): number {
    return this._engine.position;
  }

  get duration(): number {
    return this._engine.duration;
  }

  /** Whether the engine currently has media loaded */
  get isInitialized(): boolean {
    return !this._disposed && this._engine.hasMedia;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /** The media engine, for attaching a rendering surface */
  get engine(): MediaEngine {
    return this._engine;
  }

  getState(): ControllerState {
    return {
      status: this.session.status,
      locator: this.session.locator,
      descriptor: this.session.descriptor,
      position: this.position,
      duration: this.duration,
      rate: this.session.rate,
      aspectRatio: this.session.aspectRatio,
      initialized: this.isInitialized,
    };
  }

  // ─── Cleanup ───

  /**
   * Release the engine and the metadata client.
   * The controller cannot be used afterwards.
   */
  dispose(): void {
    if (this._disposed) throw new StateError('Controller is already disposed');
    this.log('Disposing');
    this._disposed = true;
    this.inFlight = null;
    this.emitter.clear();
    this._engine.dispose();
    this.metadata.close();
  }

  // ─── Private ───

  private assertAlive(): void {
    if (this._disposed) throw new StateError('Controller is disposed');
  }

  private setStatus(status: PlayerStatus): void {
    if (this.session.status === status) return;
    this.session.status = status;
    this.log('Status changed to', status);
    this.emitter.emit('status', status);
  }

  private fail(error: TubeError): void {
    this.log(`${error.name}:`, error.message);
    this.emitter.emit('error', error);
    this.setStatus('error');
  }

  private bindEngineEvents(): void {
    const engine = this._engine;
    // While an initialize is running it owns the status.
    const loading = () => this.inFlight !== null;

    engine.on('playing', (playing) => {
      this.log('Playing state changed to', playing);
      if (!loading()) this.setStatus(playing ? 'playing' : 'paused');
    });

    engine.on('completed', () => {
      this.log('Playback completed');
      if (!loading()) this.setStatus('stopped');
    });

    engine.on('position', (progress) => {
      this.emitter.emit('progress', progress);
    });

    engine.on('error', (info) => {
      const error = new PlayerError(info.message, info.fatal);
      if (!info.fatal) {
        this.log('Recoverable engine error:', info.message);
        this.emitter.emit('error', error);
        return;
      }
      this.fail(error);
    });

    engine.on('tracks', (tracks) => {
      this.log('Tracks:', tracks);
    });
  }
}

function isAutoplayBlocked(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'NotAllowedError';
}

function resolutionTimeout(message: string): TubeError {
  return new ResolutionError(message);
}

function trackTimeout(message: string): TubeError {
  return new PlayerError(message);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
