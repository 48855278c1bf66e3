import Hls, { type HlsConfig } from 'hls.js';
import { Emitter } from './emitter';
import { PlayerError } from './errors';
import { detectPlatform, isHlsUrl } from './platform';
import type {
  EngineErrorInfo,
  EventHandler,
  EventUnsubscribe,
  MediaEngine,
  MediaEngineEvents,
  OpenOptions,
} from '../types';

export interface HtmlMediaEngineConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** hls.js configuration overrides (live streams only) */
  hlsConfig?: Partial<HlsConfig>;
  /** Audio/video drift in seconds tolerated before the audio element is resynced */
  maxDrift?: number;
}

const DEFAULT_CONFIG: Required<HtmlMediaEngineConfig> = {
  debug: false,
  hlsConfig: {},
  maxDrift: 0.3,
};

/**
 * Media engine backed by HTML media elements.
 *
 * The video-only stream plays in an attached <video> element; the audio-only
 * stream plays in a detached <audio> element kept in step with it.
 * HLS sources go through hls.js where MSE is available.
 *
 * @example
 * ```js
 * const engine = new HtmlMediaEngine();
 * engine.attach(document.querySelector('video'));
 * await engine.open(videoUrl, { play: false });
 * await engine.setAudioTrack(audioUrl);
 * await engine.waitForTracks();
 * await engine.play();
 * ```
 */
export class HtmlMediaEngine implements MediaEngine {
  private config: Required<HtmlMediaEngineConfig>;
  private platform = detectPlatform();
  private video: HTMLVideoElement | null = null;
  private audio: HTMLAudioElement | null = null;
  private hls: Hls | null = null;
  private emitter = new Emitter<MediaEngineEvents>('Tube Engine');
  private source: string | null = null;
  private audioSource: string | null = null;
  private audioReady: Promise<void> | null = null;
  private rate = 1;
  private _destroyed = false;
  private cleanupFns: (() => void)[] = [];

  constructor(config?: HtmlMediaEngineConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private log(...args: unknown[]) {
    if (this.config.debug) console.log('[Tube Engine]', ...args);
  }

  on<K extends keyof MediaEngineEvents>(event: K, handler: EventHandler<MediaEngineEvents[K]>): EventUnsubscribe {
    return this.emitter.on(event, handler);
  }

  // ─── Lifecycle ───

  /**
   * Attach the engine to a <video> element.
   * A source opened before attachment is loaded now.
   */
  attach(element: HTMLVideoElement): this {
    if (this._destroyed) throw new PlayerError('Engine is destroyed');
    if (this.video === element) return this;

    this.detach();
    this.video = element;

    element.setAttribute('playsinline', '');
    element.setAttribute('webkit-playsinline', '');
    // Sound comes from the audio element whenever one is set.
    element.muted = this.audioSource !== null;
    element.playbackRate = this.rate;

    this.bindVideoEvents(element);

    if (this.source) this.loadSource(this.source);

    this.log('Attached to video element');
    return this;
  }

  /**
   * Detach from the current <video> element. The opened source is kept.
   */
  detach(): this {
    this.destroyHls();
    this.cleanupFns.forEach((fn) => fn());
    this.cleanupFns = [];

    if (this.video) {
      this.video.pause();
      this.video.removeAttribute('src');
      this.video.load();
    }
    this.video = null;
    return this;
  }

  get hasMedia(): boolean {
    return this.source !== null;
  }

  get position(): number {
    return this.video?.currentTime || 0;
  }

  get duration(): number {
    const duration = this.video?.duration;
    return duration && Number.isFinite(duration) ? duration : 0;
  }

  /** The attached <video> element, if any */
  get element(): HTMLVideoElement | null {
    return this.video;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  async open(url: string, options: OpenOptions): Promise<void> {
    this.assertAlive();
    this.source = url;
    this.log('Opening:', url.substring(0, 80));
    if (this.video) this.loadSource(url);
    if (options.play) await this.play();
  }

  async setAudioTrack(url: string): Promise<void> {
    this.assertAlive();
    if (typeof document === 'undefined') throw new PlayerError('Audio tracks need a DOM');

    this.releaseAudio();
    const audio = document.createElement('audio');
    audio.preload = 'auto';
    audio.playbackRate = this.rate;

    this.audioReady = new Promise<void>((resolve, reject) => {
      audio.addEventListener('loadedmetadata', () => resolve(), { once: true });
      audio.addEventListener(
        'error',
        () => reject(new PlayerError(audio.error?.message || 'Audio track failed to load')),
        { once: true }
      );
    });
    // Rejections surface through waitForTracks(); keep this one from going unhandled.
    this.audioReady.catch((err: unknown) => this.log('Audio track error:', err));

    audio.src = url;
    this.audio = audio;
    this.audioSource = url;
    if (this.video) this.video.muted = true;
    this.log('Audio track set:', url.substring(0, 80));
  }

  waitForTracks(): Promise<void> {
    return this.audioReady ?? Promise.resolve();
  }

  // ─── Playback Controls ───

  async play(): Promise<void> {
    const video = this.video;
    if (!video) throw new PlayerError('No video element attached');
    const audio = this.audio;
    if (audio) audio.currentTime = video.currentTime;
    const pending = [video.play(), audio?.play()];
    try {
      // play() returns undefined on some older engines
      await Promise.all(pending.map((p) => p || Promise.resolve()));
    } catch (err) {
      // Never leave one element running without the other.
      video.pause();
      audio?.pause();
      throw err;
    }
  }

  async pause(): Promise<void> {
    this.video?.pause();
    this.audio?.pause();
  }

  async stop(): Promise<void> {
    this.log('Stopping');
    this.destroyHls();
    if (this.video) {
      this.video.pause();
      this.video.removeAttribute('src');
      this.video.load();
    }
    this.releaseAudio();
    this.source = null;
  }

  async seek(seconds: number): Promise<void> {
    if (this.video) this.video.currentTime = seconds;
    if (this.audio) this.audio.currentTime = seconds;
  }

  async setRate(rate: number): Promise<void> {
    this.rate = rate;
    if (this.video) this.video.playbackRate = rate;
    if (this.audio) this.audio.playbackRate = rate;
  }

  // ─── Cleanup ───

  /**
   * Destroy the engine and release all resources.
   * Cannot be used after this.
   */
  dispose(): void {
    this.detach();
    this.releaseAudio();
    this.source = null;
    this.emitter.clear();
    this._destroyed = true;
    this.log('Destroyed');
  }

  // ─── Private ───

  private assertAlive(): void {
    if (this._destroyed) throw new PlayerError('Engine is destroyed');
  }

  private loadSource(url: string): void {
    if (!this.video) return;

    this.destroyHls();

    if (!isHlsUrl(url)) {
      this.video.src = url;
      return;
    }

    // YouTube's own HLS formats are muxed and never reach here; playlists come from custom metadata services.

    if (this.platform.supportsHlsJs) {
      this.log('Using hls.js');
      const hls = new Hls({
        enableWorker: true,
        lowLatencyMode: true,
        ...this.config.hlsConfig,
      });

      hls.loadSource(url);
      hls.attachMedia(this.video);

      hls.on(Hls.Events.ERROR, (_event, data) => {
        this.log('HLS error:', data.type, data.details);
        this.emitError({
          message: `HLS ${data.fatal ? 'fatal ' : ''}error: ${data.details}`,
          code: data.response?.code,
          fatal: data.fatal,
        });
        if (data.fatal) this.destroyHls();
      });

      this.hls = hls;
    } else if (this.platform.supportsNativeHLS) {
      this.log('Using native HLS');
      this.video.src = url;
    } else {
      this.emitError({
        message: 'No HLS support detected. Cannot play this stream.',
        fatal: true,
      });
    }
  }

  private emitError(error: EngineErrorInfo): void {
    this.emitter.emit('error', error);
  }

  private destroyHls(): void {
    if (this.hls) {
      this.hls.destroy();
      this.hls = null;
    }
  }

  private releaseAudio(): void {
    if (this.audio) {
      this.audio.pause();
      this.audio.removeAttribute('src');
      this.audio.load();
      this.audio = null;
    }
    this.audioSource = null;
    this.audioReady = null;
    if (this.video) this.video.muted = false;
  }

  private syncAudio(video: HTMLVideoElement): void {
    const audio = this.audio;
    if (!audio || video.paused) return;
    if (Math.abs(audio.currentTime - video.currentTime) > this.config.maxDrift) {
      this.log('Resyncing audio:', audio.currentTime.toFixed(2), '->', video.currentTime.toFixed(2));
      audio.currentTime = video.currentTime;
    }
  }

  private bindVideoEvents(video: HTMLVideoElement): void {
    const on = <K extends keyof HTMLVideoElementEventMap>(
      event: K,
      handler: (e: HTMLVideoElementEventMap[K]) => void
    ) => {
      video.addEventListener(event, handler);
      this.cleanupFns.push(() => video.removeEventListener(event, handler));
    };

    on('play', () => this.emitter.emit('playing', true));
    on('pause', () => this.emitter.emit('playing', false));
    on('ended', () => {
      this.audio?.pause();
      this.emitter.emit('completed', undefined);
    });

    on('timeupdate', () => {
      this.syncAudio(video);
      this.emitter.emit('position', { position: video.currentTime, duration: this.duration });
    });

    on('loadedmetadata', () => {
      this.emitter.emit('tracks', {
        width: video.videoWidth,
        height: video.videoHeight,
        hasAudioTrack: this.audio !== null,
      });
    });

    // Keep the audio element parked while the video buffers.
    on('waiting', () => this.audio?.pause());
    on('playing', () => {
      if (this.audio?.paused) {
        this.audio.currentTime = video.currentTime;
        this.audio.play()?.catch((err: unknown) => this.log('Audio resume failed:', err));
      }
    });

    on('error', () => {
      if (this.hls) return;
      this.emitError({
        message: video.error?.message || 'Video playback error',
        code: video.error?.code,
        fatal: true,
      });
    });
  }
}
