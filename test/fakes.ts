import { vi } from 'vitest';
import { Emitter } from '../src/core/emitter';
import type {
  EventHandler,
  MediaEngine,
  MediaEngineEvents,
  MetadataService,
  OpenOptions,
  StreamInfo,
  StreamManifest,
  VideoDescriptor,
} from '../src/types';

export function stream(kind: 'video' | 'audio', bitrate: number): StreamInfo {
  return { url: `https://cdn.test/${kind}-${bitrate}`, bitrate, label: `${kind}-${bitrate}` };
}

export function manifestOf(videoBitrates: number[], audioBitrates: number[]): StreamManifest {
  return {
    videoOnly: videoBitrates.map((b) => stream('video', b)),
    audioOnly: audioBitrates.map((b) => stream('audio', b)),
  };
}

export function descriptorFor(locator: string): VideoDescriptor {
  return { id: locator, title: `Title of ${locator}`, author: 'Test Channel', duration: 300, thumbnail: null };
}

export function fakeMetadata(manifest: StreamManifest = manifestOf([720], [160])) {
  return {
    getVideoDescriptor: vi.fn(async (locator: string) => descriptorFor(locator)),
    getStreamManifest: vi.fn(async (_descriptor: VideoDescriptor) => manifest),
    close: vi.fn(),
  } satisfies MetadataService;
}

/** In-process media engine recording every call */
export class FakeEngine implements MediaEngine {
  hasMedia = false;
  position = 0;
  duration = 0;
  private emitter = new Emitter<MediaEngineEvents>('Fake Engine');

  open = vi.fn(async (_url: string, _options: OpenOptions) => {
    this.hasMedia = true;
  });
  setAudioTrack = vi.fn(async (_url: string) => {});
  play = vi.fn(async () => {});
  pause = vi.fn(async () => {});
  stop = vi.fn(async () => {
    this.hasMedia = false;
  });
  seek = vi.fn(async (_seconds: number) => {});
  setRate = vi.fn(async (_rate: number) => {});
  dispose = vi.fn();

  on<K extends keyof MediaEngineEvents>(event: K, handler: EventHandler<MediaEngineEvents[K]>) {
    return this.emitter.on(event, handler);
  }

  emit<K extends keyof MediaEngineEvents>(event: K, payload: MediaEngineEvents[K]): void {
    this.emitter.emit(event, payload);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
