import ytdl from '@distube/ytdl-core';
import { ResolutionError, StateError } from './errors';
import type { MetadataService, StreamInfo, StreamManifest, VideoDescriptor } from '../types';

/** The subset of an extracted format the manifest is built from */
export interface ExtractedFormat {
  url: string;
  hasVideo: boolean;
  hasAudio: boolean;
  bitrate?: number | null;
  audioBitrate?: number | null;
  qualityLabel?: string | null;
  mimeType?: string;
}

export interface YouTubeApiOptions {
  /** Enable debug logging */
  debug?: boolean;
  /** Interface language passed to the extractor (default: en) */
  lang?: string;
}

/**
 * YouTube metadata client.
 * Resolves locators to video descriptors and stream manifests through ytdl-core.
 */
export class YouTubeApi implements MetadataService {
  private debug: boolean;
  private lang: string;
  private closed = false;

  constructor(options: YouTubeApiOptions = {}) {
    this.debug = options.debug ?? false;
    this.lang = options.lang ?? 'en';
  }

  private log(...args: unknown[]) {
    if (this.debug) console.log('[YouTube API]', ...args);
  }

  /**
   * Fetch the video descriptor.
   * @param locator - An 11-character video id or any YouTube watch/share/embed URL
   */
  async getVideoDescriptor(locator: string): Promise<VideoDescriptor> {
    this.assertOpen();
    const id = parseVideoId(locator);
    if (!id) throw new ResolutionError(`Invalid YouTube locator: "${locator}"`);

    this.log('Fetching info:', id);
    let info: ytdl.videoInfo;
    try {
      info = await ytdl.getBasicInfo(id, { lang: this.lang });
    } catch (err) {
      throw new ResolutionError(`Failed to fetch video ${id}: ${describe(err)}`, { cause: err });
    }

    const details = info.videoDetails;
    const thumbnails = details.thumbnails;
    const descriptor: VideoDescriptor = {
      id: details.videoId || id,
      title: details.title,
      author: details.author?.name ?? null,
      duration: Number(details.lengthSeconds) || 0,
      thumbnail: thumbnails.length > 0 ? thumbnails[thumbnails.length - 1].url : null,
    };
    this.log('Got descriptor:', descriptor.id, descriptor.title);
    return descriptor;
  }

  /**
   * Fetch deciphered stream URLs for a descriptor.
   */
  async getStreamManifest(descriptor: VideoDescriptor): Promise<StreamManifest> {
    this.assertOpen();
    this.log('Fetching manifest:', descriptor.id);
    let info: ytdl.videoInfo;
    try {
      info = await ytdl.getInfo(descriptor.id, { lang: this.lang });
    } catch (err) {
      throw new ResolutionError(`Failed to fetch streams for ${descriptor.id}: ${describe(err)}`, { cause: err });
    }

    const manifest = formatsToManifest(info.formats);
    this.log(`Manifest: ${manifest.videoOnly.length} video-only, ${manifest.audioOnly.length} audio-only`);
    return manifest;
  }

  close(): void {
    this.closed = true;
    this.log('Closed');
  }

  private assertOpen(): void {
    if (this.closed) throw new StateError('YouTube API client is closed');
  }
}

/**
 * Extract a video id from a bare id or a URL, or null when neither matches.
 */
export function parseVideoId(locator: string): string | null {
  const trimmed = locator.trim();
  if (!trimmed) return null;
  if (ytdl.validateID(trimmed) && !trimmed.includes('/')) return trimmed;
  if (!ytdl.validateURL(trimmed)) return null;
  try {
    const id = ytdl.getURLVideoID(trimmed);
    return typeof id === 'string' ? id : null;
  } catch {
    return null;
  }
}

/**
 * Split extracted formats into video-only and audio-only stream lists.
 * Muxed formats and formats without a URL are left out.
 */
export function formatsToManifest(formats: readonly ExtractedFormat[]): StreamManifest {
  const videoOnly: StreamInfo[] = [];
  const audioOnly: StreamInfo[] = [];

  for (const format of formats) {
    if (!format.url) continue;
    const bitrate = format.bitrate ?? (format.audioBitrate ?? 0) * 1000;

    if (format.hasVideo && !format.hasAudio) {
      videoOnly.push({
        url: format.url,
        bitrate,
        label: format.qualityLabel || `${Math.round(bitrate / 1000)}kbps`,
        mimeType: format.mimeType,
      });
    } else if (format.hasAudio && !format.hasVideo) {
      audioOnly.push({
        url: format.url,
        bitrate,
        label: `${format.audioBitrate ?? Math.round(bitrate / 1000)}kbps`,
        mimeType: format.mimeType,
      });
    }
  }

  return { videoOnly, audioOnly };
}

/**
 * Pick the stream with the highest bitrate. The first one wins a tie.
 */
export function withHighestBitrate(streams: readonly StreamInfo[]): StreamInfo | null {
  let best: StreamInfo | null = null;
  for (const stream of streams) {
    if (!best || stream.bitrate > best.bitrate) best = stream;
  }
  return best;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
