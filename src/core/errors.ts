export type TubeErrorCode = 'RESOLUTION_ERROR' | 'NO_STREAM_ERROR' | 'PLAYER_ERROR' | 'STATE_ERROR';

/**
 * Base class for every error the player surfaces.
 * The code allows handling without `instanceof` across bundle boundaries.
 */
export class TubeError extends Error {
  constructor(
    message: string,
    public readonly code: TubeErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TubeError';
  }
}

/** Locator is invalid, or the metadata service failed or timed out. */
export class ResolutionError extends TubeError {
  constructor(detail: string, options?: ErrorOptions) {
    super(detail, 'RESOLUTION_ERROR', options);
    this.name = 'ResolutionError';
  }
}

/** No suitable video-only or audio-only stream in the manifest. */
export class NoStreamError extends TubeError {
  constructor(
    public readonly kind: 'video' | 'audio',
    videoId: string
  ) {
    super(`No ${kind}-only stream available for ${videoId}`, 'NO_STREAM_ERROR');
    this.name = 'NoStreamError';
  }
}

/** Failure reported by, or raised while driving, the media engine. */
export class PlayerError extends TubeError {
  constructor(
    detail: string,
    public readonly fatal = true,
    options?: ErrorOptions
  ) {
    super(detail, 'PLAYER_ERROR', options);
    this.name = 'PlayerError';
  }
}

/** Operation invoked on a disposed controller or closed client. */
export class StateError extends TubeError {
  constructor(detail: string) {
    super(detail, 'STATE_ERROR');
    this.name = 'StateError';
  }
}

/** Wrap an unknown thrown value as a TubeError, keeping typed errors as they are. */
export function toTubeError(err: unknown, fallback: (message: string, options: ErrorOptions) => TubeError): TubeError {
  if (err instanceof TubeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return fallback(message, { cause: err });
}
