/**
 * React adapter for tube-player
 *
 * @example
 * ```tsx
 * import { TubePlayer } from 'tube-player/react';
 *
 * function Lesson({ url }) {
 *   return (
 *     <TubePlayer
 *       url={url}
 *       title="Lesson 1"
 *       theme={{ accentColor: '#3b82f6' }}
 *       onStatusChange={(status) => console.log(status)}
 *     />
 *   );
 * }
 * ```
 */
import {
  useCallback,
  useEffect,
  useLayoutEffect,
  useMemo,
  useRef,
  useState,
  type ReactNode,
  type RefObject,
} from 'react';
import { PLAYBACK_RATES, TubeController, type TubeControllerOptions } from './core/controller';
import {
  DEFAULT_ASPECT_RATIO,
  computeDimensions,
  createTheme,
  formatTime,
  insetsToCss,
  rateLabel,
  selectView,
} from './core/layout';
import type { TubeError } from './core/errors';
import type { PlayerStatus, Progress, TubeTheme } from './types';

// ─── useTubeController ───

export interface UseTubeControllerOptions extends Pick<
  TubeControllerOptions,
  'metadata' | 'engine' | 'debug' | 'settleDelay' | 'resolveTimeout'
> {
  /** Locator to initialize whenever it changes */
  url?: string;
  /** Start playing once loaded (default: true) */
  autoPlay?: boolean;
  aspectRatio?: number;
  onStatusChange?: (status: PlayerStatus) => void;
  onProgress?: (position: number, duration: number) => void;
  onControllerReady?: (controller: TubeController) => void;
  onError?: (error: TubeError) => void;
}

export interface UseTubeControllerReturn {
  /** The controller, once mounted */
  controller: TubeController | null;
  /** Current status (reactive) */
  status: PlayerStatus;
  /** Last position update (reactive) */
  progress: Progress;
  /** Ref to attach to your <video> element */
  surfaceRef: (element: HTMLVideoElement | null) => void;
}

const NO_PROGRESS: Progress = { position: 0, duration: 0 };

/**
 * React hook owning one TubeController per mounted component.
 * The controller is disposed on unmount.
 */
export function useTubeController(options: UseTubeControllerOptions = {}): UseTubeControllerReturn {
  const {
    url,
    autoPlay = true,
    aspectRatio,
    onStatusChange,
    onProgress,
    onControllerReady,
    onError,
    ...config
  } = options;

  const [controller, setController] = useState<TubeController | null>(null);
  const [status, setStatus] = useState<PlayerStatus>('initial');
  const [progress, setProgress] = useState<Progress>(NO_PROGRESS);
  const [surface, setSurface] = useState<HTMLVideoElement | null>(null);

  // Stable refs for callbacks
  const callbackRefs = useRef({ onStatusChange, onProgress, onControllerReady, onError });
  callbackRefs.current = { onStatusChange, onProgress, onControllerReady, onError };

  // Engine and service choices are read once, at mount.
  const configRef = useRef(config);

  useEffect(() => {
    const instance = new TubeController(configRef.current);
    const unsubs = [
      instance.on('status', (next) => {
        setStatus(next);
        callbackRefs.current.onStatusChange?.(next);
      }),
      instance.on('progress', (next) => {
        setProgress(next);
        callbackRefs.current.onProgress?.(next.position, next.duration);
      }),
      instance.on('ready', (ready) => callbackRefs.current.onControllerReady?.(ready)),
      instance.on('error', (error) => callbackRefs.current.onError?.(error)),
    ];
    setController(instance);

    return () => {
      unsubs.forEach((fn) => fn());
      instance.dispose();
    };
  }, []);

  // Attach the rendering surface
  useEffect(() => {
    if (!controller || !surface) return;
    const engine = controller.engine;
    engine.attach?.(surface);
    return () => {
      if (!controller.disposed) engine.detach?.();
    };
  }, [controller, surface]);

  useEffect(() => {
    if (!controller || !url) return;
    controller.initialize(url, { autoPlay, aspectRatio }).catch((err: unknown) => {
      console.error('[Tube Player] Initialization failed:', err);
    });
    // Only a new locator re-initializes; options apply to that call.
  }, [controller, url]);

  const surfaceRef = useCallback((element: HTMLVideoElement | null) => setSurface(element), []);

  return { controller, status, progress, surfaceRef };
}

// ─── TubePlayer ───

export interface TubePlayerProps extends UseTubeControllerOptions {
  url: string;
  /** Width/height ratio (default: 16/9) */
  aspectRatio?: number;
  /** Fixed width in px; measured from the container when omitted */
  width?: number;
  /** Title shown in the top bar */
  title?: string;
  theme?: Partial<TubeTheme>;
  /** Shown before anything is loaded */
  placeholder?: ReactNode;
  /** Shown while loading */
  loading?: ReactNode;
  /** Shown when the status is `error` */
  error?: ReactNode;
  /** Replace the default fullscreen entry */
  onEnterFullscreen?: () => void | Promise<void>;
  /** Replace the default fullscreen exit */
  onExitFullscreen?: () => void | Promise<void>;
  className?: string;
}

/**
 * YouTube player shell: placeholder, loading and error views plus the
 * live surface with its controls.
 */
export function TubePlayer(props: TubePlayerProps) {
  const {
    width: fixedWidth,
    aspectRatio = DEFAULT_ASPECT_RATIO,
    title,
    theme: themeOverrides,
    placeholder,
    loading,
    error,
    onEnterFullscreen,
    onExitFullscreen,
    className,
    debug,
    ...controllerOptions
  } = props;

  const theme = useMemo(() => createTheme(themeOverrides), [themeOverrides]);
  const containerRef = useRef<HTMLDivElement>(null);
  const measuredWidth = useAvailableWidth(containerRef, fixedWidth === undefined);
  const { width, height } = computeDimensions(fixedWidth ?? measuredWidth, aspectRatio);

  const { controller, status, progress, surfaceRef } = useTubeController({
    ...controllerOptions,
    aspectRatio,
    debug,
  });

  const [rate, setRate] = useState(1);
  const [fullscreen, setFullscreen] = useState(false);

  const log = useCallback(
    (...args: unknown[]) => {
      if (debug) console.log('[Tube Player]', ...args);
    },
    [debug]
  );

  // Track fullscreen changes made outside the toggle (Esc key, browser UI)
  useEffect(() => {
    if (onEnterFullscreen || onExitFullscreen) return;
    const onChange = () => setFullscreen(document.fullscreenElement === containerRef.current);
    document.addEventListener('fullscreenchange', onChange);
    return () => document.removeEventListener('fullscreenchange', onChange);
  }, [onEnterFullscreen, onExitFullscreen]);

  const view = selectView(status, controller?.isInitialized ?? false);

  const changeRate = (next: number) => {
    setRate(next);
    controller?.setRate(next).catch((err: unknown) => log('Rate change failed:', err));
  };

  const togglePlay = () => {
    if (!controller) return;
    const action = status === 'playing' ? controller.pause() : controller.play();
    action.catch((err: unknown) => log('Play toggle failed:', err));
  };

  const seek = (seconds: number) => {
    controller?.seek(seconds).catch((err: unknown) => log('Seek failed:', err));
  };

  const toggleFullscreen = async () => {
    try {
      if (!fullscreen) {
        if (onEnterFullscreen) await onEnterFullscreen();
        else await containerRef.current?.requestFullscreen();
        setFullscreen(true);
      } else {
        if (onExitFullscreen) await onExitFullscreen();
        else if (document.fullscreenElement) await document.exitFullscreen();
        setFullscreen(false);
      }
    } catch (e) {
      log('Fullscreen toggle failed:', e);
    }
  };

  const seekBarMargin = fullscreen ? theme.fullscreenSeekBarMargin : theme.seekBarMargin;
  const bottomBarMargin = fullscreen ? theme.fullscreenBottomBarMargin : theme.bottomBarMargin;

  return (
    <div ref={containerRef} className={className} data-testid="tube-player" style={{ width: '100%' }}>
      <div
        data-testid="tube-player-frame"
        style={{ position: 'relative', width: `${width}px`, height: `${height}px`, background: 'transparent' }}
      >
        <video
          ref={surfaceRef}
          data-testid="tube-player-surface"
          playsInline
          style={{ display: view === 'surface' ? 'block' : 'none', width: '100%', height: '100%' }}
        />

        {view === 'placeholder' && <div data-testid="tube-player-placeholder">{placeholder}</div>}

        {view === 'loading' && (
          <div role="status" style={centered}>
            {loading ?? 'Loading video…'}
          </div>
        )}

        {view === 'error' && (
          <div role="alert" style={centered}>
            {error ?? 'Error loading video'}
          </div>
        )}

        {view === 'surface' && (
          <>
            {title && (
              <div data-testid="tube-player-title" style={{ position: 'absolute', top: 8, left: 16, color: '#fff', fontSize: 14 }}>
                {title}
              </div>
            )}
            <div style={{ position: 'absolute', left: 0, right: 0, bottom: 0 }}>
              <input
                type="range"
                aria-label="Seek"
                min={0}
                max={progress.duration || 0}
                step={0.1}
                value={Math.min(progress.position, progress.duration || 0)}
                onChange={(e) => seek(Number(e.target.value))}
                style={{ display: 'block', width: '100%', margin: insetsToCss(seekBarMargin), accentColor: theme.accentColor }}
              />
              <div style={{ display: 'flex', alignItems: 'center', gap: 8, margin: insetsToCss(bottomBarMargin), color: '#fff' }}>
                <button type="button" aria-label={status === 'playing' ? 'Pause' : 'Play'} onClick={togglePlay}>
                  {status === 'playing' ? '❚❚' : '▶'}
                </button>
                <span data-testid="tube-player-position">
                  {formatTime(progress.position)} / {formatTime(progress.duration)}
                </span>
                <span style={{ flex: 1 }} />
                <select aria-label="Playback speed" value={rate} onChange={(e) => changeRate(Number(e.target.value))}>
                  {PLAYBACK_RATES.map((r) => (
                    <option key={r} value={r}>
                      {rateLabel(r)}
                    </option>
                  ))}
                </select>
                <button
                  type="button"
                  aria-label={fullscreen ? 'Exit fullscreen' : 'Enter fullscreen'}
                  onClick={() => void toggleFullscreen()}
                >
                  ⛶
                </button>
              </div>
            </div>
          </>
        )}
      </div>
    </div>
  );
}

const centered = {
  position: 'absolute',
  inset: 0,
  display: 'flex',
  alignItems: 'center',
  justifyContent: 'center',
} as const;

/** Container width, re-measured on window resize */
function useAvailableWidth(ref: RefObject<HTMLElement>, enabled: boolean): number {
  const [width, setWidth] = useState(0);

  useLayoutEffect(() => {
    if (!enabled) return;
    const measure = () => setWidth(ref.current?.clientWidth ?? 0);
    measure();
    window.addEventListener('resize', measure);
    return () => window.removeEventListener('resize', measure);
  }, [ref, enabled]);

  return width;
}
