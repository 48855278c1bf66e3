import { act, cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TubePlayer, type TubePlayerProps } from '../src/react';
import type { TubeController } from '../src/core/controller';
import type { PlayerStatus } from '../src/types';
import { FakeEngine, fakeMetadata } from './fakes';

afterEach(cleanup);

describe('TubePlayer', () => {
  let engine: FakeEngine;
  let metadata: ReturnType<typeof fakeMetadata>;

  beforeEach(() => {
    engine = new FakeEngine();
    metadata = fakeMetadata();
  });

  function renderPlayer(props: Partial<TubePlayerProps> = {}) {
    return render(
      <TubePlayer url="video123" width={640} engine={engine} metadata={metadata} settleDelay={0} {...props} />
    );
  }

  async function waitForSurface() {
    await screen.findByRole('button', { name: 'Pause' });
  }

  it('shows the loading view, then the surface with its controls', async () => {
    renderPlayer({ title: 'Lesson 1' });

    expect(screen.getByRole('status').textContent).toBe('Loading video…');
    await waitForSurface();

    expect(screen.queryByRole('status')).toBeNull();
    expect(screen.getByTestId('tube-player-surface').style.display).toBe('block');
    expect(screen.getByTestId('tube-player-title').textContent).toBe('Lesson 1');
    expect(screen.getByTestId('tube-player-position').textContent).toBe('0:00 / 0:00');
    expect(engine.open).toHaveBeenCalledWith('https://cdn.test/video-720', { play: false });
  });

  it('reports each status once and the controller once', async () => {
    const statuses: PlayerStatus[] = [];
    const onControllerReady = vi.fn<(controller: TubeController) => void>();
    renderPlayer({ onStatusChange: (s) => statuses.push(s), onControllerReady });

    await waitForSurface();

    expect(statuses).toEqual(['loading', 'playing']);
    expect(onControllerReady).toHaveBeenCalledTimes(1);
    expect(onControllerReady.mock.calls[0][0].locator).toBe('video123');
  });

  it('shows the error view when the lookup fails', async () => {
    const onError = vi.fn();
    metadata.getVideoDescriptor.mockRejectedValue(new Error('Video unavailable'));
    renderPlayer({ onError, error: <span>Could not play</span> });

    const alert = await screen.findByRole('alert');

    expect(alert.textContent).toBe('Could not play');
    expect(onError).toHaveBeenCalledWith(expect.objectContaining({ message: 'Video unavailable' }));
    expect(screen.getByTestId('tube-player-surface').style.display).toBe('none');
  });

  it('sizes the frame from the width and aspect ratio', async () => {
    renderPlayer({ width: 600, aspectRatio: 4 / 3 });

    const frame = screen.getByTestId('tube-player-frame');
    expect(frame.style.width).toBe('600px');
    expect(parseFloat(frame.style.height)).toBeCloseTo(450);
    await waitForSurface();
  });

  it('changes speed through the menu', async () => {
    renderPlayer();
    await waitForSurface();

    const menu = screen.getByRole('combobox', { name: 'Playback speed' });
    expect(Array.from(menu.querySelectorAll('option'), (o) => o.textContent)).toEqual([
      '0.5x',
      '1.0x (Normal)',
      '1.5x',
      '2.0x',
    ]);

    fireEvent.change(menu, { target: { value: '1.5' } });

    expect(engine.setRate).toHaveBeenCalledWith(1.5);
  });

  it('toggles play and pause', async () => {
    renderPlayer();
    await waitForSurface();

    fireEvent.click(screen.getByRole('button', { name: 'Pause' }));
    expect(engine.pause).toHaveBeenCalledTimes(1);

    act(() => engine.emit('playing', false));
    fireEvent.click(screen.getByRole('button', { name: 'Play' }));
    expect(engine.play).toHaveBeenCalledTimes(2);
  });

  it('renders position updates', async () => {
    renderPlayer();
    await waitForSurface();

    act(() => engine.emit('position', { position: 65, duration: 300 }));

    expect(screen.getByTestId('tube-player-position').textContent).toBe('1:05 / 5:00');
  });

  it('hands fullscreen to the host callbacks', async () => {
    const onEnterFullscreen = vi.fn();
    const onExitFullscreen = vi.fn();
    renderPlayer({ onEnterFullscreen, onExitFullscreen });
    await waitForSurface();

    fireEvent.click(screen.getByRole('button', { name: 'Enter fullscreen' }));
    const exit = await screen.findByRole('button', { name: 'Exit fullscreen' });
    expect(onEnterFullscreen).toHaveBeenCalledTimes(1);

    fireEvent.click(exit);
    await screen.findByRole('button', { name: 'Enter fullscreen' });
    expect(onExitFullscreen).toHaveBeenCalledTimes(1);
  });

  it('disposes the controller on unmount', async () => {
    const { unmount } = renderPlayer();
    await waitForSurface();

    unmount();

    expect(engine.dispose).toHaveBeenCalledTimes(1);
    expect(metadata.close).toHaveBeenCalledTimes(1);
  });
});
