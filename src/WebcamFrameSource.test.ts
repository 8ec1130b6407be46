/**
 * @jest-environment jsdom
 */
import * as tf from '@tensorflow/tfjs';

import WebcamFrameSource from './WebcamFrameSource';

function mockGetUserMedia(getUserMedia: jest.Mock) {
  Object.defineProperty(navigator, 'mediaDevices', {
    value: { getUserMedia },
    configurable: true,
  });
}

beforeAll(async () => {
  await tf.setBackend('cpu');
});

describe('WebcamFrameSource', () => {
  beforeEach(() => {
    document.body.innerHTML = '<video id="webcam"></video><div id="not-video"></div>';
  });

  test('requires a video element', () => {
    expect(() => new WebcamFrameSource('missing')).toThrow("Video element with id 'missing' not found");
    expect(() => new WebcamFrameSource('not-video')).toThrow("Video element with id 'not-video' not found");
  });

  test('requests the configured resolution without audio', async () => {
    const stopTrack = jest.fn();
    const getUserMedia = jest.fn().mockResolvedValue({ getTracks: () => [{ stop: stopTrack }] });
    mockGetUserMedia(getUserMedia);

    const camera = new WebcamFrameSource('webcam', { width: 1280, height: 720 });
    await camera.start();

    expect(camera.isStreaming).toBe(true);
    expect(getUserMedia).toHaveBeenCalledWith({
      video: { width: { ideal: 1280 }, height: { ideal: 720 }, facingMode: 'user' },
      audio: false,
    });

    camera.stop();
    expect(stopTrack).toHaveBeenCalledTimes(1);
    expect(camera.isStreaming).toBe(false);
  });

  test('reads fail once the webcam is stopped', async () => {
    mockGetUserMedia(jest.fn().mockResolvedValue({ getTracks: () => [] }));
    const camera = new WebcamFrameSource('webcam');
    await camera.start();

    const read = camera.nextFrame();
    camera.stop();

    await expect(read).rejects.toThrow('Webcam stopped');
  });

  test('wraps permission errors', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockGetUserMedia(jest.fn().mockRejectedValue(new Error('Permission denied')));

    const camera = new WebcamFrameSource('webcam');
    await expect(camera.start()).rejects.toThrow('Webcam access failed: Permission denied');
    expect(camera.isStreaming).toBe(false);

    error.mockRestore();
  });

  test('cannot be restarted after dispose', async () => {
    const camera = new WebcamFrameSource('webcam');
    camera.dispose();

    await expect(camera.start()).rejects.toThrow(
      'Cannot start webcam: WebcamFrameSource has been disposed'
    );
  });
});

describe('WebcamFrameSource acquisition loop', () => {
  const originalGetContext = Object.getOwnPropertyDescriptor(HTMLCanvasElement.prototype, 'getContext');
  let animationFrames: FrameRequestCallback[];
  let framesRead: number;
  let paused: boolean;
  let video: HTMLVideoElement;

  // Runs the next queued animation frame, if any
  function tick() {
    const callback = animationFrames.shift();
    callback?.(0);
  }

  // 1x1 RGBA frames whose red channel counts the frames read so far
  function useFakeContext() {
    const context = {
      drawImage: jest.fn(),
      getImageData: () => {
        framesRead++;
        return { width: 1, height: 1, data: Uint8Array.from([framesRead, 0, 0, 255]) };
      },
    };
    Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', {
      value: () => context,
      configurable: true,
    });
  }

  async function startCamera(): Promise<WebcamFrameSource> {
    mockGetUserMedia(jest.fn().mockResolvedValue({ getTracks: () => [] }));
    const camera = new WebcamFrameSource('webcam');
    await camera.start();
    video.dispatchEvent(new Event('loadeddata'));
    return camera;
  }

  async function redChannel(frame: tf.Tensor3D): Promise<number> {
    const values = await frame.data();
    frame.dispose();
    return values[0];
  }

  beforeEach(() => {
    document.body.innerHTML = '<video id="webcam"></video>';
    const element = document.getElementById('webcam');
    if (!(element instanceof HTMLVideoElement)) {
      throw new Error('test video element missing');
    }
    video = element;

    animationFrames = [];
    framesRead = 0;
    paused = false;
    window.requestAnimationFrame = callback => animationFrames.push(callback);
    window.cancelAnimationFrame = () => undefined;

    Object.defineProperty(video, 'paused', { get: () => paused, configurable: true });
    Object.defineProperty(video, 'readyState', { value: 2, configurable: true });
    Object.defineProperty(video, 'videoWidth', { value: 1, configurable: true });
    Object.defineProperty(video, 'videoHeight', { value: 1, configurable: true });
  });

  afterEach(() => {
    if (originalGetContext) {
      Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', originalGetContext);
    }
  });

  test('a read after clearBuffer returns a frame acquired after the clear', async () => {
    useFakeContext();
    const camera = await startCamera();
    tick();
    tick();

    camera.clearBuffer();
    const read = camera.nextFrame();
    tick();

    expect(await redChannel(await read)).toBe(3);
    camera.stop();
  });

  test('acquisition stops while paused and resumes on play', async () => {
    useFakeContext();
    const camera = await startCamera();

    paused = true;
    tick();
    expect(animationFrames).toHaveLength(0);

    const read = camera.nextFrame();
    paused = false;
    video.dispatchEvent(new Event('play'));
    expect(animationFrames).toHaveLength(1);
    tick();

    expect(await redChannel(await read)).toBe(1);
    camera.stop();
  });

  test('a frame that cannot be read fails the pending capture', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', {
      value: () => null,
      configurable: true,
    });
    const camera = await startCamera();

    const read = camera.nextFrame();
    tick();

    await expect(read).rejects.toThrow('2D canvas context is not available');
    expect(animationFrames).toHaveLength(0);
    expect(error).toHaveBeenCalledTimes(1);

    camera.stop();
    error.mockRestore();
  });
});
