import * as tf from '@tensorflow/tfjs';

import { CameraFrame } from './types';
import { CameraFrameSource } from './collaborators';
import { DisposableResource } from './IDisposable';
import FrameBuffer from './FrameBuffer';

// HTMLMediaElement.HAVE_CURRENT_DATA
const HAVE_CURRENT_DATA = 2;

export interface WebcamOptions {
  width?: number;
  height?: number;
  facingMode?: 'user' | 'environment';
  /** Frames kept while nobody reads (default: 30) */
  bufferSize?: number;
}

/**
 * Browser webcam that acquires frames continuously on its own
 * requestAnimationFrame loop and hands them out through a FrameBuffer.
 *
 * The loop pauses with the video and resumes on 'play'. A frame that cannot
 * be read closes the buffer with the error, so pending reads reject.
 */
export default class WebcamFrameSource extends DisposableResource implements CameraFrameSource {
  private videoElement: HTMLVideoElement;
  private options: Required<WebcamOptions>;
  private stream?: MediaStream;
  private buffer: FrameBuffer<ImageData>;
  private animationFrameId: number | null = null;
  private acquisitionHandler: (() => void) | null = null;
  private cachedCanvas: HTMLCanvasElement | null = null;
  private cachedContext: CanvasRenderingContext2D | null = null;

  constructor(videoElementId: string, options: WebcamOptions = {}) {
    super();
    const videoElement = document.getElementById(videoElementId);
    if (!(videoElement instanceof HTMLVideoElement)) {
      throw new Error(`Video element with id '${videoElementId}' not found`);
    }
    this.videoElement = videoElement;
    this.options = {
      width: 640,
      height: 480,
      facingMode: 'user',
      bufferSize: 30,
      ...options,
    };
    this.buffer = new FrameBuffer<ImageData>(this.options.bufferSize);
  }

  get isStreaming(): boolean {
    return this.stream !== undefined;
  }

  async start(): Promise<void> {
    this.assertNotDisposed('start webcam');
    if (this.stream) {
      console.warn('[WebcamFrameSource] Webcam already started');
      return;
    }

    const constraints: MediaStreamConstraints = {
      video: {
        width: { ideal: this.options.width },
        height: { ideal: this.options.height },
        facingMode: this.options.facingMode,
      },
      audio: false,
    };

    try {
      this.stream = await navigator.mediaDevices.getUserMedia(constraints);
    } catch (error) {
      console.error('[WebcamFrameSource] Error accessing the webcam:', error);
      throw new Error(
        `Webcam access failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (this.buffer.isClosed) {
      this.buffer = new FrameBuffer<ImageData>(this.options.bufferSize);
    }

    this.videoElement.srcObject = this.stream;
    this.videoElement.onloadedmetadata = () => {
      this.videoElement.play().catch((error: unknown) => {
        console.error('[WebcamFrameSource] Video playback failed:', error);
        this.buffer.close(new Error('Webcam video could not be played'));
      });
    };

    this.acquisitionHandler = () => {
      this.acquireFrames();
    };
    this.videoElement.addEventListener('loadeddata', this.acquisitionHandler);
    this.videoElement.addEventListener('play', this.acquisitionHandler);
  }

  stop(): void {
    if (this.animationFrameId !== null) {
      cancelAnimationFrame(this.animationFrameId);
      this.animationFrameId = null;
    }

    if (this.acquisitionHandler) {
      this.videoElement.removeEventListener('loadeddata', this.acquisitionHandler);
      this.videoElement.removeEventListener('play', this.acquisitionHandler);
      this.acquisitionHandler = null;
    }

    if (this.stream) {
      this.stream.getTracks().forEach(track => track.stop());
      this.videoElement.srcObject = null;
      this.stream = undefined;
    }

    this.buffer.close(new Error('Webcam stopped'));
  }

  clearBuffer(): void {
    this.buffer.clear();
  }

  async nextFrame(): Promise<CameraFrame> {
    const imageData = await this.buffer.next();
    return tf.browser.fromPixels(imageData);
  }

  private acquireFrames(): void {
    if (this.animationFrameId !== null || this.buffer.isClosed) {
      return;
    }

    const acquire = () => {
      if (this.videoElement.paused || this.videoElement.ended) {
        this.animationFrameId = null;
        return;
      }

      if (this.videoElement.readyState >= HAVE_CURRENT_DATA) {
        try {
          this.buffer.push(this.readVideoFrame());
        } catch (error) {
          console.error('[WebcamFrameSource] Frame acquisition failed:', error);
          this.animationFrameId = null;
          this.buffer.close(error instanceof Error ? error : new Error(String(error)));
          return;
        }
      }

      this.animationFrameId = requestAnimationFrame(acquire);
    };

    this.animationFrameId = requestAnimationFrame(acquire);
  }

  /**
   * Copies the current video frame through a canvas that is reused until the
   * video dimensions change.
   */
  private readVideoFrame(): ImageData {
    const width = this.videoElement.videoWidth;
    const height = this.videoElement.videoHeight;

    if (width === 0 || height === 0) {
      throw new Error('Video frame has invalid dimensions. Video may not be ready.');
    }

    if (!this.cachedContext || !this.cachedCanvas ||
        this.cachedCanvas.width !== width ||
        this.cachedCanvas.height !== height) {
      this.cachedCanvas = document.createElement('canvas');
      this.cachedCanvas.width = width;
      this.cachedCanvas.height = height;
      // willReadFrequently: every frame is read back with getImageData()
      this.cachedContext = this.cachedCanvas.getContext('2d', { willReadFrequently: true });
      if (!this.cachedContext) {
        throw new Error('2D canvas context is not available');
      }
    }

    this.cachedContext.drawImage(this.videoElement, 0, 0);
    return this.cachedContext.getImageData(0, 0, width, height);
  }

  protected onDispose(): void {
    this.stop();
    this.cachedCanvas = null;
    this.cachedContext = null;
  }
}
