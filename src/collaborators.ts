import { CameraFrame, DisplayFrame, MonitorGeometry, Sample } from './types';

/**
 * Continuously acquiring camera. Frames queue up on the source's own cadence;
 * clearBuffer() drops everything queued, and the next nextFrame() resolves
 * only with a frame acquired after that clear.
 */
export interface CameraFrameSource {
  start(): Promise<void>;
  stop(): void;
  clearBuffer(): void;
  nextFrame(): Promise<CameraFrame>;
}

export interface DisplaySurface {
  show(frame: DisplayFrame): Promise<void> | void;
  release(): void;
}

export interface KeyInput {
  /**
   * Waits up to timeoutMs for a key press.
   * Resolves with the KeyboardEvent.key value, or null on timeout.
   */
  poll(timeoutMs: number): Promise<string | null>;
}

export interface Clock {
  /** Monotonic milliseconds */
  now(): number;
  /** Wall-clock time, used to name captures */
  date(): Date;
}

export interface ImageSink {
  saveImage(fileName: string, frame: CameraFrame): Promise<void>;
}

export interface SampleStore extends ImageSink {
  appendSample(sample: Sample): Promise<void>;
}

export type MonitorGeometryDetector = () => MonitorGeometry | null;

export const systemClock: Clock = {
  now: () => performance.now(),
  date: () => new Date(),
};
