import * as tf from '@tensorflow/tfjs';

// [x, y] in pixels, origin top-left
export type Point = [number, number];

// [width, height] in pixels
export type CanvasSize = [number, number];

export type Orientation = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

export type RGB = [number, number, number];

/**
 * Frame pushed to the display: [height, width, 3], float32 in [0, 1].
 */
export type DisplayFrame = tf.Tensor3D;

/**
 * Frame pulled from the camera: [height, width, 3], int32 RGB in [0, 255].
 */
export type CameraFrame = tf.Tensor3D;

export interface MonitorGeometry {
  widthMm: number;
  heightMm: number;
  widthPx: number;
  heightPx: number;
}

export interface AnimationState {
  center: Point;
  shrinkFactor: number; // (0, 1]
  orientation: Orientation;
  terminated: boolean;
}

export type TrialState = 'ANIMATING' | 'CAPTURE_WINDOW' | 'CAPTURED' | 'EXPIRED' | 'DONE';

export interface CapturedTrial {
  status: 'captured';
  fileName: string;
  pointOnScreen: Point;
  orientation: Orientation;
  timeTillCapture: number; // seconds since the capture window opened
}

export interface ExpiredTrial {
  status: 'expired';
  fileName: null;
  pointOnScreen: Point;
  orientation: Orientation;
  timeTillCapture: null;
}

export type TrialOutcome = CapturedTrial | ExpiredTrial;

/**
 * One dataset row, written for every captured trial.
 */
export interface Sample {
  fileName: string;
  pointOnScreen: Point;
  timeTillCapture: number;
  monitorMm: [number, number];
  monitorPixels: [number, number];
}

export type SessionStopReason = 'quit' | 'limit';

export interface SessionSummary {
  trials: number;
  captured: number;
  expired: number;
  stopReason: SessionStopReason;
}
