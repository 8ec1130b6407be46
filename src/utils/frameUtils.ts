import * as tf from '@tensorflow/tfjs';

import { CanvasSize } from '../types';

/**
 * Horizontal flip: column c moves to column (width - 1 - c).
 */
export function mirrorFrame(frame: tf.Tensor3D): tf.Tensor3D {
  return tf.reverse(frame, 1);
}

/**
 * Swaps rows and columns: [h, w, c] -> [w, h, c].
 */
export function transposeFrame(frame: tf.Tensor3D): tf.Tensor3D {
  return tf.transpose(frame, [1, 0, 2]);
}

export function blankFrame([width, height]: CanvasSize): tf.Tensor3D {
  return tf.zeros<tf.Rank.R3>([height, width, 3], 'float32');
}
