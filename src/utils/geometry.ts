import { Matrix } from 'ml-matrix';

import { CanvasSize, Orientation, Point } from '../types';
import { isVertical } from '../orientation';

// ============================================================================
// Homogeneous 2D transforms
// ============================================================================

/**
 * Reflects x across the canvas: x' = extent - x.
 */
export function mirrorMatrix(extent: number): Matrix {
  return new Matrix([
    [-1, 0, extent],
    [0, 1, 0],
    [0, 0, 1],
  ]);
}

/**
 * Exchanges x and y, used when a target is authored on a transposed canvas.
 */
export function swapAxesMatrix(): Matrix {
  return new Matrix([
    [0, 1, 0],
    [1, 0, 0],
    [0, 0, 1],
  ]);
}

export function applyTransform(M: Matrix, [x, y]: Point): Point {
  const p = M.mmul(Matrix.columnVector([x, y, 1]));
  const w = p.get(2, 0);
  return [p.get(0, 0) / w, p.get(1, 0) / w];
}

export function mirrorPoint(point: Point, extent: number): Point {
  return applyTransform(mirrorMatrix(extent), point);
}

export function swapAxes(point: Point): Point {
  return applyTransform(swapAxesMatrix(), point);
}

// ============================================================================
// Orientation-dependent authoring space
// ============================================================================

/**
 * Size of the canvas a target is drawn on before the frame transforms run.
 * Vertical orientations draw on the transposed canvas.
 */
export function authoredCanvasSize([width, height]: CanvasSize, orientation: Orientation): CanvasSize {
  return isVertical(orientation) ? [height, width] : [width, height];
}

/**
 * Maps a screen point into the authoring space of the given orientation.
 *
 * RIGHT is the identity, LEFT mirrors x, DOWN swaps the axes and UP swaps
 * the axes then mirrors along the (swapped) horizontal axis.
 */
export function orientationTransform(orientation: Orientation, [width, height]: CanvasSize): Matrix {
  switch (orientation) {
    case 'RIGHT':
      return Matrix.eye(3);
    case 'LEFT':
      return mirrorMatrix(width);
    case 'DOWN':
      return swapAxesMatrix();
    case 'UP':
      return mirrorMatrix(height).mmul(swapAxesMatrix());
  }
}

export function toAuthoredPoint(center: Point, canvasSize: CanvasSize, orientation: Orientation): Point {
  return applyTransform(orientationTransform(orientation, canvasSize), center);
}
