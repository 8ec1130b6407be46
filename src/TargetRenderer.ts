import * as tf from '@tensorflow/tfjs';

import { CanvasSize, DisplayFrame, Orientation, Point, RGB } from './types';
import { isVertical } from './orientation';
import { RandomSource, defaultRandom, uniform } from './random';
import { Raster, glyphSize } from './utils/raster';
import { authoredCanvasSize, toAuthoredPoint } from './utils/geometry';
import { mirrorFrame, transposeFrame } from './utils/frameUtils';

export const DISC_COLOR: RGB = [32, 32, 32];
export const GLYPH_COLOR: RGB = [17, 112, 170];  // muted blue, while animating
export const CUE_COLOR: RGB = [252, 125, 11];    // orange, on the terminating frame

// Disc radius in glyph widths at shrink factor 1
export const DISC_RADIUS_GLYPHS = 5;

export const MIN_TERMINATION_THRESHOLD = 0.1;
export const MAX_TERMINATION_THRESHOLD = 0.5;

export const DEFAULT_SHRINK_RATE = 0.9;
export const DEFAULT_GLYPH_SCALE = 2;

/**
 * Decides, for one rendered frame, whether the animation ends on it.
 */
export type TerminationRule = (shrinkFactor: number) => boolean;

/**
 * Draws a fresh threshold t ~ U(0.1, 0.5) on every call and stops once the
 * shrink factor falls below it.
 */
export function stochasticTermination(random: RandomSource = defaultRandom): TerminationRule {
  return (shrinkFactor: number) =>
    shrinkFactor < uniform(random, MIN_TERMINATION_THRESHOLD, MAX_TERMINATION_THRESHOLD);
}

/**
 * Per-frame probability that stochasticTermination ends the animation.
 */
export function terminationProbability(shrinkFactor: number): number {
  const span = MAX_TERMINATION_THRESHOLD - MIN_TERMINATION_THRESHOLD;
  const p = (MAX_TERMINATION_THRESHOLD - shrinkFactor) / span;
  return Math.min(1, Math.max(0, p));
}

export function discRadius(shrinkFactor: number, glyphScale: number = DEFAULT_GLYPH_SCALE): number {
  const [glyphWidth] = glyphSize(glyphScale);
  return Math.floor(glyphWidth * DISC_RADIUS_GLYPHS * shrinkFactor);
}

export interface RenderOptions {
  terminate?: TerminationRule;
  glyphScale?: number;
  shrinkRate?: number;
}

export interface RenderResult {
  frame: DisplayFrame;
  nextShrinkFactor: number;
  terminated: boolean;
}

/**
 * Draws the disc and glyph at an authored-space centre.
 */
export function drawTarget(
  raster: Raster,
  [cx, cy]: Point,
  shrinkFactor: number,
  glyph: string,
  terminated: boolean,
  glyphScale: number
): void {
  const [glyphWidth, glyphHeight] = glyphSize(glyphScale);
  raster.fillDisc(cx, cy, discRadius(shrinkFactor, glyphScale), DISC_COLOR);

  const left = cx - Math.floor(glyphWidth / 2);
  const top = cy - Math.floor(glyphHeight / 2);
  raster.drawGlyph(glyph, left, top, glyphScale, terminated ? CUE_COLOR : GLYPH_COLOR);
}

/**
 * Renders one animation frame of the target.
 *
 * Targets are authored facing RIGHT. LEFT mirrors the centre before drawing
 * and the frame afterwards, so the disc lands where requested while the glyph
 * reads right-to-left. UP and DOWN are drawn on the transposed canvas and
 * transposed back, UP additionally mirrored in that space.
 *
 * The caller owns the returned frame and must dispose it.
 */
export function renderTarget(
  canvasSize: CanvasSize,
  center: Point,
  shrinkFactor: number,
  orientation: Orientation,
  glyph: string = 'E',
  options: RenderOptions = {}
): RenderResult {
  const terminate = options.terminate ?? stochasticTermination();
  const glyphScale = options.glyphScale ?? DEFAULT_GLYPH_SCALE;
  const shrinkRate = options.shrinkRate ?? DEFAULT_SHRINK_RATE;

  const raster = new Raster(authoredCanvasSize(canvasSize, orientation));
  const [ax, ay] = toAuthoredPoint(center, canvasSize, orientation);

  const terminated = terminate(shrinkFactor);
  drawTarget(raster, [Math.round(ax), Math.round(ay)], shrinkFactor, glyph, terminated, glyphScale);

  const frame = tf.tidy(() => {
    let image = raster.toTensor();
    if (orientation === 'LEFT' || orientation === 'UP') {
      image = mirrorFrame(image);
    }
    if (isVertical(orientation)) {
      image = transposeFrame(image);
    }
    return tf.div<tf.Tensor3D>(image, 255);
  });

  return { frame, nextShrinkFactor: shrinkFactor * shrinkRate, terminated };
}
