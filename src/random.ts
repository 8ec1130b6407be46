import seedrandom from 'seedrandom';

import { CanvasSize, Orientation, Point } from './types';
import { ORIENTATIONS } from './orientation';

/**
 * Source of uniform numbers in [0, 1). Injected wherever a trial draws
 * randomness so a session can be replayed.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

export function seededRandom(seed: string): RandomSource {
  const prng = seedrandom(seed);
  return () => prng();
}

export function uniform(random: RandomSource, low: number, high: number): number {
  return low + (high - low) * random();
}

/**
 * Uniform integer position in [0, width) x [0, height).
 */
export function randomPointOnScreen(random: RandomSource, [width, height]: CanvasSize): Point {
  // min() guards sources that return exactly 1
  const x = Math.min(Math.floor(random() * width), width - 1);
  const y = Math.min(Math.floor(random() * height), height - 1);
  return [x, y];
}

export function randomOrientation(
  random: RandomSource,
  choices: readonly Orientation[] = ORIENTATIONS
): Orientation {
  const index = Math.min(Math.floor(random() * choices.length), choices.length - 1);
  return choices[index];
}
