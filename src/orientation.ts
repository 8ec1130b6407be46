import { Orientation } from './types';

export const ORIENTATIONS: readonly Orientation[] = ['UP', 'DOWN', 'LEFT', 'RIGHT'];

// KeyboardEvent.key value that confirms each orientation
export const ORIENTATION_KEYS: Readonly<Record<Orientation, string>> = {
  UP: 'ArrowUp',
  DOWN: 'ArrowDown',
  LEFT: 'ArrowLeft',
  RIGHT: 'ArrowRight',
};

export function keyForOrientation(orientation: Orientation): string {
  return ORIENTATION_KEYS[orientation];
}

export function orientationForKey(key: string): Orientation | null {
  for (const orientation of ORIENTATIONS) {
    if (ORIENTATION_KEYS[orientation] === key) {
      return orientation;
    }
  }
  return null;
}

/**
 * UP and DOWN targets are authored on a transposed canvas.
 */
export function isVertical(orientation: Orientation): boolean {
  return orientation === 'UP' || orientation === 'DOWN';
}
