import * as tf from '@tensorflow/tfjs';

import { CanvasSize, RGB } from '../types';
import glyphFont from './glyphs.json';

const GLYPHS: Record<string, string[]> = glyphFont.glyphs;

/**
 * Returns the bitmap rows of a glyph, '1' marking an inked cell.
 */
export function getGlyphBitmap(glyph: string): string[] {
  const bitmap = GLYPHS[glyph.toUpperCase()];
  if (!bitmap) {
    throw new Error(`No bitmap for glyph '${glyph}'. Available glyphs: ${Object.keys(GLYPHS).join('')}`);
  }
  return bitmap;
}

/**
 * Pixel size [width, height] of a glyph drawn at the given scale.
 */
export function glyphSize(scale: number): CanvasSize {
  return [glyphFont.cellWidth * scale, glyphFont.cellHeight * scale];
}

/**
 * Mutable RGB pixel buffer with values in [0, 255].
 * Drawing outside the canvas is clipped.
 */
export class Raster {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;

  constructor([width, height]: CanvasSize) {
    this.width = width;
    this.height = height;
    this.data = new Float32Array(width * height * 3);
  }

  setPixel(x: number, y: number, [r, g, b]: RGB): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }
    const i = (y * this.width + x) * 3;
    this.data[i] = r;
    this.data[i + 1] = g;
    this.data[i + 2] = b;
  }

  getPixel(x: number, y: number): RGB {
    const i = (y * this.width + x) * 3;
    return [this.data[i], this.data[i + 1], this.data[i + 2]];
  }

  fillDisc(cx: number, cy: number, radius: number, color: RGB): void {
    const r2 = radius * radius;
    const yStart = Math.max(0, cy - radius);
    const yEnd = Math.min(this.height - 1, cy + radius);
    const xStart = Math.max(0, cx - radius);
    const xEnd = Math.min(this.width - 1, cx + radius);

    for (let y = yStart; y <= yEnd; y++) {
      const dy = y - cy;
      for (let x = xStart; x <= xEnd; x++) {
        const dx = x - cx;
        if (dx * dx + dy * dy <= r2) {
          this.setPixel(x, y, color);
        }
      }
    }
  }

  /**
   * Draws a glyph with its top-left corner at (left, top), each font cell
   * becoming a scale x scale block.
   */
  drawGlyph(glyph: string, left: number, top: number, scale: number, color: RGB): void {
    const bitmap = getGlyphBitmap(glyph);
    bitmap.forEach((row, cellY) => {
      for (let cellX = 0; cellX < row.length; cellX++) {
        if (row[cellX] !== '1') continue;
        for (let dy = 0; dy < scale; dy++) {
          for (let dx = 0; dx < scale; dx++) {
            this.setPixel(left + cellX * scale + dx, top + cellY * scale + dy, color);
          }
        }
      }
    });
  }

  toTensor(): tf.Tensor3D {
    return tf.tensor3d(this.data, [this.height, this.width, 3], 'float32');
  }
}
