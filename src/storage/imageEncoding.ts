import * as tf from '@tensorflow/tfjs';

import { CameraFrame } from '../types';

export interface EncodedImage {
  mimeType: string;
  bytes: Uint8Array;
}

export type ImageEncoder = (frame: CameraFrame) => Promise<EncodedImage>;

export const JPEG_MIME_TYPE = 'image/jpeg';

/**
 * Encodes an int32 RGB frame as JPEG through a canvas. Browser only.
 */
export function createJpegEncoder(quality: number = 0.95): ImageEncoder {
  return async (frame: CameraFrame) => {
    const [height, width] = frame.shape;
    const canvas = document.createElement('canvas');
    canvas.width = width;
    canvas.height = height;
    await tf.browser.toPixels(frame, canvas);

    const blob = await new Promise<Blob>((resolve, reject) => {
      canvas.toBlob(
        result => (result ? resolve(result) : reject(new Error('Canvas could not be encoded as JPEG'))),
        JPEG_MIME_TYPE,
        quality
      );
    });

    return { mimeType: JPEG_MIME_TYPE, bytes: new Uint8Array(await blob.arrayBuffer()) };
  };
}
