import * as tf from '@tensorflow/tfjs';

import { blankFrame, mirrorFrame, transposeFrame } from './frameUtils';

// 2 rows x 3 columns, channel value encodes (row, column)
function makeFrame(): tf.Tensor3D {
  return tf.tensor3d(
    [
      [[0, 0, 0], [1, 1, 1], [2, 2, 2]],
      [[10, 10, 10], [11, 11, 11], [12, 12, 12]],
    ],
    [2, 3, 3]
  );
}

beforeAll(async () => {
  await tf.setBackend('cpu');
  await tf.ready();
});

test('mirrorFrame flips columns', () => {
  const frame = makeFrame();
  const mirrored = mirrorFrame(frame);

  expect(mirrored.shape).toEqual([2, 3, 3]);
  expect(mirrored.arraySync()).toEqual([
    [[2, 2, 2], [1, 1, 1], [0, 0, 0]],
    [[12, 12, 12], [11, 11, 11], [10, 10, 10]],
  ]);

  tf.dispose([frame, mirrored]);
});

test('transposeFrame swaps rows and columns', () => {
  const frame = makeFrame();
  const transposed = transposeFrame(frame);

  expect(transposed.shape).toEqual([3, 2, 3]);
  expect(transposed.arraySync()).toEqual([
    [[0, 0, 0], [10, 10, 10]],
    [[1, 1, 1], [11, 11, 11]],
    [[2, 2, 2], [12, 12, 12]],
  ]);

  tf.dispose([frame, transposed]);
});

test('blankFrame is all zeros with [height, width, 3] shape', () => {
  const frame = blankFrame([4, 2]);
  expect(frame.shape).toEqual([2, 4, 3]);
  expect(frame.dtype).toBe('float32');
  expect(frame.sum().dataSync()[0]).toBe(0);
  frame.dispose();
});
