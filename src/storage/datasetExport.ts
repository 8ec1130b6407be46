/**
 * Dataset export
 *
 * data.csv keeps the tabular layout used by existing gaze-dataset loaders:
 * a leading index column, snake_case headers and pairs written as "(a, b)".
 */

import JSZip from 'jszip';

import { Sample } from '../types';
import { ImageRecord } from './SampleDatabase';

export const CSV_HEADER = ['', 'file_name', 'point_on_screen', 'time_till_capture', 'monitor_mm', 'monitor_pixels'];

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatPair([a, b]: [number, number]): string {
  return `(${a}, ${b})`;
}

export function samplesToCsv(samples: Sample[]): string {
  const lines = [CSV_HEADER.join(',')];

  samples.forEach((sample, index) => {
    const row = [
      String(index),
      sample.fileName,
      formatPair(sample.pointOnScreen),
      String(sample.timeTillCapture),
      formatPair(sample.monitorMm),
      formatPair(sample.monitorPixels),
    ];
    lines.push(row.map(csvField).join(','));
  });

  return lines.join('\n') + '\n';
}

/**
 * Zip with data.csv at the root and every captured image under images/.
 */
export function buildDatasetArchive(samples: Sample[], images: ImageRecord[]): JSZip {
  const zip = new JSZip();
  zip.file('data.csv', samplesToCsv(samples));

  const folder = zip.folder('images');
  if (!folder) {
    throw new Error('Could not create images folder in dataset archive');
  }
  for (const image of images) {
    folder.file(image.fileName, image.bytes);
  }

  const referenced = new Set(samples.map(sample => sample.fileName));
  const missing = [...referenced].filter(name => !images.some(image => image.fileName === name));
  if (missing.length > 0) {
    console.warn(`[datasetExport] ${missing.length} sample(s) reference images that are not stored:`, missing);
  }

  return zip;
}

export interface DatasetSource {
  listSamples(): Promise<Sample[]>;
  listImages(): Promise<ImageRecord[]>;
}

/**
 * Builds the archive from a store and downloads it in the browser.
 */
export async function downloadDataset(source: DatasetSource, name: string = `gaze-dataset-${Date.now()}`): Promise<void> {
  const [samples, images] = await Promise.all([source.listSamples(), source.listImages()]);
  const blob = await buildDatasetArchive(samples, images).generateAsync({ type: 'blob' });

  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = `${name}.zip`;
  a.click();
  URL.revokeObjectURL(url);
}
