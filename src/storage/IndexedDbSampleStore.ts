import { CameraFrame, Sample } from '../types';
import { SampleStore } from '../collaborators';
import { ImageRecord, SampleDatabase, SampleRecord } from './SampleDatabase';
import { ImageEncoder, createJpegEncoder } from './imageEncoding';

/**
 * Sample store backed by IndexedDB. Every sample and image is committed as
 * soon as it is written, so an interrupted session keeps what it collected.
 * Images are keyed by file name; a second capture under the same name
 * replaces the first.
 */
export default class IndexedDbSampleStore implements SampleStore {
  readonly db: SampleDatabase;
  private readonly encode: ImageEncoder;

  constructor(db: SampleDatabase = new SampleDatabase(), encode: ImageEncoder = createJpegEncoder()) {
    this.db = db;
    this.encode = encode;
  }

  async saveImage(fileName: string, frame: CameraFrame): Promise<void> {
    const { mimeType, bytes } = await this.encode(frame);
    await this.db.images.put({ fileName, mimeType, bytes });
  }

  async appendSample(sample: Sample): Promise<void> {
    await this.db.samples.add({ ...sample, createdAt: Date.now() });
  }

  async listSamples(): Promise<Sample[]> {
    const records = await this.db.samples.toArray();
    return records.map(toSample);
  }

  async listImages(): Promise<ImageRecord[]> {
    return this.db.images.toArray();
  }

  async getImage(fileName: string): Promise<ImageRecord | undefined> {
    return this.db.images.get(fileName);
  }

  async clear(): Promise<void> {
    await this.db.transaction('rw', this.db.samples, this.db.images, async () => {
      await this.db.samples.clear();
      await this.db.images.clear();
    });
  }

  close(): void {
    this.db.close();
  }
}

function toSample({ fileName, pointOnScreen, timeTillCapture, monitorMm, monitorPixels }: SampleRecord): Sample {
  return { fileName, pointOnScreen, timeTillCapture, monitorMm, monitorPixels };
}
