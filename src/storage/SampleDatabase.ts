import Dexie, { DexieOptions, Table } from 'dexie';

import { Sample } from '../types';

export interface SampleRecord extends Sample {
  id?: number;
  createdAt: number;
}

export interface ImageRecord {
  fileName: string;
  mimeType: string;
  bytes: Uint8Array;
}

export const DEFAULT_DATABASE_NAME = 'gazecollect';

export class SampleDatabase extends Dexie {
  samples!: Table<SampleRecord, number>;
  images!: Table<ImageRecord, string>;

  /**
   * @param options Passed through to Dexie, e.g. an indexedDB implementation
   * for environments without one
   */
  constructor(name: string = DEFAULT_DATABASE_NAME, options?: DexieOptions) {
    super(name, options);
    this.version(1).stores({
      samples: '++id, fileName, createdAt',
      images: 'fileName',
    });
  }
}
