interface PendingRead<T> {
  resolve: (frame: T) => void;
  reject: (error: Error) => void;
}

/**
 * FIFO queue between a camera's acquisition loop and the trial that pulls
 * from it.
 *
 * clear() drops every queued frame; a read issued after it only sees frames
 * pushed after it, so a capture can never return a frame acquired before
 * the confirming key press.
 */
export default class FrameBuffer<T> {
  private frames: T[] = [];
  private pending: PendingRead<T>[] = [];
  private closedWith: Error | null = null;

  constructor(
    private readonly capacity: number = 30,
    private readonly onEvict?: (frame: T) => void
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`FrameBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.frames.length;
  }

  get isClosed(): boolean {
    return this.closedWith !== null;
  }

  push(frame: T): void {
    if (this.closedWith) {
      this.onEvict?.(frame);
      return;
    }

    const reader = this.pending.shift();
    if (reader) {
      reader.resolve(frame);
      return;
    }

    this.frames.push(frame);
    while (this.frames.length > this.capacity) {
      const evicted = this.frames.shift();
      if (evicted !== undefined) {
        this.onEvict?.(evicted);
      }
    }
  }

  clear(): void {
    const dropped = this.frames;
    this.frames = [];
    dropped.forEach(frame => this.onEvict?.(frame));
  }

  /**
   * Resolves with the oldest queued frame, or the next one pushed.
   */
  next(): Promise<T> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }

    return new Promise<T>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  /**
   * Drops queued frames and fails every pending and future read.
   */
  close(reason: Error = new Error('Frame buffer closed')): void {
    if (this.closedWith) {
      return;
    }
    this.clear();
    this.closedWith = reason;
    const readers = this.pending;
    this.pending = [];
    readers.forEach(reader => reader.reject(reason));
  }
}
