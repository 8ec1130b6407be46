import { KeyInput } from './collaborators';
import { DisposableResource } from './IDisposable';

const MAX_QUEUED_KEYS = 32;

/**
 * Queues keydown events and serves them to pollers one at a time.
 * A poll returns as soon as a key arrives or its timeout runs out.
 */
export default class KeyboardInput extends DisposableResource implements KeyInput {
  private readonly target: EventTarget;
  private queue: string[] = [];
  private waiter: ((key: string | null) => void) | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  private readonly keyDownHandler = (event: Event) => {
    if (!(event instanceof KeyboardEvent) || event.repeat) {
      return;
    }

    if (this.waiter) {
      this.deliver(event.key);
      return;
    }

    this.queue.push(event.key);
    if (this.queue.length > MAX_QUEUED_KEYS) {
      this.queue.shift();
    }
  };

  constructor(target: EventTarget = window) {
    super();
    this.target = target;
    this.target.addEventListener('keydown', this.keyDownHandler);
  }

  get pendingKeys(): number {
    return this.queue.length;
  }

  poll(timeoutMs: number): Promise<string | null> {
    if (this.isDisposed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error('KeyboardInput supports a single poller at a time'));
    }

    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }

    return new Promise(resolve => {
      this.waiter = resolve;
      this.timer = setTimeout(() => this.deliver(null), timeoutMs);
    });
  }

  private deliver(key: string | null): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(key);
  }

  protected onDispose(): void {
    this.target.removeEventListener('keydown', this.keyDownHandler);
    this.queue = [];
    this.deliver(null);
  }
}
