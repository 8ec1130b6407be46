/**
 * Objects holding resources that outlive a single call: media streams,
 * keyboard listeners, full-screen canvases, open databases.
 */
export interface IDisposable {
  /**
   * Releases everything the object holds. The object is unusable afterwards.
   */
  dispose(): void;

  readonly isDisposed: boolean;
}

/**
 * Base class that runs onDispose() at most once.
 */
export abstract class DisposableResource implements IDisposable {
  private _disposed = false;

  dispose(): void {
    if (this._disposed) {
      return;
    }
    this.onDispose();
    this._disposed = true;
  }

  /**
   * Cleanup logic, called exactly once from dispose().
   */
  protected abstract onDispose(): void;

  get isDisposed(): boolean {
    return this._disposed;
  }

  protected assertNotDisposed(action: string): void {
    if (this._disposed) {
      throw new Error(`Cannot ${action}: ${this.constructor.name} has been disposed`);
    }
  }
}
