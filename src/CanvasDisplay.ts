import * as tf from '@tensorflow/tfjs';

import { CanvasSize, DisplayFrame } from './types';
import { DisplaySurface } from './collaborators';
import { DisposableResource } from './IDisposable';

/**
 * Borderless canvas covering the screen, sized to the monitor's pixels.
 */
export default class CanvasDisplay extends DisposableResource implements DisplaySurface {
  readonly canvas: HTMLCanvasElement;

  constructor([width, height]: CanvasSize, parent: HTMLElement = document.body) {
    super();
    this.canvas = document.createElement('canvas');
    this.canvas.width = width;
    this.canvas.height = height;
    Object.assign(this.canvas.style, {
      position: 'fixed',
      left: '0',
      top: '0',
      width: '100vw',
      height: '100vh',
      border: 'none',
      margin: '0',
      background: '#000',
      cursor: 'none',
      zIndex: '2147483647',
    });
    parent.appendChild(this.canvas);
  }

  get isFullscreen(): boolean {
    return document.fullscreenElement === this.canvas;
  }

  /**
   * Must be called from a user gesture (e.g. the click that starts a session).
   */
  async enterFullscreen(): Promise<boolean> {
    if (!document.fullscreenEnabled) {
      console.warn('[CanvasDisplay] Fullscreen API not supported');
      return false;
    }

    try {
      await this.canvas.requestFullscreen();
      return true;
    } catch (error) {
      console.error('[CanvasDisplay] Failed to enter fullscreen:', error);
      return false;
    }
  }

  async show(frame: DisplayFrame): Promise<void> {
    this.assertNotDisposed('show frame');
    await tf.browser.toPixels(frame, this.canvas);
  }

  release(): void {
    this.dispose();
  }

  protected onDispose(): void {
    if (this.isFullscreen) {
      document.exitFullscreen().catch((error: unknown) => {
        console.error('[CanvasDisplay] Failed to exit fullscreen:', error);
      });
    }
    this.canvas.remove();
  }
}
