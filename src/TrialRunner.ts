import {
  AnimationState,
  CanvasSize,
  Orientation,
  TrialOutcome,
  TrialState,
} from './types';
import { CameraFrameSource, Clock, DisplaySurface, ImageSink, KeyInput, systemClock } from './collaborators';
import { TrialConfig, resolveTrialConfig } from './config';
import { keyForOrientation } from './orientation';
import { RandomSource, defaultRandom, randomOrientation, randomPointOnScreen } from './random';
import { TerminationRule, renderTarget, stochasticTermination } from './TargetRenderer';
import { blankFrame } from './utils/frameUtils';
import { checkQuit, holdFor } from './utils/polling';
import { formatCaptureFileName } from './utils/timestamp';

export interface TrialDependencies {
  canvasSize: CanvasSize;
  display: DisplaySurface;
  input: KeyInput;
  camera: CameraFrameSource;
  images: ImageSink;
  clock?: Clock;
  random?: RandomSource;

  /** Replaces the per-frame stochastic stopping rule */
  terminate?: TerminationRule;

  onStateChange?: (state: TrialState, animation: AnimationState) => void;
}

interface Capture {
  fileName: string;
  timeTillCapture: number;
}

/**
 * Runs one trial end to end:
 *
 *   ANIMATING -> CAPTURE_WINDOW -> CAPTURED | EXPIRED -> DONE
 *
 * The target shrinks frame by frame until the termination rule fires and the
 * glyph turns orange. A capture window then opens; the key bound to the
 * target's orientation clears the camera buffer and captures the next frame.
 * The quit key throws a QuitSignal from any polling point.
 */
export default class TrialRunner {
  private readonly deps: TrialDependencies;
  private readonly config: Required<TrialConfig>;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly terminate: TerminationRule;

  constructor(deps: TrialDependencies, config: TrialConfig = {}) {
    this.deps = deps;
    this.config = resolveTrialConfig(config);
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? defaultRandom;
    this.terminate = deps.terminate ?? stochasticTermination(this.random);
  }

  async run(): Promise<TrialOutcome> {
    const animation: AnimationState = {
      center: randomPointOnScreen(this.random, this.deps.canvasSize),
      shrinkFactor: 1,
      orientation: randomOrientation(this.random, this.config.orientations),
      terminated: false,
    };

    this.enter('ANIMATING', animation);
    await this.animate(animation);

    this.enter('CAPTURE_WINDOW', animation);
    const capture = await this.awaitConfirmation(animation.orientation);
    this.enter(capture ? 'CAPTURED' : 'EXPIRED', animation);

    await this.settle();
    this.enter('DONE', animation);

    const pointOnScreen = animation.center;
    const orientation = animation.orientation;
    if (capture) {
      return { status: 'captured', pointOnScreen, orientation, ...capture };
    }
    return { status: 'expired', fileName: null, pointOnScreen, orientation, timeTillCapture: null };
  }

  private enter(state: TrialState, animation: AnimationState): void {
    this.deps.onStateChange?.(state, { ...animation });
  }

  private async animate(animation: AnimationState): Promise<void> {
    const { glyph, glyphScale, shrinkRate, frameDurationMs } = this.config;

    while (!animation.terminated) {
      const { frame, nextShrinkFactor, terminated } = renderTarget(
        this.deps.canvasSize,
        animation.center,
        animation.shrinkFactor,
        animation.orientation,
        glyph,
        { terminate: this.terminate, glyphScale, shrinkRate }
      );

      try {
        await this.deps.display.show(frame);
      } finally {
        frame.dispose();
      }

      animation.shrinkFactor = nextShrinkFactor;
      animation.terminated = terminated;

      // The cue frame is held like any other; the capture window opens after it
      await this.hold(frameDurationMs);
    }
  }

  private async awaitConfirmation(orientation: Orientation): Promise<Capture | null> {
    const { captureWindowMs, captureTickMs } = this.config;
    const { camera, images, input } = this.deps;
    const expectedKey = keyForOrientation(orientation);
    const openedAt = this.clock.now();

    let elapsed = 0;
    while (elapsed < captureWindowMs) {
      const key = await input.poll(Math.min(captureTickMs, captureWindowMs - elapsed));
      checkQuit(key, this.config.quitKey);

      if (key === expectedKey) {
        camera.clearBuffer();
        const frame = await camera.nextFrame();
        const timeTillCapture = (this.clock.now() - openedAt) / 1000;
        const fileName = formatCaptureFileName(this.clock.date());
        try {
          await images.saveImage(fileName, frame);
        } finally {
          frame.dispose();
        }
        return { fileName, timeTillCapture };
      }

      elapsed = this.clock.now() - openedAt;
    }

    return null;
  }

  private async settle(): Promise<void> {
    const frame = blankFrame(this.deps.canvasSize);
    try {
      await this.deps.display.show(frame);
    } finally {
      frame.dispose();
    }
    await this.hold(this.config.settleDelayMs);
  }

  private hold(durationMs: number): Promise<void> {
    return holdFor(this.deps.input, this.clock, durationMs, this.config.pollIntervalMs, this.config.quitKey);
  }
}
