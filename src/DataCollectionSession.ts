import EventEmitter from 'eventemitter3';

import {
  AnimationState,
  CanvasSize,
  MonitorGeometry,
  Sample,
  SessionStopReason,
  SessionSummary,
  TrialOutcome,
  TrialState,
} from './types';
import {
  CameraFrameSource,
  Clock,
  DisplaySurface,
  KeyInput,
  MonitorGeometryDetector,
  SampleStore,
  systemClock,
} from './collaborators';
import { SessionConfig, resolveSessionConfig } from './config';
import { isQuitSignal } from './errors';
import { resolveMonitorGeometry } from './MonitorGeometry';
import { RandomSource, defaultRandom } from './random';
import { TerminationRule } from './TargetRenderer';
import TrialRunner from './TrialRunner';
import { holdFor } from './utils/polling';

export interface SessionDependencies {
  display: DisplaySurface;
  input: KeyInput;
  camera: CameraFrameSource;
  store: SampleStore;
  detectMonitor?: MonitorGeometryDetector;
  clock?: Clock;
  random?: RandomSource;
  terminate?: TerminationRule;
}

export interface SessionEvents {
  state: (state: TrialState, animation: AnimationState) => void;
  trial: (outcome: TrialOutcome, index: number) => void;
  sample: (sample: Sample) => void;
  stopped: (summary: SessionSummary) => void;
}

export function toSample(
  outcome: TrialOutcome,
  monitor: MonitorGeometry
): Sample | null {
  if (outcome.status !== 'captured') {
    return null;
  }
  return {
    fileName: outcome.fileName,
    pointOnScreen: outcome.pointOnScreen,
    timeTillCapture: outcome.timeTillCapture,
    monitorMm: [monitor.widthMm, monitor.heightMm],
    monitorPixels: [monitor.widthPx, monitor.heightPx],
  };
}

/**
 * Runs trials back to back until the quit key (or maxTrials), appending a
 * sample for every captured trial as soon as it completes.
 *
 * Usage:
 * ```typescript
 * const session = new DataCollectionSession({ display, input, camera, store, detectMonitor });
 * session.on('sample', sample => console.log(sample.fileName));
 * const summary = await session.run();
 * ```
 */
export default class DataCollectionSession extends EventEmitter<SessionEvents> {
  private readonly deps: SessionDependencies;
  private readonly config: ReturnType<typeof resolveSessionConfig>;
  private readonly monitorOverride?: MonitorGeometry;
  private readonly clock: Clock;
  private running = false;

  constructor(deps: SessionDependencies, config: SessionConfig = {}) {
    super();
    this.deps = deps;
    this.config = resolveSessionConfig(config);
    this.monitorOverride = config.monitor;
    this.clock = deps.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(): Promise<SessionSummary> {
    if (this.running) {
      throw new Error('Session is already running');
    }

    const monitor = resolveMonitorGeometry(this.monitorOverride, this.deps.detectMonitor);
    console.log(
      `[DataCollectionSession] Found monitor of size ${monitor.widthMm}x${monitor.heightMm}mm ` +
      `and ${monitor.widthPx}x${monitor.heightPx}px.`
    );

    this.running = true;
    const { display, camera, store } = this.deps;
    const canvasSize: CanvasSize = [monitor.widthPx, monitor.heightPx];
    const runner = new TrialRunner(
      {
        canvasSize,
        display,
        input: this.deps.input,
        camera,
        images: store,
        clock: this.clock,
        random: this.deps.random ?? defaultRandom,
        terminate: this.deps.terminate,
        onStateChange: (state, animation) => this.emit('state', state, animation),
      },
      this.config
    );

    let trials = 0;
    let captured = 0;
    let stopReason: SessionStopReason = 'limit';

    try {
      await camera.start();

      while (this.config.maxTrials === 0 || trials < this.config.maxTrials) {
        const outcome = await runner.run();
        trials++;
        this.emit('trial', outcome, trials - 1);

        const sample = toSample(outcome, monitor);
        if (sample) {
          await store.appendSample(sample);
          captured++;
          this.emit('sample', sample);
        }

        if (this.config.verbose) {
          console.log(
            `[DataCollectionSession] Trial ${trials}: ${outcome.status} at ` +
            `(${outcome.pointOnScreen[0]}, ${outcome.pointOnScreen[1]}) facing ${outcome.orientation}` +
            (outcome.status === 'captured' ? ` in ${outcome.timeTillCapture.toFixed(3)}s -> ${outcome.fileName}` : '')
          );
        }

        if (this.config.maxTrials === 0 || trials < this.config.maxTrials) {
          await holdFor(
            this.deps.input,
            this.clock,
            this.config.interTrialDelayMs,
            this.config.pollIntervalMs,
            this.config.quitKey
          );
        }
      }
    } catch (error) {
      if (!isQuitSignal(error)) {
        console.error('[DataCollectionSession] Session failed:', error);
        throw error;
      }
      console.log('[DataCollectionSession] Quit requested, stopping session');
      stopReason = 'quit';
    } finally {
      display.release();
      camera.stop();
      this.running = false;
    }

    const summary: SessionSummary = { trials, captured, expired: trials - captured, stopReason };
    console.log(
      `[DataCollectionSession] Session ended (${stopReason}): ${captured}/${trials} trials captured`
    );
    this.emit('stopped', summary);
    return summary;
  }
}
