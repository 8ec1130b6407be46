import { SessionConfig } from './config';
import { detectMonitorGeometry, resolveMonitorGeometry } from './MonitorGeometry';
import CanvasDisplay from './CanvasDisplay';
import DataCollectionSession from './DataCollectionSession';
import KeyboardInput from './KeyboardInput';
import WebcamFrameSource, { WebcamOptions } from './WebcamFrameSource';
import IndexedDbSampleStore from './storage/IndexedDbSampleStore';
import { SampleDatabase } from './storage/SampleDatabase';

export interface BrowserSessionOptions extends SessionConfig {
  /** id of the <video> element the webcam stream plays into */
  videoElementId: string;
  webcam?: WebcamOptions;
  databaseName?: string;
}

export interface BrowserSession {
  session: DataCollectionSession;
  display: CanvasDisplay;
  input: KeyboardInput;
  camera: WebcamFrameSource;
  store: IndexedDbSampleStore;
  /** Releases every browser resource the session was built on */
  dispose(): void;
}

/**
 * Wires a session to the webcam, a full-screen canvas, the keyboard and
 * IndexedDB. Call display.enterFullscreen() from the user gesture that
 * starts the session, then session.run().
 */
export function createBrowserSession(options: BrowserSessionOptions): BrowserSession {
  const { videoElementId, webcam, databaseName, ...config } = options;

  // Throws ConfigurationError before any device is touched
  const monitor = resolveMonitorGeometry(config.monitor, detectMonitorGeometry);

  const display = new CanvasDisplay([monitor.widthPx, monitor.heightPx]);
  const input = new KeyboardInput(window);
  const camera = new WebcamFrameSource(videoElementId, webcam);
  const store = new IndexedDbSampleStore(new SampleDatabase(databaseName));

  const session = new DataCollectionSession(
    { display, input, camera, store },
    { ...config, monitor }
  );

  return {
    session,
    display,
    input,
    camera,
    store,
    dispose: () => {
      display.dispose();
      input.dispose();
      camera.dispose();
      store.close();
    },
  };
}
