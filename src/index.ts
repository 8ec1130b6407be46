import DataCollectionSession, { SessionDependencies, SessionEvents, toSample } from './DataCollectionSession'
import TrialRunner, { TrialDependencies } from './TrialRunner'
import FrameBuffer from './FrameBuffer'
import WebcamFrameSource, { WebcamOptions } from './WebcamFrameSource'
import CanvasDisplay from './CanvasDisplay'
import KeyboardInput from './KeyboardInput'
import IndexedDbSampleStore from './storage/IndexedDbSampleStore'
import { IDisposable, DisposableResource } from './IDisposable'

export * from './types'
export * from './collaborators'
export * from './config'
export * from './errors'
export * from './orientation'
export * from './random'
export * from './TargetRenderer'
export * from './MonitorGeometry'
export * from './createBrowserSession'
export * from './storage/SampleDatabase'
export * from './storage/imageEncoding'
export * from './storage/datasetExport'
export { mirrorPoint, swapAxes, toAuthoredPoint } from './utils/geometry'
export { mirrorFrame, transposeFrame, blankFrame } from './utils/frameUtils'
export { formatCaptureFileName, formatTimestamp } from './utils/timestamp'

export {
    DataCollectionSession,
    SessionDependencies,
    SessionEvents,
    toSample,
    TrialRunner,
    TrialDependencies,
    FrameBuffer,
    WebcamFrameSource,
    WebcamOptions,
    CanvasDisplay,
    KeyboardInput,
    IndexedDbSampleStore,
    IDisposable,
    DisposableResource
}
