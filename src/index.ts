export * from './types';

export { calculateIoU, boxCenter, squaredDistance } from './lib/detection/geometry';
export { filterByConfidence, filterByClass } from './lib/detection/filter';
export { suppress, suppressSingleClass, groupByClass } from './lib/detection/nms';
export { DetectionSchema, validateDetections } from './lib/detection/schema';
export { processDetections } from './lib/detection/postprocess';
export { decodeYoloOutput, COCO_CLASSES } from './lib/detection/yolo-decoder';
export type { YoloDecodeOptions } from './lib/detection/yolo-decoder';
export { YoloDetector } from './lib/detection/yolo';
export type { PredictionModel, YoloDetectorOptions } from './lib/detection/yolo';

export { createTrackingState, trackUpdate, trackReset } from './lib/tracking/centroid-tracker';
export type { TrackResetOptions } from './lib/tracking/centroid-tracker';
export { pixelSpeed, elapsedFromFps, toMetersPerSecond } from './lib/tracking/motion';

export { DetectionEngine } from './lib/engine/frame-cycle';
export type { DetectionEngineOptions } from './lib/engine/frame-cycle';
export { FpsMeter } from './lib/engine/fps-meter';
export { resolveEngineConfig, EngineConfigSchema, ConfigurationError } from './lib/engine/config';
export {
  DEFAULT_ENGINE_CONFIG,
  DETECTION_PRESETS,
  LIVING_BEING_CLASSES,
  isPresetName
} from './lib/engine/presets';
export { formatUniqueId, summarizeDetections, formatDetections, getActiveIds } from './lib/engine/report';

export { createLogger, setLogLevel, getLogLevel } from './lib/logger';
