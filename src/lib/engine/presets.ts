import { DetectionPresetName, EngineConfig } from '../../types';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  confidenceThreshold: 0.5,
  iouThreshold: 0.45,
  maxDetections: 100,
  resetIdentityCounter: false,
  processEveryNFrames: 1,
  logDetections: false
};

// Humans and animals among the COCO classes
export const LIVING_BEING_CLASSES: readonly string[] = [
  'person',
  'cat',
  'dog',
  'horse',
  'sheep',
  'cow',
  'elephant',
  'bear',
  'zebra',
  'giraffe'
];

export const DETECTION_PRESETS: Record<DetectionPresetName, Partial<EngineConfig>> = {
  'high-accuracy': {
    confidenceThreshold: 0.3,
    iouThreshold: 0.3,
    maxDetections: 200,
    processEveryNFrames: 1
  },
  'high-performance': {
    confidenceThreshold: 0.7,
    iouThreshold: 0.6,
    maxDetections: 50,
    processEveryNFrames: 3
  },
  'balanced': {
    confidenceThreshold: 0.5,
    iouThreshold: 0.45,
    maxDetections: 100,
    processEveryNFrames: 1
  }
};

export function isPresetName(value: string): value is DetectionPresetName {
  return Object.prototype.hasOwnProperty.call(DETECTION_PRESETS, value);
}
