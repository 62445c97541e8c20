/** Axis-aligned box in pixels, `[x1, y1, x2, y2]` with x1 < x2 and y1 < y2. */
export type BBox = [number, number, number, number];

export interface Point {
  x: number;
  y: number;
}

/** One detector hit for one frame. Never mutated once produced. */
export interface RawDetection {
  bbox: BBox;
  class: string;
  confidence: number;
  classId?: number;
}

export interface TrackedDetection extends RawDetection {
  trackId: number;
  /** Centroid movement since the previous frame, zero for new tracks. */
  displacement: Point;
  /** Pixels per second; 0 for new tracks or when elapsed time is unknown. */
  speed: number;
}

export interface EnrichedDetection extends TrackedDetection {
  uniqueId: string;
  speedMps?: number;
}

export interface TrackedObject {
  trackId: number;
  class: string;
  center: Point;
}

/** Everything the tracker remembers between two frames. */
export interface TrackingState {
  objects: TrackedObject[];
  nextTrackId: number;
}

export interface TrackUpdateResult {
  detections: TrackedDetection[];
  state: TrackingState;
}

export interface ProcessingOptions {
  confidenceThreshold: number;
  iouThreshold: number;
  maxDetections: number;
  allowedClasses?: readonly string[];
}

export interface EngineConfig extends ProcessingOptions {
  resetIdentityCounter: boolean;
  processEveryNFrames: number;
  metersPerPixel?: number;
  logDetections: boolean;
}

export type DetectionPresetName = 'high-accuracy' | 'high-performance' | 'balanced';

export interface FrameResult {
  frameNumber: number;
  timestamp: number;
  fps: number;
  processed: boolean;
  detections: EnrichedDetection[];
  summary: Record<string, number>;
  error?: string;
}

export interface DetectionSource<F> {
  detect(frame: F): Promise<RawDetection[]>;
}

export interface FormattedDetection {
  id: string;
  class: string;
  confidence: number;
  bbox: BBox;
  trackId: number;
}

export interface DetectionReport {
  totalDetections: number;
  detections: FormattedDetection[];
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
