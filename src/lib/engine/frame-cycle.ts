import {
  DetectionPresetName,
  DetectionSource,
  EngineConfig,
  EnrichedDetection,
  FrameResult,
  RawDetection,
  TrackedDetection,
  TrackingState
} from '../../types';
import { processDetections } from '../detection/postprocess';
import { createLogger } from '../logger';
import { createTrackingState, trackReset, trackUpdate } from '../tracking/centroid-tracker';
import { elapsedFromFps, toMetersPerSecond } from '../tracking/motion';
import { resolveEngineConfig } from './config';
import { Clock, FpsMeter } from './fps-meter';
import { formatUniqueId, summarizeDetections } from './report';

const logger = createLogger('engine');

export interface DetectionEngineOptions {
  now?: Clock;
}

/**
 * Runs one frame at a time: post-process the raw detections, track them, enrich the result.
 * Owns the tracking state; nothing else writes to it.
 */
export class DetectionEngine {
  private config: EngineConfig;
  private state: TrackingState = createTrackingState();
  private fpsMeter: FpsMeter;
  private frameNumber: number = 0;
  private now: Clock;

  constructor(
    config: Partial<EngineConfig> | DetectionPresetName = {},
    options: DetectionEngineOptions = {}
  ) {
    this.config = resolveEngineConfig(config);
    this.now = options.now ?? Date.now;
    this.fpsMeter = new FpsMeter(this.now);

    logger.debug('DetectionEngine initialized with config:', this.config);
  }

  /**
   * Process one frame's raw detections.
   * `fps` is the caller's frame rate estimate; without it the engine's own FPS meter is used.
   */
  processFrame(rawDetections: readonly unknown[], fps?: number): FrameResult {
    const frameNumber = this.frameNumber++;
    const timestamp = this.now();
    this.fpsMeter.update();
    const frameRate = fps ?? this.fpsMeter.getFps();

    if (!this.shouldProcess(frameNumber)) {
      return this.emptyResult(frameNumber, timestamp, frameRate);
    }

    const clean = processDetections(rawDetections, this.config);
    const elapsedSeconds = elapsedFromFps(frameRate, this.config.processEveryNFrames);
    const { detections, state } = trackUpdate(clean, this.state, elapsedSeconds);
    this.state = state;

    const enriched = detections.map(det => this.enrich(det));

    if (this.config.logDetections && enriched.length > 0) {
      logger.info(`Frame ${frameNumber}: ${enriched.length} detections`);
      for (const det of enriched) {
        logger.info(`  - ${det.class}: ${det.confidence.toFixed(2)}`);
      }
    }

    return {
      frameNumber,
      timestamp,
      fps: frameRate,
      processed: true,
      detections: enriched,
      summary: summarizeDetections(enriched)
    };
  }

  /**
   * Ask an external detector for this frame's detections, then run the frame cycle.
   * A detector failure is reported in the result and leaves the tracking state untouched.
   * Skipped frames never reach the detector.
   */
  async detectFrame<F>(source: DetectionSource<F>, frame: F, fps?: number): Promise<FrameResult> {
    if (!this.shouldProcess(this.frameNumber)) {
      return this.processFrame([], fps);
    }

    let rawDetections: RawDetection[];
    try {
      rawDetections = await source.detect(frame);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Detection failed on frame ${this.frameNumber}:`, message);
      return {
        ...this.emptyResult(this.frameNumber, this.now(), fps ?? this.fpsMeter.getFps()),
        error: message
      };
    }

    return this.processFrame(rawDetections, fps);
  }

  /**
   * Clear tracked objects and the frame/FPS counters. Detector settings are left alone.
   */
  reset(): void {
    this.state = trackReset(this.state, {
      resetIdentityCounter: this.config.resetIdentityCounter
    });
    this.fpsMeter.reset();
    this.frameNumber = 0;
    logger.info('Tracker reset');
  }

  getTrackingState(): TrackingState {
    return {
      objects: this.state.objects.map(obj => ({ ...obj, center: { ...obj.center } })),
      nextTrackId: this.state.nextTrackId
    };
  }

  getConfig(): EngineConfig {
    return { ...this.config };
  }

  getFrameCount(): number {
    return this.frameNumber;
  }

  getFps(): number {
    return this.fpsMeter.getFps();
  }

  private shouldProcess(frameNumber: number): boolean {
    return frameNumber % this.config.processEveryNFrames === 0;
  }

  private enrich(det: TrackedDetection): EnrichedDetection {
    const enriched: EnrichedDetection = {
      ...det,
      uniqueId: formatUniqueId(det.trackId, det.class)
    };
    if (this.config.metersPerPixel !== undefined) {
      enriched.speedMps = toMetersPerSecond(det.speed, this.config.metersPerPixel);
    }
    return enriched;
  }

  private emptyResult(frameNumber: number, timestamp: number, fps: number): FrameResult {
    return {
      frameNumber,
      timestamp,
      fps,
      processed: false,
      detections: [],
      summary: {}
    };
  }
}
