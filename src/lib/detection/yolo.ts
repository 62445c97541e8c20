import * as tf from '@tensorflow/tfjs';
import { DetectionSource, RawDetection } from '../../types';
import { createLogger } from '../logger';
import { decodeYoloOutput } from './yolo-decoder';

const logger = createLogger('yolo');

/** The part of `tf.GraphModel` the detector relies on. */
export interface PredictionModel {
  predict(inputs: tf.Tensor): tf.Tensor | tf.Tensor[] | tf.NamedTensorMap;
  dispose(): void;
}

export interface YoloDetectorOptions {
  /** URL of a TensorFlow.js graph model (`model.json`). */
  modelUrl?: string;
  /** Already loaded model; `modelUrl` is ignored when set. */
  model?: PredictionModel;
  inputSize?: number;
  classNames?: readonly string[];
  minScore?: number;
  backend?: string;
}

/**
 * YOLOv8 detector over TensorFlow.js. Frames are `[height, width, 3]` RGB tensors.
 */
export class YoloDetector implements DetectionSource<tf.Tensor3D> {
  private model: PredictionModel | null;
  private modelUrl?: string;
  private inputSize: number;
  private classNames?: readonly string[];
  private minScore?: number;
  private backend: string;

  constructor(options: YoloDetectorOptions = {}) {
    this.model = options.model ?? null;
    this.modelUrl = options.modelUrl;
    this.inputSize = options.inputSize ?? 640;
    this.classNames = options.classNames;
    this.minScore = options.minScore;
    this.backend = options.backend ?? 'cpu';
  }

  async initialize(): Promise<void> {
    await tf.setBackend(this.backend);
    await tf.ready();

    if (!this.model) {
      if (!this.modelUrl) {
        throw new Error('No model URL configured');
      }
      logger.info(`Loading model from ${this.modelUrl}`);
      this.model = await tf.loadGraphModel(this.modelUrl);
    }

    // Warm up the model
    const dummyInput = tf.zeros([1, this.inputSize, this.inputSize, 3]);
    const output = this.model.predict(dummyInput);
    tf.dispose(output);
    dummyInput.dispose();
  }

  isInitialized(): boolean {
    return this.model !== null;
  }

  async detect(frame: tf.Tensor3D): Promise<RawDetection[]> {
    if (!this.model) {
      throw new Error('Model not initialized');
    }

    const [frameHeight, frameWidth] = frame.shape;
    const input = this.preprocess(frame);
    const output = this.model.predict(input);

    try {
      if (!(output instanceof tf.Tensor)) {
        throw new Error('Unexpected model output: expected a single tensor');
      }
      return await decodeYoloOutput(output, {
        inputSize: this.inputSize,
        frameWidth,
        frameHeight,
        classNames: this.classNames,
        minScore: this.minScore
      });
    } finally {
      input.dispose();
      tf.dispose(output);
    }
  }

  private preprocess(frame: tf.Tensor3D): tf.Tensor {
    return tf.tidy(() =>
      // Resize to model input size, normalize to [0, 1], add batch dimension
      tf.image.resizeBilinear(frame, [this.inputSize, this.inputSize]).div(255).expandDims(0)
    );
  }

  dispose(): void {
    if (this.model) {
      this.model.dispose();
      this.model = null;
    }
  }
}
