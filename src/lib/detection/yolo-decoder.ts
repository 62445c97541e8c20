import * as tf from '@tensorflow/tfjs';
import { RawDetection } from '../../types';
import cocoClasses from './coco-classes.json';

export const COCO_CLASSES: readonly string[] = cocoClasses;

export interface YoloDecodeOptions {
  /** Side of the square model input, in pixels. */
  inputSize: number;
  frameWidth: number;
  frameHeight: number;
  classNames?: readonly string[];
  minScore?: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Decode a YOLOv8 head into raw detections in frame pixels.
 *
 * YOLOv8 outputs can be in different formats: [1, 4 + C, N] (the export default) or
 * [1, N, 4 + C]. Each candidate is (cx, cy, w, h) in model input pixels followed by C class
 * scores. No thresholding or NMS beyond `minScore` happens here.
 */
export async function decodeYoloOutput(
  predictions: tf.Tensor,
  options: YoloDecodeOptions
): Promise<RawDetection[]> {
  const classNames = options.classNames ?? COCO_CLASSES;
  const minScore = options.minScore ?? 0.01;
  const numClasses = classNames.length;
  const stride = 4 + numClasses;

  if (predictions.rank !== 3 || predictions.shape[0] !== 1) {
    throw new Error(`Unexpected YOLO output shape [${predictions.shape.join(', ')}]`);
  }

  const [, dim1, dim2] = predictions.shape;
  let data: ArrayLike<number>;
  let numBoxes: number;

  if (dim1 === stride) {
    // Format: [1, 4 + C, N] - need to transpose
    const transposed = tf.transpose(predictions, [0, 2, 1]);
    data = await transposed.data();
    transposed.dispose();
    numBoxes = dim2;
  } else if (dim2 === stride) {
    data = await predictions.data();
    numBoxes = dim1;
  } else {
    throw new Error(
      `YOLO output shape [${predictions.shape.join(', ')}] does not match ${numClasses} classes`
    );
  }

  const scaleX = options.frameWidth / options.inputSize;
  const scaleY = options.frameHeight / options.inputSize;
  const detections: RawDetection[] = [];

  for (let i = 0; i < numBoxes; i++) {
    const offset = i * stride;
    const cx = data[offset];
    const cy = data[offset + 1];
    const w = data[offset + 2];
    const h = data[offset + 3];

    // Find best class
    let maxScore = -Infinity;
    let maxClassIdx = -1;
    for (let c = 0; c < numClasses; c++) {
      const score = data[offset + 4 + c];
      if (score > maxScore) {
        maxScore = score;
        maxClassIdx = c;
      }
    }

    if (maxClassIdx < 0 || maxScore < minScore) continue;

    const x1 = clamp(Math.trunc((cx - w / 2) * scaleX), 0, options.frameWidth);
    const y1 = clamp(Math.trunc((cy - h / 2) * scaleY), 0, options.frameHeight);
    const x2 = clamp(Math.trunc((cx + w / 2) * scaleX), 0, options.frameWidth);
    const y2 = clamp(Math.trunc((cy + h / 2) * scaleY), 0, options.frameHeight);

    detections.push({
      bbox: [x1, y1, x2, y2],
      class: classNames[maxClassIdx],
      classId: maxClassIdx,
      confidence: maxScore
    });
  }

  return detections;
}
