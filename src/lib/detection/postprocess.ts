import { ProcessingOptions, RawDetection } from '../../types';
import { filterByClass, filterByConfidence } from './filter';
import { suppress } from './nms';
import { validateDetections } from './schema';

/**
 * Full processing pipeline:
 * 1. Drop malformed detections
 * 2. Drop classes outside the allowlist, if one is given
 * 3. Filter by confidence and cap the count
 * 4. Apply per-class NMS
 *
 * The cap runs before NMS, so the result can hold fewer than `maxDetections` entries.
 */
export function processDetections(
  rawDetections: readonly unknown[],
  options: ProcessingOptions
): RawDetection[] {
  if (rawDetections.length === 0) return [];

  const valid = validateDetections(rawDetections);
  const allowed = filterByClass(valid, options.allowedClasses);
  const filtered = filterByConfidence(allowed, options.confidenceThreshold, options.maxDetections);

  return suppress(filtered, options.iouThreshold);
}
