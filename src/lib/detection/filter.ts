import { RawDetection } from '../../types';

/**
 * Keep detections at or above the threshold, highest confidence first, at most `maxCount`.
 * Equal confidences keep their input order.
 */
export function filterByConfidence(
  detections: readonly RawDetection[],
  confidenceThreshold: number,
  maxCount: number
): RawDetection[] {
  const filtered = detections.filter(det => det.confidence >= confidenceThreshold);
  filtered.sort((a, b) => b.confidence - a.confidence);
  return filtered.slice(0, Math.max(0, maxCount));
}

export function filterByClass(
  detections: readonly RawDetection[],
  allowedClasses?: readonly string[]
): RawDetection[] {
  if (!allowedClasses) return [...detections];

  const allowed = new Set(allowedClasses);
  return detections.filter(det => allowed.has(det.class));
}
