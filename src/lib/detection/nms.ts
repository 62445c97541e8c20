import { RawDetection } from '../../types';
import { calculateIoU } from './geometry';

/**
 * Group detections by class, keeping the order in which each class is first seen
 */
export function groupByClass<T extends RawDetection>(detections: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();

  for (const det of detections) {
    const group = groups.get(det.class);
    if (group) {
      group.push(det);
    } else {
      groups.set(det.class, [det]);
    }
  }

  return groups;
}

/**
 * Greedy NMS within a single class.
 * A box whose IoU with an already kept box is at or above the threshold is dropped.
 */
export function suppressSingleClass<T extends RawDetection>(
  detections: readonly T[],
  iouThreshold: number
): T[] {
  if (detections.length <= 1) return [...detections];

  let remaining = [...detections].sort((a, b) => b.confidence - a.confidence);
  const keep: T[] = [];

  while (remaining.length > 0) {
    const [current, ...rest] = remaining;
    keep.push(current);
    remaining = rest.filter(det => calculateIoU(current.bbox, det.bbox) < iouThreshold);
  }

  return keep;
}

/**
 * Class-scoped non-maximum suppression. Boxes of different classes never suppress each other;
 * kept boxes are concatenated class by class in first-seen class order.
 */
export function suppress<T extends RawDetection>(detections: readonly T[], iouThreshold: number): T[] {
  if (detections.length === 0) return [];

  const results: T[] = [];
  for (const group of groupByClass(detections).values()) {
    results.push(...suppressSingleClass(group, iouThreshold));
  }

  return results;
}
