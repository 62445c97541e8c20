import { DetectionReport, EnrichedDetection, RawDetection } from '../../types';

/** `ID-3-P` for track 3 of class "person". */
export function formatUniqueId(trackId: number, className: string): string {
  const initial = className.charAt(0).toUpperCase();
  return `ID-${trackId}-${initial}`;
}

/**
 * Count detections per class, in the order classes first appear
 */
export function summarizeDetections(detections: readonly RawDetection[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const det of detections) {
    counts.set(det.class, (counts.get(det.class) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

export function formatDetections(detections: readonly EnrichedDetection[]): DetectionReport {
  return {
    totalDetections: detections.length,
    detections: detections.map(det => ({
      id: det.uniqueId,
      class: det.class,
      confidence: Math.round(det.confidence * 1000) / 1000,
      bbox: det.bbox,
      trackId: det.trackId
    }))
  };
}

export function getActiveIds(detections: readonly EnrichedDetection[]): string[] {
  return Array.from(new Set(detections.map(det => det.uniqueId))).sort();
}
