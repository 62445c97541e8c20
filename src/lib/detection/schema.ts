import { z } from 'zod';
import { RawDetection } from '../../types';
import { createLogger } from '../logger';

const logger = createLogger('detection');

const coordinate = z.number().finite();

export const DetectionSchema: z.ZodType<RawDetection> = z
  .object({
    bbox: z.tuple([coordinate, coordinate, coordinate, coordinate]),
    class: z.string().min(1),
    confidence: z.number().min(0).max(1),
    classId: z.number().int().nonnegative().optional()
  })
  .refine(det => det.bbox[0] < det.bbox[2] && det.bbox[1] < det.bbox[3], {
    message: 'bbox must satisfy x1 < x2 and y1 < y2',
    path: ['bbox']
  });

/**
 * Drop every entry that is not a well-formed detection.
 * A single bad detection never fails the frame.
 */
export function validateDetections(detections: readonly unknown[]): RawDetection[] {
  const valid: RawDetection[] = [];
  let dropped = 0;

  for (const candidate of detections) {
    const result = DetectionSchema.safeParse(candidate);
    if (result.success) {
      valid.push(result.data);
    } else {
      dropped++;
      logger.debug('Rejected detection:', result.error.issues.map(issue => issue.message).join('; '));
    }
  }

  if (dropped > 0) {
    logger.warn(`Dropped ${dropped} malformed detection(s)`);
  }

  return valid;
}
