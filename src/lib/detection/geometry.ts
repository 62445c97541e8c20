import { BBox, Point } from '../../types';

/**
 * Calculate IoU between two boxes in tlbr format
 */
export function calculateIoU(box1: BBox, box2: BBox): number {
  const [x1_1, y1_1, x2_1, y2_1] = box1;
  const [x1_2, y1_2, x2_2, y2_2] = box2;

  const xi1 = Math.max(x1_1, x1_2);
  const yi1 = Math.max(y1_1, y1_2);
  const xi2 = Math.min(x2_1, x2_2);
  const yi2 = Math.min(y2_1, y2_2);

  if (xi2 <= xi1 || yi2 <= yi1) return 0;

  const interArea = (xi2 - xi1) * (yi2 - yi1);
  const box1Area = (x2_1 - x1_1) * (y2_1 - y1_1);
  const box2Area = (x2_2 - x1_2) * (y2_2 - y1_2);
  const unionArea = box1Area + box2Area - interArea;

  return unionArea > 0 ? interArea / unionArea : 0;
}

export function boxCenter(box: BBox): Point {
  return {
    x: (box[0] + box[2]) / 2,
    y: (box[1] + box[3]) / 2
  };
}

export function squaredDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}
