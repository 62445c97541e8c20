import { Point } from '../../types';

export const ZERO_DISPLACEMENT: Readonly<Point> = Object.freeze({ x: 0, y: 0 });

export function displacementBetween(from: Point, to: Point): Point {
  return { x: to.x - from.x, y: to.y - from.y };
}

/**
 * Pixel speed for one step. Returns 0 when the interval is unknown or not positive.
 */
export function pixelSpeed(displacement: Point, elapsedSeconds: number): number {
  if (!(elapsedSeconds > 0)) return 0;
  return Math.hypot(displacement.x, displacement.y) / elapsedSeconds;
}

/**
 * Seconds between two processed frames at the given frame rate, 0 if the rate is unknown.
 */
export function elapsedFromFps(fps: number, framesPerStep: number = 1): number {
  if (!(fps > 0)) return 0;
  return framesPerStep / fps;
}

// Unit conversion stays outside the tracker: it only ever reports pixels.
export function toMetersPerSecond(speedPxPerSecond: number, metersPerPixel: number): number {
  return speedPxPerSecond * metersPerPixel;
}
