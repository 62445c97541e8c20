import { Point, RawDetection, TrackedDetection, TrackedObject, TrackingState, TrackUpdateResult } from '../../types';
import { boxCenter, squaredDistance } from '../detection/geometry';
import { displacementBetween, pixelSpeed, ZERO_DISPLACEMENT } from './motion';

export interface TrackResetOptions {
  resetIdentityCounter?: boolean;
}

export function createTrackingState(): TrackingState {
  return { objects: [], nextTrackId: 1 };
}

/**
 * Index of the nearest same-class previous object nobody has claimed this frame, or -1.
 * There is no distance gate: the nearest candidate wins however far away it is.
 */
function findNearest(
  center: Point,
  detectionClass: string,
  previous: readonly TrackedObject[],
  claimed: ReadonlySet<number>
): number {
  let bestIndex = -1;
  let bestDistance = Infinity;

  previous.forEach((obj, index) => {
    if (claimed.has(index) || obj.class !== detectionClass) return;

    const distance = squaredDistance(center, obj.center);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestIndex = index;
    }
  });

  return bestIndex;
}

/**
 * Assign a track id to every detection of the current frame.
 *
 * Detections pick their match greedily in input order, so the first-listed detection gets the
 * nearest unclaimed same-class object even when a later one is closer to it. Objects from the
 * previous frame that nobody claims are forgotten: the tracker only remembers one frame.
 *
 * The input state is not modified; the returned state replaces it.
 */
export function trackUpdate(
  detections: readonly RawDetection[],
  state: TrackingState,
  elapsedSeconds: number
): TrackUpdateResult {
  const previous = state.objects;
  const claimed = new Set<number>();
  const tracked: TrackedDetection[] = [];
  const objects: TrackedObject[] = [];
  let nextTrackId = state.nextTrackId;

  for (const det of detections) {
    const center = boxCenter(det.bbox);
    const matchIndex = findNearest(center, det.class, previous, claimed);

    let trackId: number;
    let displacement: Point;
    let speed: number;

    if (matchIndex >= 0) {
      const match = previous[matchIndex];
      claimed.add(matchIndex);
      trackId = match.trackId;
      displacement = displacementBetween(match.center, center);
      speed = pixelSpeed(displacement, elapsedSeconds);
    } else {
      trackId = nextTrackId++;
      displacement = { ...ZERO_DISPLACEMENT };
      speed = 0;
    }

    tracked.push({ ...det, trackId, displacement, speed });
    objects.push({ trackId, class: det.class, center });
  }

  return {
    detections: tracked,
    state: { objects, nextTrackId }
  };
}

/**
 * Forget every tracked object. The id counter keeps counting unless asked to restart.
 */
export function trackReset(state: TrackingState, options: TrackResetOptions = {}): TrackingState {
  return {
    objects: [],
    nextTrackId: options.resetIdentityCounter ? 1 : state.nextTrackId
  };
}
