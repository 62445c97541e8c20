import { RawDetection, TrackingState } from '@/types';
import { createTrackingState, trackReset, trackUpdate } from '../centroid-tracker';

function at(cx: number, cy: number, cls: string = 'person', confidence: number = 0.9): RawDetection {
  return { bbox: [cx - 10, cy - 10, cx + 10, cy + 10], class: cls, confidence };
}

describe('trackUpdate', () => {
  it('should keep the identity of an object that moves a little', () => {
    const frame1 = trackUpdate([at(100, 100)], createTrackingState(), 1 / 30);
    const frame2 = trackUpdate([at(103, 101)], frame1.state, 1 / 30);

    expect(frame1.detections[0].trackId).toBe(1);
    expect(frame2.detections[0].trackId).toBe(1);
    expect(frame2.detections[0].displacement).toEqual({ x: 3, y: 1 });
    expect(frame2.detections[0].speed).toBeCloseTo(Math.sqrt(10) * 30, 6);
  });

  it('should report zero speed for new tracks', () => {
    const { detections } = trackUpdate([at(100, 100)], createTrackingState(), 1 / 30);
    expect(detections[0].speed).toBe(0);
    expect(detections[0].displacement).toEqual({ x: 0, y: 0 });
  });

  it('should report zero speed when the elapsed time is unknown', () => {
    const frame1 = trackUpdate([at(100, 100)], createTrackingState(), 0);
    const frame2 = trackUpdate([at(110, 100)], frame1.state, 0);
    expect(frame2.detections[0].trackId).toBe(1);
    expect(frame2.detections[0].displacement).toEqual({ x: 10, y: 0 });
    expect(frame2.detections[0].speed).toBe(0);
  });

  it('should forget an object after a single empty frame', () => {
    const frame1 = trackUpdate([at(100, 100)], createTrackingState(), 1 / 30);
    const frame2 = trackUpdate([], frame1.state, 1 / 30);
    const frame3 = trackUpdate([at(100, 100)], frame2.state, 1 / 30);

    expect(frame1.detections[0].trackId).toBe(1);
    expect(frame2.state.objects).toEqual([]);
    expect(frame3.detections[0].trackId).toBe(2);
  });

  it('should only match within the same class', () => {
    const frame1 = trackUpdate([at(100, 100, 'person')], createTrackingState(), 1);
    const frame2 = trackUpdate([at(100, 100, 'dog')], frame1.state, 1);
    expect(frame2.detections[0].trackId).toBe(2);
    expect(frame2.state.objects).toEqual([{ trackId: 2, class: 'dog', center: { x: 100, y: 100 } }]);
  });

  it('should accept the nearest same-class object however far away', () => {
    const frame1 = trackUpdate([at(10, 10)], createTrackingState(), 1);
    const frame2 = trackUpdate([at(1000, 800)], frame1.state, 1);
    expect(frame2.detections[0].trackId).toBe(1);
  });

  it('should let earlier detections pick first', () => {
    const frame1 = trackUpdate([at(0, 0), at(100, 0)], createTrackingState(), 1);
    // The first detection claims track 2 (distance 40); the second, although closer to
    // track 2, is left with track 1
    const frame2 = trackUpdate([at(60, 0), at(55, 0)], frame1.state, 1);
    expect(frame2.detections.map(d => d.trackId)).toEqual([2, 1]);
  });

  it('should never hand out the same identity twice in a frame', () => {
    const frame1 = trackUpdate([at(0, 0), at(50, 0), at(100, 0)], createTrackingState(), 1);
    const frame2 = trackUpdate(
      [at(1, 0), at(51, 0), at(101, 0), at(151, 0), at(201, 0)],
      frame1.state,
      1
    );
    const ids = frame2.detections.map(d => d.trackId);
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids).toEqual([1, 2, 3, 4, 5]);
    expect(frame2.state.nextTrackId).toBe(6);
  });

  it('should replace the remembered objects with the current frame', () => {
    const frame1 = trackUpdate([at(0, 0), at(100, 0, 'dog')], createTrackingState(), 1);
    const frame2 = trackUpdate([at(5, 0)], frame1.state, 1);
    expect(frame2.state.objects).toEqual([{ trackId: 1, class: 'person', center: { x: 5, y: 0 } }]);
  });

  it('should not modify the state it was given', () => {
    const state: TrackingState = {
      objects: [{ trackId: 7, class: 'person', center: { x: 0, y: 0 } }],
      nextTrackId: 8
    };
    const snapshot = JSON.parse(JSON.stringify(state));
    trackUpdate([at(3, 4), at(50, 50)], state, 1);
    expect(state).toEqual(snapshot);
  });

  it('should carry the detection fields through', () => {
    const input: RawDetection = { bbox: [0, 0, 20, 20], class: 'cat', classId: 15, confidence: 0.77 };
    const { detections } = trackUpdate([input], createTrackingState(), 1);
    expect(detections[0]).toEqual({
      ...input,
      trackId: 1,
      displacement: { x: 0, y: 0 },
      speed: 0
    });
  });
});

describe('trackReset', () => {
  const state: TrackingState = {
    objects: [{ trackId: 4, class: 'person', center: { x: 100, y: 100 } }],
    nextTrackId: 5
  };

  it('should forget every object and keep counting by default', () => {
    const cleared = trackReset(state);
    expect(cleared).toEqual({ objects: [], nextTrackId: 5 });

    const { detections } = trackUpdate([at(100, 100)], cleared, 1);
    expect(detections[0].trackId).toBe(5);
  });

  it('should restart the counter when asked to', () => {
    expect(trackReset(state, { resetIdentityCounter: true })).toEqual({ objects: [], nextTrackId: 1 });
  });
});
