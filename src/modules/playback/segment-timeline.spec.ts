import { SegmentTimeline } from './segment-timeline';

const seg = (start_seconds: number, end_seconds: number) => ({ start_seconds, end_seconds });

describe('SegmentTimeline', () => {
  // ── contiguous segments ──

  describe('contiguous segments', () => {
    const timeline = new SegmentTimeline([seg(0, 4.5), seg(4.5, 9.8)]);

    test('highlights the segment containing the playhead', () => {
      expect(timeline.locate(0)).toBe(0);
      expect(timeline.locate(4.49)).toBe(0);
      expect(timeline.locate(5.0)).toBe(1);
    });

    test('treats the end boundary as exclusive', () => {
      expect(timeline.locate(4.5)).toBe(1);
    });

    test('keeps the last segment after the end of speech', () => {
      expect(timeline.locate(9.8)).toBe(1);
      expect(timeline.locate(120)).toBe(1);
    });

    test('returns null before the first segment', () => {
      expect(timeline.locate(-0.1)).toBeNull();
    });

    test('returns null for NaN', () => {
      expect(timeline.locate(Number.NaN)).toBeNull();
    });
  });

  // ── gaps ──

  test('holds the previous segment inside a gap', () => {
    const timeline = new SegmentTimeline([seg(1, 2), seg(5, 7)]);
    expect(timeline.locate(0.5)).toBeNull();
    expect(timeline.locate(3)).toBe(0);
    expect(timeline.locate(5)).toBe(1);
  });

  // ── overlaps ──

  test('prefers the earlier segment when segments overlap', () => {
    const timeline = new SegmentTimeline([seg(0, 5), seg(4, 8)]);
    expect(timeline.locate(3.9)).toBe(0);
    expect(timeline.locate(4.5)).toBe(0);
    expect(timeline.locate(5)).toBe(1);
    expect(timeline.locate(6)).toBe(1);
  });

  test('handles a long segment spanning later ones', () => {
    const timeline = new SegmentTimeline([seg(0, 10), seg(2, 3), seg(4, 12)]);
    expect(timeline.locate(2.5)).toBe(0);
    expect(timeline.locate(9.9)).toBe(0);
    expect(timeline.locate(10)).toBe(2);
  });

  test('never moves backwards as the playhead advances', () => {
    const timeline = new SegmentTimeline([
      seg(0.5, 2),
      seg(1.5, 3),
      seg(3, 3.2),
      seg(6, 9),
      seg(6, 7),
      seg(8.5, 11),
      seg(14, 15),
    ]);

    let previous = -1;
    for (let tenths = 0; tenths <= 200; tenths += 1) {
      const index = timeline.locate(tenths / 10);
      const current = index ?? -1;
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });

  test('returns null for an empty transcript', () => {
    const timeline = new SegmentTimeline([]);
    expect(timeline.length).toBe(0);
    expect(timeline.locate(3)).toBeNull();
  });
});
