/**
 * 片段时间轴
 * 播放位置 -> 片段索引，API 与播放端共用；每份转录建一次，每个播放 tick 调用 locate
 */

export interface TimedSegment {
  start_seconds: number;
  end_seconds: number;
}

export class SegmentTimeline {
  private readonly starts: number[];
  /** maxEnds[i] = max(end_seconds[0..i]) */
  private readonly maxEnds: number[];

  constructor(segments: readonly TimedSegment[]) {
    this.starts = segments.map((s) => s.start_seconds);
    this.maxEnds = [];
    let maxEnd = -Infinity;
    for (const segment of segments) {
      maxEnd = Math.max(maxEnd, segment.end_seconds);
      this.maxEnds.push(maxEnd);
    }
  }

  get length(): number {
    return this.starts.length;
  }

  /**
   * 播放位置对应的高亮片段，第一个片段之前返回 null
   * - 落在某片段 [start, end) 内：该片段（重叠时取较早的索引）
   * - 落在间隙或结尾之后：最后一个 start <= playhead 的片段
   * 单调：播放位置后移时索引不会变小
   */
  locate(playheadSeconds: number): number | null {
    if (Number.isNaN(playheadSeconds)) return null;

    const last = this.lastStartingAtOrBefore(playheadSeconds);
    if (last < 0) return null;

    // 没有任何片段覆盖 playhead
    if (this.maxEnds[last] <= playheadSeconds) return last;

    // 第一个 maxEnd 越过 playhead 的位置就是最早覆盖它的片段
    let lo = 0;
    let hi = last;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.maxEnds[mid] > playheadSeconds) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return lo;
  }

  private lastStartingAtOrBefore(playheadSeconds: number): number {
    let lo = 0;
    let hi = this.starts.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.starts[mid] <= playheadSeconds) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo - 1;
  }
}
