import { Segment } from '../entities';

/**
 * segments 表访问
 */
export abstract class SegmentsRepository {
  /**
   * 原子替换某条目的全部片段
   * 所属条目不存在时返回 false，且不写入任何片段
   */
  abstract replaceAll(audioItemId: string, segments: Segment[]): Promise<boolean>;

  /** 按 index 升序 */
  abstract findByAudioItem(audioItemId: string): Promise<Segment[]>;

  abstract deleteByAudioItem(audioItemId: string): Promise<void>;
}
