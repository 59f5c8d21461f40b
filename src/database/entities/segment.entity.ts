/**
 * 待写入的片段
 */
export interface SegmentDraft {
  index: number; // 从 0 开始，按识别返回顺序
  start_seconds: number;
  end_seconds: number;
  text: string;
}

/**
 * 转录片段实体（对应 segments 表，主键 (audio_item_id, index)）
 */
export interface Segment extends SegmentDraft {
  audio_item_id: string;
}
