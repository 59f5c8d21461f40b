import { Injectable, Logger } from '@nestjs/common';
import { SegmentsRepository } from '../../database/repositories';
import { Segment, SegmentDraft } from '../../database/entities';
import {
  AudioItemNotFoundException,
  SegmentValidationException,
} from '../../common/exceptions/domain.exceptions';

/**
 * 校验一批片段：index 连续、时间合法、start 单调不减
 * 允许相邻片段轻微重叠（end[i] > start[i+1]）
 */
export function validateSegmentDrafts(drafts: readonly SegmentDraft[]): void {
  let previousStart = 0;

  drafts.forEach((draft, position) => {
    if (draft.index !== position) {
      throw new SegmentValidationException(`index 应为 ${position}，实际为 ${draft.index}`, position);
    }
    if (!Number.isFinite(draft.start_seconds) || !Number.isFinite(draft.end_seconds)) {
      throw new SegmentValidationException('时间戳必须是有限数值', position);
    }
    if (draft.start_seconds < 0) {
      throw new SegmentValidationException('start_seconds 不能为负数', position);
    }
    if (draft.end_seconds <= draft.start_seconds) {
      throw new SegmentValidationException('end_seconds 必须大于 start_seconds', position);
    }
    if (typeof draft.text !== 'string') {
      throw new SegmentValidationException('text 必须是字符串', position);
    }
    if (draft.start_seconds < previousStart) {
      throw new SegmentValidationException('start_seconds 必须单调不减', position);
    }
    previousStart = draft.start_seconds;
  });
}

/**
 * 片段存储
 * 只负责片段本身，调用方负责与条目状态保持一致
 */
@Injectable()
export class SegmentsService {
  private readonly logger = new Logger(SegmentsService.name);

  constructor(private readonly segmentsRepository: SegmentsRepository) {}

  /**
   * 校验后整体替换片段（重复执行是覆盖而不是追加）
   */
  async replaceSegments(audioItemId: string, drafts: readonly SegmentDraft[]): Promise<Segment[]> {
    validateSegmentDrafts(drafts);

    const segments: Segment[] = drafts.map((draft) => ({
      audio_item_id: audioItemId,
      index: draft.index,
      start_seconds: draft.start_seconds,
      end_seconds: draft.end_seconds,
      text: draft.text,
    }));

    const replaced = await this.segmentsRepository.replaceAll(audioItemId, segments);
    if (!replaced) {
      throw new AudioItemNotFoundException(audioItemId);
    }

    this.logger.log(`Stored ${segments.length} segments for ${audioItemId}`);
    return segments;
  }

  async getSegments(audioItemId: string): Promise<Segment[]> {
    return this.segmentsRepository.findByAudioItem(audioItemId);
  }

  async deleteSegments(audioItemId: string): Promise<void> {
    await this.segmentsRepository.deleteByAudioItem(audioItemId);
  }
}
