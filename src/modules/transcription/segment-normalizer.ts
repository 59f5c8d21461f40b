import { SegmentDraft } from '../../database/entities';
import { RecognitionResult, asNumber, asRecord } from '../../providers/recognition/recognition-engine';
import { SegmentValidationException } from '../../common/exceptions/domain.exceptions';
import { validateSegmentDrafts } from '../segments/segments.service';

/**
 * 兼容 [start, end, text] 元组与 { start, end, text } 对象
 */
function readFields(raw: unknown): [unknown, unknown, unknown] | null {
  if (Array.isArray(raw)) {
    return raw.length >= 3 ? [raw[0], raw[1], raw[2]] : null;
  }
  const record = asRecord(raw);
  return record ? [record.start, record.end, record.text] : null;
}

function toDraft(raw: unknown, index: number): SegmentDraft {
  const fields = readFields(raw);
  if (!fields) {
    throw new SegmentValidationException('无法识别的片段格式', index);
  }

  const start = asNumber(fields[0]);
  const end = asNumber(fields[1]);
  if (start === null || end === null) {
    throw new SegmentValidationException('时间戳必须是有限数值', index);
  }
  if (typeof fields[2] !== 'string') {
    throw new SegmentValidationException('text 必须是字符串', index);
  }

  const clampedStart = Math.max(0, start);
  if (end <= clampedStart) {
    throw new SegmentValidationException('end_seconds 必须大于 start_seconds', index);
  }

  return {
    index,
    start_seconds: clampedStart,
    end_seconds: end,
    text: fields[2].trim(),
  };
}

/**
 * 将引擎原始输出规范化为片段草稿（index 按返回顺序从 0 开始）
 * 音频时长超过 minDurationSeconds（或时长未知）却没有任何片段时视为无效结果
 */
export function normalizeRecognitionOutput(
  result: RecognitionResult,
  minDurationSeconds: number,
): SegmentDraft[] {
  const drafts = result.segments.map((raw, index) => toDraft(raw, index));

  if (drafts.length === 0 && (result.durationSec === null || result.durationSec > minDurationSeconds)) {
    throw new SegmentValidationException('识别结果为空');
  }

  validateSegmentDrafts(drafts);
  return drafts;
}
