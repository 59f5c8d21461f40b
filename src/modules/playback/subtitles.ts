import { SegmentDraft } from '../../database/entities';

export const SUBTITLE_FORMATS = ['srt', 'vtt'] as const;
export type SubtitleFormat = (typeof SUBTITLE_FORMATS)[number];

export const SUBTITLE_CONTENT_TYPES: Record<SubtitleFormat, string> = {
  srt: 'application/x-subrip; charset=utf-8',
  vtt: 'text/vtt; charset=utf-8',
};

type SubtitleCue = Pick<SegmentDraft, 'start_seconds' | 'end_seconds' | 'text'>;

/** 秒 -> HH:MM:SS{sep}mmm，按毫秒四舍五入 */
export function formatCueTime(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const h = Math.floor(totalMs / 3_600_000);
  const m = Math.floor((totalMs % 3_600_000) / 60_000);
  const s = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}${separator}${String(ms).padStart(3, '0')}`;
}

/**
 * 生成 SRT 格式字幕
 */
export function renderSrt(cues: readonly SubtitleCue[]): string {
  return cues
    .map((cue, i) => {
      const start = formatCueTime(cue.start_seconds, ',');
      const end = formatCueTime(cue.end_seconds, ',');
      return `${i + 1}\n${start} --> ${end}\n${cue.text}\n`;
    })
    .join('\n');
}

/**
 * 生成 VTT 格式字幕
 */
export function renderVtt(cues: readonly SubtitleCue[]): string {
  const body = cues
    .map((cue) => {
      const start = formatCueTime(cue.start_seconds, '.');
      const end = formatCueTime(cue.end_seconds, '.');
      return `${start} --> ${end}\n${cue.text}\n`;
    })
    .join('\n');
  return `WEBVTT\n\n${body}`;
}

export function renderSubtitles(cues: readonly SubtitleCue[], format: SubtitleFormat): string {
  return format === 'vtt' ? renderVtt(cues) : renderSrt(cues);
}
