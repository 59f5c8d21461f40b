import { IsIn, IsNumber, IsOptional } from 'class-validator';
import { Type } from 'class-transformer';
import { AudioItemResponseDto } from '../../library/dto/audio-item.dto';
import { SUBTITLE_FORMATS, SubtitleFormat } from '../subtitles';

export class LocateQueryDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Type(() => Number)
  t!: number;
}

export class SubtitleQueryDto {
  @IsIn(SUBTITLE_FORMATS)
  @IsOptional()
  format?: SubtitleFormat = 'srt';
}

export interface SegmentResponseDto {
  index: number;
  start_seconds: number;
  end_seconds: number;
  text: string;
}

export interface TranscriptResponseDto {
  item: AudioItemResponseDto;
  segments: SegmentResponseDto[];
  audio_url: string;
}

export interface LocateResponseDto {
  playhead_seconds: number;
  index: number | null;
}

export interface SeekResponseDto {
  index: number;
  start_seconds: number;
}
