import { IsEnum, IsInt, IsOptional, Matches, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { AudioItemStatus } from '../../../database/entities';

export class ListAudioItemsQueryDto {
  @IsEnum(AudioItemStatus)
  @IsOptional()
  status?: AudioItemStatus;

  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number = 20;

  // 上一页返回的 next_cursor：<created_at>_<id>
  @Matches(/^[^_]+_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i, {
    message: 'cursor must be a next_cursor value from a previous page',
  })
  @IsOptional()
  cursor?: string;
}

export interface AudioItemResponseDto {
  id: string;
  filename: string;
  status: AudioItemStatus;
  language: string;
  model_size: string;
  device: string;
  duration_sec: number | null;
  error: { code: string; message: string } | null;
  retry_after?: number;
  created_at: string;
  updated_at: string;
}

export interface AudioItemListResponseDto {
  items: AudioItemResponseDto[];
  next_cursor: string | null;
}

export interface DeleteAudioItemResponseDto {
  id: string;
  deleted: true;
  file_deleted: boolean;
  warning: { code: string; message: string } | null;
}
