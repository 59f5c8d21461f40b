import { Injectable } from '@nestjs/common';
import { AudioItem, AudioItemStatus, Segment } from '../../database/entities';
import { contentTypeFor, FileStorage } from '../../providers/storage/file-storage';
import {
  InvalidTransitionException,
  SegmentOutOfRangeException,
} from '../../common/exceptions/domain.exceptions';
import { LibraryService } from '../library/library.service';
import { SegmentsService } from '../segments/segments.service';
import { SegmentTimeline } from './segment-timeline';
import { renderSubtitles, SubtitleFormat } from './subtitles';

export interface Transcript {
  item: AudioItem;
  segments: Segment[];
}

export interface StoredAudio {
  buffer: Buffer;
  contentType: string;
  filename: string;
}

/**
 * 播放同步
 * 只有 completed 的条目会返回片段，其余状态一律视为空列表
 */
@Injectable()
export class PlaybackService {
  constructor(
    private readonly libraryService: LibraryService,
    private readonly segmentsService: SegmentsService,
    private readonly fileStorage: FileStorage,
  ) {}

  async fetchTranscript(audioItemId: string): Promise<Transcript> {
    const item = await this.libraryService.getItem(audioItemId);
    const segments =
      item.status === AudioItemStatus.COMPLETED
        ? await this.segmentsService.getSegments(audioItemId)
        : [];
    return { item, segments };
  }

  async locateSegmentAt(audioItemId: string, playheadSeconds: number): Promise<number | null> {
    const { segments } = await this.fetchTranscript(audioItemId);
    return new SegmentTimeline(segments).locate(playheadSeconds);
  }

  /**
   * 点击片段时的跳转位置（片段开始时间）
   */
  async seekTargetForSegment(audioItemId: string, index: number): Promise<number> {
    const { segments } = await this.fetchTranscript(audioItemId);
    if (!Number.isInteger(index) || index < 0 || index >= segments.length) {
      throw new SegmentOutOfRangeException(index, segments.length);
    }
    return segments[index].start_seconds;
  }

  async exportSubtitles(audioItemId: string, format: SubtitleFormat): Promise<string> {
    const { item, segments } = await this.fetchTranscript(audioItemId);
    if (item.status !== AudioItemStatus.COMPLETED) {
      throw new InvalidTransitionException(audioItemId, item.status, AudioItemStatus.COMPLETED);
    }
    return renderSubtitles(segments, format);
  }

  async openAudio(audioItemId: string): Promise<StoredAudio> {
    const item = await this.libraryService.getItem(audioItemId);
    const buffer = await this.fileStorage.load(item.storage_ref);
    return {
      buffer,
      contentType: contentTypeFor(item.filename),
      filename: item.filename,
    };
  }
}
