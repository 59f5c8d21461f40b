import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Query,
  Res,
  StreamableFile,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { LibraryService } from '../library/library.service';
import { PlaybackService } from './playback.service';
import { SUBTITLE_CONTENT_TYPES } from './subtitles';
import {
  LocateQueryDto,
  LocateResponseDto,
  SeekResponseDto,
  SubtitleQueryDto,
  TranscriptResponseDto,
} from './dto/playback.dto';

@Controller('audio-items')
export class PlaybackController {
  constructor(
    private readonly playbackService: PlaybackService,
    private readonly libraryService: LibraryService,
  ) {}

  /**
   * GET /api/audio-items/:id/transcript
   * 条目 + 片段 + 音频地址
   */
  @Get(':id/transcript')
  async getTranscript(@Param('id', ParseUUIDPipe) id: string): Promise<TranscriptResponseDto> {
    const { item, segments } = await this.playbackService.fetchTranscript(id);
    return {
      item: this.libraryService.formatItem(item),
      segments: segments.map((segment) => ({
        index: segment.index,
        start_seconds: segment.start_seconds,
        end_seconds: segment.end_seconds,
        text: segment.text,
      })),
      audio_url: `/api/audio-items/${id}/file`,
    };
  }

  /**
   * GET /api/audio-items/:id/locate?t=12.5
   */
  @Get(':id/locate')
  async locate(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: LocateQueryDto,
  ): Promise<LocateResponseDto> {
    const index = await this.playbackService.locateSegmentAt(id, query.t);
    return { playhead_seconds: query.t, index };
  }

  /**
   * GET /api/audio-items/:id/segments/:index/seek
   */
  @Get(':id/segments/:index/seek')
  async seek(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('index', ParseIntPipe) index: number,
  ): Promise<SeekResponseDto> {
    const startSeconds = await this.playbackService.seekTargetForSegment(id, index);
    return { index, start_seconds: startSeconds };
  }

  /**
   * GET /api/audio-items/:id/subtitles?format=srt|vtt
   */
  @Get(':id/subtitles')
  async getSubtitles(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: SubtitleQueryDto,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<string> {
    const format = query.format ?? 'srt';
    const body = await this.playbackService.exportSubtitles(id, format);
    reply.header('Content-Type', SUBTITLE_CONTENT_TYPES[format]);
    return body;
  }

  /**
   * GET /api/audio-items/:id/file
   * 原始音频
   */
  @Get(':id/file')
  async getFile(@Param('id', ParseUUIDPipe) id: string): Promise<StreamableFile> {
    const audio = await this.playbackService.openAudio(id);
    return new StreamableFile(audio.buffer, {
      type: audio.contentType,
      disposition: `inline; filename="${encodeURIComponent(audio.filename)}"`,
      length: audio.buffer.length,
    });
  }
}
