import { Controller, Delete, Get, Param, ParseUUIDPipe, Query } from '@nestjs/common';
import { LibraryService } from './library.service';
import {
  AudioItemListResponseDto,
  AudioItemResponseDto,
  DeleteAudioItemResponseDto,
  ListAudioItemsQueryDto,
} from './dto/audio-item.dto';

@Controller('audio-items')
export class LibraryController {
  constructor(private readonly libraryService: LibraryService) {}

  /**
   * GET /api/audio-items
   * 音频列表（最新在前）
   */
  @Get()
  async listItems(@Query() query: ListAudioItemsQueryDto): Promise<AudioItemListResponseDto> {
    const page = await this.libraryService.listItems(query);
    return {
      items: page.items.map((item) => this.libraryService.formatItem(item)),
      next_cursor: page.next_cursor,
    };
  }

  /**
   * GET /api/audio-items/:id
   * 条目状态
   */
  @Get(':id')
  async getItem(@Param('id', ParseUUIDPipe) id: string): Promise<AudioItemResponseDto> {
    return this.libraryService.formatItem(await this.libraryService.getItem(id));
  }

  /**
   * DELETE /api/audio-items/:id
   */
  @Delete(':id')
  async deleteItem(@Param('id', ParseUUIDPipe) id: string): Promise<DeleteAudioItemResponseDto> {
    return this.libraryService.deleteItem(id);
  }
}
