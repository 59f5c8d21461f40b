import { Module } from '@nestjs/common';
import { PlaybackService } from './playback.service';
import { PlaybackController } from './playback.controller';
import { LibraryModule } from '../library/library.module';
import { SegmentsModule } from '../segments/segments.module';

@Module({
  imports: [LibraryModule, SegmentsModule],
  controllers: [PlaybackController],
  providers: [PlaybackService],
  exports: [PlaybackService],
})
export class PlaybackModule {}
