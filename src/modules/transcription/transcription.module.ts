import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { LibraryModule } from '../library/library.module';
import { SegmentsModule } from '../segments/segments.module';
import { TranscriptionController } from './transcription.controller';
import { TranscriptionService } from './transcription.service';
import { TranscriptionProcessor } from './transcription.processor';
import { TranscriptionCleanupService } from './transcription-cleanup.service';
import { TRANSCRIPTION_QUEUE } from './constants';

const redisEnabled = process.env.REDIS_ENABLED === 'true';

@Module({
  imports: [
    ...(redisEnabled
      ? [
          BullModule.registerQueue({
            name: TRANSCRIPTION_QUEUE,
          }),
        ]
      : []),
    LibraryModule,
    SegmentsModule,
  ],
  controllers: [TranscriptionController],
  providers: [
    TranscriptionService,
    TranscriptionCleanupService,
    ...(redisEnabled ? [TranscriptionProcessor] : []),
  ],
  exports: [TranscriptionService],
})
export class TranscriptionModule {}
