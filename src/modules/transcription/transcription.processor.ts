import { Processor, WorkerHost, OnWorkerEvent } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { TranscriptionService } from './transcription.service';
import { TRANSCRIPTION_QUEUE, TranscriptionJobData } from './constants';

@Processor(TRANSCRIPTION_QUEUE)
export class TranscriptionProcessor extends WorkerHost {
  private readonly logger = new Logger(TranscriptionProcessor.name);

  constructor(private transcriptionService: TranscriptionService) {
    super();
  }

  async process(job: Job<TranscriptionJobData>): Promise<string> {
    const item = await this.transcriptionService.process(job.data.audio_item_id);
    return item.status;
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<TranscriptionJobData>, error: Error) {
    this.logger.error(`Job ${job.id} (${job.data.audio_item_id}) failed: ${error.message}`);
  }
}
