import { Injectable, Logger, OnApplicationShutdown, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import {
  AudioItem,
  AudioItemStatus,
  FailureReason,
  SegmentDraft,
  TranscriptionConfig,
} from '../../database/entities';
import { FileStorage } from '../../providers/storage/file-storage';
import { RecognitionEngine, RecognitionResult } from '../../providers/recognition/recognition-engine';
import {
  InvalidTransitionException,
  RecognitionError,
  RecognitionTimeoutError,
  SegmentValidationException,
  StorageError,
} from '../../common/exceptions/domain.exceptions';
import { LibraryService } from '../library/library.service';
import { SegmentsService } from '../segments/segments.service';
import { normalizeRecognitionOutput } from './segment-normalizer';
import { TRANSCRIPTION_QUEUE, TranscriptionJobData } from './constants';

export interface SubmitAudioInput {
  buffer: Buffer;
  filename: string;
  overrides?: Partial<TranscriptionConfig>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 转录编排
 * queued -> processing -> completed | failed，每次尝试必定落到终态
 */
@Injectable()
export class TranscriptionService implements OnApplicationShutdown {
  private readonly logger = new Logger(TranscriptionService.name);
  private readonly inflight = new Set<Promise<void>>();
  private readonly timeoutSeconds: number;
  private readonly minDurationSeconds: number;
  private readonly defaults: TranscriptionConfig;

  constructor(
    private readonly libraryService: LibraryService,
    private readonly segmentsService: SegmentsService,
    private readonly fileStorage: FileStorage,
    private readonly recognitionEngine: RecognitionEngine,
    private readonly configService: ConfigService,
    @Optional() @InjectQueue(TRANSCRIPTION_QUEUE) private readonly queue?: Queue<TranscriptionJobData>,
  ) {
    this.timeoutSeconds = this.configService.get<number>('recognition.timeoutSeconds') || 600;
    this.minDurationSeconds = this.configService.get<number>('recognition.minDurationSeconds') ?? 1;
    this.defaults = {
      language: this.configService.get<string>('transcription.language') || 'ja',
      modelSize: this.configService.get<string>('transcription.modelSize') || 'base',
      device: this.configService.get<string>('transcription.device') || 'cpu',
    };
  }

  /**
   * 上传：保存文件 -> 创建 queued 条目 -> 派发处理
   */
  async submit(input: SubmitAudioInput): Promise<AudioItem> {
    const storageRef = await this.fileStorage.save(input.buffer, input.filename);

    const config: TranscriptionConfig = {
      language: input.overrides?.language || this.defaults.language,
      modelSize: input.overrides?.modelSize || this.defaults.modelSize,
      device: input.overrides?.device || this.defaults.device,
    };

    let item: AudioItem;
    try {
      item = await this.libraryService.createItem({
        filename: input.filename,
        storageRef,
        config,
      });
    } catch (error) {
      // 元数据写入失败，清理刚保存的文件
      await this.fileStorage.delete(storageRef).catch((cleanupError: unknown) => {
        this.logger.warn(`Orphaned file ${storageRef} left behind: ${errorMessage(cleanupError)}`);
      });
      throw error;
    }

    await this.dispatch(item.id);
    return item;
  }

  /**
   * 重新提交：仅 queued / failed 可提交，processing / completed 拒绝
   */
  async resubmit(id: string): Promise<AudioItem> {
    const item = await this.libraryService.getItem(id);
    if (item.status === AudioItemStatus.PROCESSING || item.status === AudioItemStatus.COMPLETED) {
      throw new InvalidTransitionException(id, item.status, AudioItemStatus.PROCESSING);
    }

    await this.dispatch(id);
    return item;
  }

  /**
   * 执行一次处理尝试
   * claim 失败时抛出 InvalidTransitionException，之后的任何失败都记录为 failed
   */
  async process(id: string): Promise<AudioItem> {
    const item = await this.libraryService.updateStatus(id, { status: AudioItemStatus.PROCESSING });
    const attemptId = item.attempt_id ?? undefined;
    this.logger.log(`Processing ${id} (${item.filename}) with ${this.recognitionEngine.name}/${item.model_size}`);

    try {
      const audio = await this.loadAudio(item);
      const result = await this.recognize(item, audio);
      const drafts = normalizeRecognitionOutput(result, this.minDurationSeconds);

      await this.persistSegments(id, drafts);

      // 片段写入成功之后才翻转为 completed
      const completed = await this.libraryService.updateStatus(id, {
        status: AudioItemStatus.COMPLETED,
        durationSec: result.durationSec,
        attemptId,
      });
      this.logger.log(`Audio item ${id} completed with ${drafts.length} segments`);
      return completed;
    } catch (error) {
      return this.fail(id, error, attemptId);
    }
  }

  /**
   * 等待所有进程内处理结束（测试与优雅关闭）
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.inflight.size > 0) {
      this.logger.log(`Waiting for ${this.inflight.size} transcription(s) to finish...`);
      await this.drain();
    }
  }

  /**
   * 有 Redis 时入队，否则在进程内后台执行
   */
  private async dispatch(id: string): Promise<void> {
    if (this.queue) {
      await this.queue.add(
        'transcribe',
        { audio_item_id: id },
        {
          attempts: 1, // 不自动重试，重试需显式重新提交
          removeOnComplete: true,
          removeOnFail: 100,
        },
      );
      this.logger.log(`Audio item ${id} queued`);
      return;
    }

    const run = this.process(id).then(
      () => undefined,
      (error: unknown) => {
        this.logger.error(`Processing of ${id} ended abnormally: ${errorMessage(error)}`);
      },
    );
    this.inflight.add(run);
    void run.finally(() => this.inflight.delete(run));
  }

  private async loadAudio(item: AudioItem): Promise<Buffer> {
    try {
      return await this.fileStorage.load(item.storage_ref);
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to load ${item.storage_ref}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * 调用识别引擎，超时后中止请求并抛出 RecognitionTimeoutError
   * 引擎忽略 signal 时也不会让条目停留在 processing
   */
  private async recognize(item: AudioItem, audio: Buffer): Promise<RecognitionResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new RecognitionTimeoutError(this.timeoutSeconds));
      }, this.timeoutSeconds * 1000);
    });

    try {
      return await Promise.race([
        this.recognitionEngine.transcribe(audio, {
          filename: item.filename,
          language: item.language,
          modelSize: item.model_size,
          device: item.device,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } catch (error) {
      if (controller.signal.aborted) throw new RecognitionTimeoutError(this.timeoutSeconds);
      if (error instanceof RecognitionError) throw error;
      throw new RecognitionError(errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  private async persistSegments(id: string, drafts: SegmentDraft[]): Promise<void> {
    try {
      await this.segmentsService.replaceSegments(id, drafts);
    } catch (error) {
      if (error instanceof SegmentValidationException || error instanceof StorageError) throw error;
      throw new StorageError(`Failed to store segments: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async fail(id: string, error: unknown, attemptId: string | undefined): Promise<AudioItem> {
    const reason = this.classify(error);
    const message =
      reason === FailureReason.TIMEOUT
        ? `识别超时（超过 ${this.timeoutSeconds} 秒），请重试`
        : errorMessage(error);

    this.logger.error(`Audio item ${id} failed (${reason}): ${errorMessage(error)}`);
    return this.libraryService.updateStatus(id, {
      status: AudioItemStatus.FAILED,
      reason,
      message,
      attemptId,
    });
  }

  private classify(error: unknown): FailureReason {
    if (error instanceof RecognitionTimeoutError) return FailureReason.TIMEOUT;
    if (error instanceof RecognitionError) return FailureReason.RECOGNITION_ERROR;
    if (error instanceof SegmentValidationException) return FailureReason.INVALID_SEGMENTS;
    return FailureReason.STORAGE_ERROR;
  }
}
