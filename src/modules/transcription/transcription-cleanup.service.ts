import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AudioItem, AudioItemStatus, FailureReason } from '../../database/entities';
import {
  AudioItemNotFoundException,
  InvalidTransitionException,
} from '../../common/exceptions/domain.exceptions';
import { LibraryService } from '../library/library.service';

// 识别超时之外留给读取文件和写入片段的时间
const RECOGNITION_MARGIN_MINUTES = 5;

/**
 * 卡住条目清理
 * worker 中途退出时，processing 状态的条目由这里标记为 failed(timeout)
 */
@Injectable()
export class TranscriptionCleanupService implements OnModuleInit {
  private readonly logger = new Logger(TranscriptionCleanupService.name);
  private readonly stuckTimeoutMinutes: number;

  constructor(
    private readonly libraryService: LibraryService,
    private readonly configService: ConfigService,
  ) {
    const configuredMinutes = this.configService.get<number>('task.stuckTimeoutMinutes') || 15;
    const recognitionTimeoutSeconds = this.configService.get<number>('recognition.timeoutSeconds') || 600;

    // 不能早于识别超时触发，否则仍在运行的尝试会被判为卡住
    const minimumMinutes = Math.ceil(recognitionTimeoutSeconds / 60) + RECOGNITION_MARGIN_MINUTES;
    this.stuckTimeoutMinutes = Math.max(configuredMinutes, minimumMinutes);
    if (this.stuckTimeoutMinutes > configuredMinutes) {
      this.logger.warn(
        `task.stuckTimeoutMinutes=${configuredMinutes} is shorter than the recognition timeout, using ${this.stuckTimeoutMinutes}`,
      );
    }
  }

  /**
   * 应用启动时执行一次清理
   */
  async onModuleInit() {
    this.logger.log('Running initial stuck item cleanup...');
    await this.failStuckItems();
  }

  @Cron(CronExpression.EVERY_MINUTE)
  async handleCron() {
    await this.failStuckItems();
  }

  /**
   * 将超过 stuckTimeoutMinutes 仍处于 processing 的条目标记为失败
   * 返回实际标记的数量
   */
  async failStuckItems(now: Date = new Date()): Promise<number> {
    const threshold = new Date(now.getTime() - this.stuckTimeoutMinutes * 60 * 1000);

    let stuckItems: AudioItem[];
    try {
      stuckItems = await this.libraryService.findItemsStuckSince(threshold);
    } catch (error) {
      this.logger.error(`Failed to query stuck items: ${error instanceof Error ? error.message : error}`);
      return 0;
    }

    if (stuckItems.length === 0) {
      this.logger.debug('No stuck items found');
      return 0;
    }

    this.logger.warn(`Found ${stuckItems.length} stuck items, marking as failed...`);

    let failed = 0;
    for (const item of stuckItems) {
      try {
        await this.libraryService.updateStatus(item.id, {
          status: AudioItemStatus.FAILED,
          reason: FailureReason.TIMEOUT,
          message: `处理超时（超过 ${this.stuckTimeoutMinutes} 分钟），请重试`,
        });
        failed += 1;
      } catch (error) {
        // 期间已完成或已删除
        if (error instanceof InvalidTransitionException || error instanceof AudioItemNotFoundException) {
          this.logger.debug(`Item ${item.id} settled before cleanup`);
          continue;
        }
        this.logger.error(`Failed to mark ${item.id} as failed: ${error instanceof Error ? error.message : error}`);
      }
    }

    this.logger.log(`Marked ${failed} stuck items as failed`);
    return failed;
  }
}
