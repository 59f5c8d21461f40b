import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AudioItemsCursor, AudioItemsRepository } from '../../database/repositories';
import {
  AudioItem,
  AudioItemStatus,
  AudioItemStatusPatch,
  FailureReason,
  TranscriptionConfig,
} from '../../database/entities';
import { FileStorage } from '../../providers/storage/file-storage';
import {
  AudioItemNotFoundException,
  InvalidTransitionException,
} from '../../common/exceptions/domain.exceptions';
import { ErrorCode, PaginatedResponse } from '../../common/interfaces/response.interface';
import { AudioItemResponseDto, DeleteAudioItemResponseDto } from './dto/audio-item.dto';

/**
 * 每个目标状态允许的来源状态
 * queued -> processing -> completed | failed，failed 可重新提交回到 processing
 */
const ALLOWED_SOURCES: Record<AudioItemStatus, AudioItemStatus[]> = {
  [AudioItemStatus.QUEUED]: [],
  [AudioItemStatus.PROCESSING]: [AudioItemStatus.QUEUED, AudioItemStatus.FAILED],
  [AudioItemStatus.COMPLETED]: [AudioItemStatus.PROCESSING],
  [AudioItemStatus.FAILED]: [AudioItemStatus.PROCESSING],
};

/**
 * attemptId：只有持有该次 claim 的处理尝试才能落终态
 */
export type StatusUpdate =
  | { status: AudioItemStatus.PROCESSING }
  | { status: AudioItemStatus.COMPLETED; durationSec?: number | null; attemptId?: string }
  | { status: AudioItemStatus.FAILED; reason: FailureReason; message: string; attemptId?: string };

const CURSOR_SEPARATOR = '_';

export function encodeCursor(item: Pick<AudioItem, 'created_at' | 'id'>): string {
  return `${item.created_at}${CURSOR_SEPARATOR}${item.id}`;
}

export function decodeCursor(cursor: string): AudioItemsCursor {
  const at = cursor.lastIndexOf(CURSOR_SEPARATOR);
  const createdAt = cursor.slice(0, at);
  const id = cursor.slice(at + 1);
  if (at <= 0 || !id || Number.isNaN(Date.parse(createdAt))) {
    throw new BadRequestException({ code: ErrorCode.INVALID_INPUT, message: `无效的游标: ${cursor}` });
  }
  return { createdAt, id };
}

export interface CreateAudioItemInput {
  filename: string;
  storageRef: string;
  config: TranscriptionConfig;
}

export interface ListAudioItemsOptions {
  status?: AudioItemStatus;
  limit?: number;
  cursor?: string;
}

@Injectable()
export class LibraryService {
  private readonly logger = new Logger(LibraryService.name);
  private readonly pollInterval: number;

  constructor(
    private readonly audioItemsRepository: AudioItemsRepository,
    private readonly fileStorage: FileStorage,
    private readonly configService: ConfigService,
  ) {
    this.pollInterval = this.configService.get<number>('task.pollIntervalSeconds') || 5;
  }

  /**
   * 创建条目（queued），同时快照转录配置
   */
  async createItem(input: CreateAudioItemInput): Promise<AudioItem> {
    const now = new Date().toISOString();
    const item: AudioItem = {
      id: uuidv4(),
      filename: input.filename,
      storage_ref: input.storageRef,
      language: input.config.language,
      model_size: input.config.modelSize,
      device: input.config.device,
      status: AudioItemStatus.QUEUED,
      error_reason: null,
      error_message: null,
      duration_sec: null,
      attempt_id: null,
      created_at: now,
      updated_at: now,
    };

    const created = await this.audioItemsRepository.insert(item);
    this.logger.log(`Audio item created: ${created.id} (${created.filename})`);
    return created;
  }

  async getItem(id: string): Promise<AudioItem> {
    const item = await this.audioItemsRepository.findById(id);
    if (!item) {
      throw new AudioItemNotFoundException(id);
    }
    return item;
  }

  /**
   * 按创建时间倒序，游标为上一页最后一条的 created_at + id（同一时刻创建的条目不会被跳过）
   */
  async listItems(options: ListAudioItemsOptions = {}): Promise<PaginatedResponse<AudioItem>> {
    const limit = options.limit || 20;
    const rows = await this.audioItemsRepository.list({
      status: options.status,
      cursor: options.cursor ? decodeCursor(options.cursor) : undefined,
      limit: limit + 1,
    });

    const hasMore = rows.length > limit;
    const items = hasMore ? rows.slice(0, limit) : rows;
    const nextCursor = hasMore ? encodeCursor(items[items.length - 1]) : null;

    return { items, next_cursor: nextCursor };
  }

  /**
   * updated_at 早于 since 且仍处于 processing 的条目
   */
  async findItemsStuckSince(since: Date): Promise<AudioItem[]> {
    return this.audioItemsRepository.findStale(AudioItemStatus.PROCESSING, since.toISOString());
  }

  /**
   * 状态迁移（原子条件更新）
   * 迁移到 processing 即 claim：并发调用只有一个成功，其余抛出 InvalidTransitionException
   * 每次 claim 生成新的 attempt_id；带 attemptId 的终态更新在 claim 被取代后不会命中
   */
  async updateStatus(id: string, update: StatusUpdate): Promise<AudioItem> {
    const patch: AudioItemStatusPatch = {
      status: update.status,
      error_reason: null,
      error_message: null,
      updated_at: new Date().toISOString(),
    };

    let attemptId: string | undefined;
    if (update.status === AudioItemStatus.PROCESSING) {
      patch.attempt_id = uuidv4();
    } else {
      attemptId = update.attemptId;
      if (update.status === AudioItemStatus.FAILED) {
        patch.error_reason = update.reason;
        patch.error_message = update.message;
      } else if (update.durationSec !== undefined) {
        patch.duration_sec = update.durationSec;
      }
    }

    const updated = await this.audioItemsRepository.compareAndSetStatus(
      id,
      ALLOWED_SOURCES[update.status],
      patch,
      attemptId,
    );

    if (!updated) {
      const current = await this.getItem(id);
      throw new InvalidTransitionException(id, current.status, update.status);
    }

    this.logger.log(`Audio item ${id} -> ${update.status}`);
    return updated;
  }

  /**
   * 删除条目
   * 片段 + 元数据在一个事务内删除，之后再删文件；
   * 文件删除失败只作为警告返回（元数据已删除，缺失文件可通过重新上传恢复）
   */
  async deleteItem(id: string): Promise<DeleteAudioItemResponseDto> {
    const item = await this.getItem(id);

    const deleted = await this.audioItemsRepository.deleteWithSegments(id);
    if (!deleted) {
      throw new AudioItemNotFoundException(id);
    }
    this.logger.log(`Audio item ${id} and its segments deleted`);

    try {
      await this.fileStorage.delete(item.storage_ref);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`File cleanup failed for ${id} (${item.storage_ref}): ${message}`);
      return {
        id,
        deleted: true,
        file_deleted: false,
        warning: { code: ErrorCode.STORAGE_ERROR, message },
      };
    }

    return { id, deleted: true, file_deleted: true, warning: null };
  }

  /**
   * 格式化条目响应
   */
  formatItem(item: AudioItem): AudioItemResponseDto {
    const response: AudioItemResponseDto = {
      id: item.id,
      filename: item.filename,
      status: item.status,
      language: item.language,
      model_size: item.model_size,
      device: item.device,
      duration_sec: item.duration_sec,
      error:
        item.status === AudioItemStatus.FAILED && item.error_reason
          ? { code: item.error_reason, message: item.error_message ?? item.error_reason }
          : null,
      created_at: item.created_at,
      updated_at: item.updated_at,
    };

    // 进行中的条目提示轮询间隔
    if (item.status === AudioItemStatus.QUEUED || item.status === AudioItemStatus.PROCESSING) {
      response.retry_after = this.pollInterval;
    }

    return response;
  }
}
