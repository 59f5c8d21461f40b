import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { ErrorCode } from '../interfaces/response.interface';

export class AudioItemNotFoundException extends NotFoundException {
  constructor(readonly audioItemId: string) {
    super({
      code: ErrorCode.NOT_FOUND,
      message: `音频不存在: ${audioItemId}`,
    });
  }
}

/**
 * 非法状态迁移（包括并发 claim 失败）
 */
export class InvalidTransitionException extends ConflictException {
  constructor(
    readonly audioItemId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super({
      code: ErrorCode.INVALID_TRANSITION,
      message: `不允许的状态迁移: ${from} -> ${to}`,
      details: { id: audioItemId, from, to },
    });
  }
}

export class SegmentValidationException extends BadRequestException {
  constructor(
    readonly reason: string,
    readonly segmentIndex: number | null = null,
  ) {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message: segmentIndex === null ? reason : `片段 #${segmentIndex}: ${reason}`,
      ...(segmentIndex !== null && { details: { index: segmentIndex } }),
    });
  }
}

export class SegmentOutOfRangeException extends BadRequestException {
  constructor(index: number, count: number) {
    super({
      code: ErrorCode.OUT_OF_RANGE,
      message: `片段索引越界: ${index}（共 ${count} 个片段）`,
      details: { index, count },
    });
  }
}

/**
 * 识别引擎失败（不支持的格式/语言、API 错误等）
 */
export class RecognitionError extends Error {
  readonly name = 'RecognitionError';
}

export class RecognitionTimeoutError extends Error {
  readonly name = 'RecognitionTimeoutError';

  constructor(readonly timeoutSeconds: number) {
    super(`Recognition exceeded ${timeoutSeconds}s`);
  }
}

/**
 * 文件存储或持久化 I/O 失败
 */
export class StorageError extends Error {
  readonly name: string = 'StorageError';
}

export class StorageNotFoundError extends StorageError {
  readonly name = 'StorageNotFoundError';

  constructor(readonly storageRef: string) {
    super(`Stored file not found: ${storageRef}`);
  }
}
