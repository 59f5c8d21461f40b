/**
 * 音频条目状态
 */
export enum AudioItemStatus {
  QUEUED = 'queued',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * 失败原因（机器可读）
 */
export enum FailureReason {
  RECOGNITION_ERROR = 'recognition_error',
  INVALID_SEGMENTS = 'invalid_segments',
  STORAGE_ERROR = 'storage_error',
  TIMEOUT = 'timeout',
}

/**
 * 转录配置快照，上传时写入，之后配置变更不影响已有条目
 */
export interface TranscriptionConfig {
  language: string;
  modelSize: string;
  device: string;
}

/**
 * 音频条目实体（对应 audio_items 表）
 */
export interface AudioItem {
  id: string; // uuid
  filename: string; // 原始文件名，仅用于展示
  storage_ref: string; // 文件存储句柄
  language: string;
  model_size: string;
  device: string;
  status: AudioItemStatus;
  error_reason: FailureReason | null; // 仅 failed 时非空
  error_message: string | null;
  duration_sec: number | null; // 完成后回填
  attempt_id: string | null; // 最近一次 claim 的处理尝试
  created_at: string;
  updated_at: string;
}

/**
 * 状态更新时可附带的字段
 */
export interface AudioItemStatusPatch {
  status: AudioItemStatus;
  error_reason: FailureReason | null;
  error_message: string | null;
  duration_sec?: number | null;
  attempt_id?: string;
  updated_at: string;
}
