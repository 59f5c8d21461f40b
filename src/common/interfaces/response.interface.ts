/**
 * 统一响应格式
 * { data: T | null, error: { code, message, details? } | null }
 */
export interface ApiResponse<T = unknown> {
  data: T | null;
  error: ApiError | null;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * 错误码枚举
 */
export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  STORAGE_ERROR = 'STORAGE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * 分页响应
 */
export interface PaginatedResponse<T> {
  items: T[];
  next_cursor: string | null;
}
