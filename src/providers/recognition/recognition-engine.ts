export interface RecognitionOptions {
  filename: string;
  language: string;
  modelSize: string;
  device: string;
  signal: AbortSignal;
}

/**
 * 引擎原始输出
 * segments 保持未类型化（[start, end, text] 元组或 { start, end, text } 对象），
 * 由编排器统一校验和规范化
 */
export interface RecognitionResult {
  segments: unknown[];
  durationSec: number | null;
}

/**
 * 语音识别引擎
 * 失败时抛出 RecognitionError；signal 中止后应尽快结束
 */
export abstract class RecognitionEngine {
  abstract readonly name: string;

  abstract transcribe(audio: Buffer, options: RecognitionOptions): Promise<RecognitionResult>;
}

export function asRecord(value: unknown): Record<string, unknown> | null {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? { ...value }
    : null;
}

export function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
