import { Logger } from '@nestjs/common';
import OpenAI, { toFile } from 'openai';
import { RecognitionError } from '../../common/exceptions/domain.exceptions';
import { contentTypeFor } from '../storage/file-storage';
import {
  RecognitionEngine,
  RecognitionOptions,
  RecognitionResult,
  asNumber,
  asRecord,
} from './recognition-engine';

// 官方 API 可用的转录模型
const HOSTED_MODELS = ['whisper-1'];

export interface OpenAIRecognitionOptions {
  apiKey?: string;
  /** 自建的 OpenAI 兼容 Whisper 服务 */
  baseUrl?: string;
}

/**
 * OpenAI 兼容的 Whisper 转录（verbose_json 返回带时间戳的 segments）
 */
export class OpenAIRecognitionEngine extends RecognitionEngine {
  readonly name = 'openai';
  private readonly logger = new Logger(OpenAIRecognitionEngine.name);
  private readonly client: OpenAI | null;
  private readonly selfHosted: boolean;

  constructor(options: OpenAIRecognitionOptions) {
    super();
    this.selfHosted = Boolean(options.baseUrl);

    // 自建服务通常不校验 key
    const apiKey = options.apiKey || (this.selfHosted ? 'self-hosted' : undefined);
    if (apiKey) {
      this.client = new OpenAI({ apiKey, baseURL: options.baseUrl || undefined });
      this.logger.log(`OpenAI recognition initialized${this.selfHosted ? ` (${options.baseUrl})` : ''}`);
    } else {
      this.client = null;
      this.logger.warn('OPENAI_API_KEY not configured, transcription will fail');
    }
  }

  async transcribe(audio: Buffer, options: RecognitionOptions): Promise<RecognitionResult> {
    if (!this.client) {
      throw new RecognitionError('OpenAI recognition is not configured');
    }

    const model = this.resolveModel(options.modelSize);
    this.logger.log(`Transcribing ${options.filename} with ${model} (${options.language})`);

    let response: unknown;
    try {
      response = await this.client.audio.transcriptions.create(
        {
          file: await toFile(audio, options.filename, { type: contentTypeFor(options.filename) }),
          model,
          language: options.language || undefined,
          response_format: 'verbose_json',
          timestamp_granularities: ['segment'],
        },
        {
          signal: options.signal,
          // 自建服务按 device 选择 CPU/GPU
          ...(this.selfHosted && { query: { device: options.device } }),
        },
      );
    } catch (error) {
      throw new RecognitionError(
        `OpenAI transcription failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    return this.parseResponse(response);
  }

  /**
   * 官方 API 只接受 whisper-1，本地模型尺寸（tiny/base/small...）仅对自建服务有效
   */
  private resolveModel(modelSize: string): string {
    if (this.selfHosted || HOSTED_MODELS.includes(modelSize)) {
      return modelSize;
    }
    return HOSTED_MODELS[0];
  }

  private parseResponse(response: unknown): RecognitionResult {
    const body = asRecord(response);
    if (!body) {
      throw new RecognitionError('Unexpected OpenAI transcription response');
    }

    const rawSegments = Array.isArray(body.segments) ? body.segments : [];
    const segments = rawSegments.map((item: unknown) => {
      const seg = asRecord(item);
      return seg ? [seg.start, seg.end, seg.text] : item;
    });

    // duration 有的服务返回字符串
    const duration =
      asNumber(body.duration) ??
      (typeof body.duration === 'string' ? asNumber(parseFloat(body.duration)) : null);

    this.logger.log(`OpenAI response: duration=${duration ?? 'unknown'}s, segments=${segments.length}`);
    return { segments, durationSec: duration };
  }
}
