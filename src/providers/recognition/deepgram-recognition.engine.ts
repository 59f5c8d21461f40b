import { Logger } from '@nestjs/common';
import { RecognitionError } from '../../common/exceptions/domain.exceptions';
import { contentTypeFor } from '../storage/file-storage';
import {
  RecognitionEngine,
  RecognitionOptions,
  RecognitionResult,
  asNumber,
  asRecord,
} from './recognition-engine';

/**
 * Deepgram 预录音频转录
 * modelSize 对应 Deepgram 模型（nova-3 / nova-2 / enhanced / base），
 * 硬件由 Deepgram 决定，device 只记录不下发
 * @see https://developers.deepgram.com/docs/features
 */
export class DeepgramRecognitionEngine extends RecognitionEngine {
  readonly name = 'deepgram';
  private readonly logger = new Logger(DeepgramRecognitionEngine.name);
  private readonly baseUrl = 'https://api.deepgram.com/v1';

  constructor(private readonly apiKey: string) {
    super();
    if (!this.apiKey) {
      this.logger.warn('Deepgram API key not configured');
    } else {
      this.logger.log('Deepgram recognition initialized');
    }
  }

  async transcribe(audio: Buffer, options: RecognitionOptions): Promise<RecognitionResult> {
    if (!this.apiKey) {
      throw new RecognitionError('Deepgram recognition is not configured');
    }

    const params = new URLSearchParams({
      model: options.modelSize,
      punctuate: 'true', // 添加标点
      utterances: 'true', // 返回语义分段
    });
    if (options.language) {
      params.set('language', options.language);
    }

    let result: unknown;
    try {
      const response = await fetch(`${this.baseUrl}/listen?${params.toString()}`, {
        method: 'POST',
        headers: {
          Authorization: `Token ${this.apiKey}`,
          'Content-Type': contentTypeFor(options.filename),
        },
        body: audio,
        signal: options.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new RecognitionError(`Deepgram API error: ${response.status} - ${error}`);
      }
      result = await response.json();
    } catch (error) {
      if (error instanceof RecognitionError) throw error;
      throw new RecognitionError(
        `Deepgram request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    return this.parseResult(result);
  }

  /**
   * duration 在 metadata 中，utterances 在 results 中
   */
  private parseResult(result: unknown): RecognitionResult {
    const body = asRecord(result);
    const metadata = asRecord(body?.metadata);
    const results = asRecord(body?.results);
    const utterances = results && Array.isArray(results.utterances) ? results.utterances : [];

    const segments = utterances.map((item: unknown) => {
      const utterance = asRecord(item);
      return utterance ? [utterance.start, utterance.end, utterance.transcript] : item;
    });
    const duration = asNumber(metadata?.duration);

    this.logger.log(`Deepgram response: duration=${duration ?? 'unknown'}s, utterances=${segments.length}`);
    return { segments, durationSec: duration };
  }
}
