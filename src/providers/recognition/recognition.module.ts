import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RecognitionEngine } from './recognition-engine';
import { OpenAIRecognitionEngine } from './openai-recognition.engine';
import { DeepgramRecognitionEngine } from './deepgram-recognition.engine';

/**
 * 根据 RECOGNITION_ENGINE 选择识别引擎（openai | deepgram）
 */
@Global()
@Module({
  providers: [
    {
      provide: RecognitionEngine,
      useFactory: (configService: ConfigService): RecognitionEngine => {
        if (configService.get<string>('recognition.engine') === 'deepgram') {
          return new DeepgramRecognitionEngine(configService.get<string>('deepgram.apiKey') || '');
        }
        return new OpenAIRecognitionEngine({
          apiKey: configService.get<string>('openai.apiKey'),
          baseUrl: configService.get<string>('openai.baseUrl'),
        });
      },
      inject: [ConfigService],
    },
  ],
  exports: [RecognitionEngine],
})
export class RecognitionModule {}
