import { Module, DynamicModule } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule, ConfigService } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { SupabaseModule } from './providers/supabase/supabase.module';
import { StorageModule } from './providers/storage/storage.module';
import { RecognitionModule } from './providers/recognition/recognition.module';
import { DatabaseModule } from './database/database.module';

// Business Modules
import { SegmentsModule } from './modules/segments/segments.module';
import { LibraryModule } from './modules/library/library.module';
import { TranscriptionModule } from './modules/transcription/transcription.module';
import { PlaybackModule } from './modules/playback/playback.module';

type ModuleImport = NonNullable<DynamicModule['imports']>[number];

@Module({})
export class AppModule {
  static forRoot(): DynamicModule {
    const imports: ModuleImport[] = [
      // Config
      ConfigModule.forRoot({
        isGlobal: true,
        load: [configuration],
        envFilePath: ['.env.local', '.env'],
      }),

      // Schedule (卡住任务清理)
      ScheduleModule.forRoot(),

      // Providers
      SupabaseModule,
      DatabaseModule,
      StorageModule,
      RecognitionModule,

      // Business Modules
      SegmentsModule,
      LibraryModule,
      TranscriptionModule,
      PlaybackModule,
    ];

    // 只有当 REDIS_ENABLED=true 时才加载 BullMQ
    if (process.env.REDIS_ENABLED === 'true') {
      imports.push(
        BullModule.forRootAsync({
          imports: [ConfigModule],
          useFactory: (configService: ConfigService) => ({
            connection: {
              url: configService.get<string>('redis.url'),
            },
          }),
          inject: [ConfigService],
        }),
      );
    }

    return {
      module: AppModule,
      imports,
    };
  }
}
