import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseService } from '../providers/supabase/supabase.service';
import {
  AudioItemsRepository,
  MemoryAudioItemsRepository,
  MemoryDatabase,
  MemorySegmentsRepository,
  SegmentsRepository,
  SupabaseAudioItemsRepository,
  SupabaseSegmentsRepository,
} from './repositories';

const logger = new Logger('DatabaseModule');

function useMemory(configService: ConfigService): boolean {
  return configService.get<string>('database.driver') === 'memory';
}

/**
 * 根据 DATABASE_DRIVER 选择持久化实现（supabase | memory）
 */
@Global()
@Module({
  providers: [
    MemoryDatabase,
    {
      provide: AudioItemsRepository,
      useFactory: (
        configService: ConfigService,
        supabaseService: SupabaseService,
        memoryDatabase: MemoryDatabase,
      ): AudioItemsRepository => {
        if (useMemory(configService)) {
          logger.warn('Using in-memory database, data will not survive a restart');
          return new MemoryAudioItemsRepository(memoryDatabase);
        }
        return new SupabaseAudioItemsRepository(supabaseService);
      },
      inject: [ConfigService, SupabaseService, MemoryDatabase],
    },
    {
      provide: SegmentsRepository,
      useFactory: (
        configService: ConfigService,
        supabaseService: SupabaseService,
        memoryDatabase: MemoryDatabase,
      ): SegmentsRepository =>
        useMemory(configService)
          ? new MemorySegmentsRepository(memoryDatabase)
          : new SupabaseSegmentsRepository(supabaseService),
      inject: [ConfigService, SupabaseService, MemoryDatabase],
    },
  ],
  exports: [AudioItemsRepository, SegmentsRepository, MemoryDatabase],
})
export class DatabaseModule {}
