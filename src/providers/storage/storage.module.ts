import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileStorage } from './file-storage';
import { LocalFileStorage } from './local-file.storage';
import { R2FileStorage } from './r2-file.storage';

const logger = new Logger('StorageModule');

/**
 * 根据 STORAGE_DRIVER 选择文件存储（local | r2）
 */
@Global()
@Module({
  providers: [
    {
      provide: FileStorage,
      useFactory: (configService: ConfigService): FileStorage => {
        if (configService.get<string>('storage.driver') === 'r2') {
          const endpoint = configService.get<string>('r2.endpoint');
          const accessKey = configService.get<string>('r2.accessKey');
          const secretKey = configService.get<string>('r2.secretKey');
          const bucket = configService.get<string>('r2.bucket');

          if (endpoint && accessKey && secretKey && bucket) {
            return new R2FileStorage({ endpoint, accessKey, secretKey, bucket });
          }
          logger.warn('R2 configuration missing, falling back to local storage');
        }

        const directory = configService.get<string>('storage.localDir') || 'uploads';
        logger.log(`Local file storage at ${directory}`);
        return new LocalFileStorage(directory);
      },
      inject: [ConfigService],
    },
  ],
  exports: [FileStorage],
})
export class StorageModule {}
