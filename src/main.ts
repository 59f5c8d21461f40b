import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule.forRoot(),
    new FastifyAdapter({ logger: true }),
  );

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port') || 3000;
  const maxFileSizeMb = configService.get<number>('storage.maxFileSizeMb') || 200;

  await setupApp(app, { maxFileSizeBytes: maxFileSizeMb * 1024 * 1024 });

  // 关闭时等待进程内的转录任务结束
  app.enableShutdownHooks();

  await app.listen(port, '0.0.0.0');
  logger.log(`Application is running on: http://localhost:${port}/api`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${err instanceof Error ? err.stack : String(err)}`);
  process.exit(1);
});
