import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

/**
 * Worker 入口
 * 独立进程运行，消费 BullMQ 转录队列（需要 REDIS_ENABLED=true）
 */
async function bootstrap() {
  const logger = new Logger('Worker');

  if (process.env.REDIS_ENABLED !== 'true') {
    logger.warn('REDIS_ENABLED is not true; the worker has no queue to consume');
  }

  // 创建应用上下文（不启动 HTTP 服务）
  const app = await NestFactory.createApplicationContext(AppModule.forRoot());

  logger.log('Worker started and listening for jobs...');

  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}, shutting down...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };

  // 优雅关闭
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((err: unknown) => {
  new Logger('Worker').error(`Failed to start: ${err instanceof Error ? err.stack : String(err)}`);
  process.exit(1);
});
