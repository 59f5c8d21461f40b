import { ValidationPipe } from '@nestjs/common';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import multipart from '@fastify/multipart';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';

export interface AppSetupOptions {
  maxFileSizeBytes: number;
}

/**
 * HTTP 层的全局配置，main 与 e2e 测试共用
 */
export async function setupApp(app: NestFastifyApplication, options: AppSetupOptions): Promise<void> {
  // 音频上传
  await app.register(multipart, {
    limits: {
      files: 1,
      fileSize: options.maxFileSizeBytes,
    },
  });

  // 全局前缀
  app.setGlobalPrefix('api');

  // 全局管道
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // 全局过滤器
  app.useGlobalFilters(new HttpExceptionFilter());

  // 全局拦截器
  app.useGlobalInterceptors(new ResponseInterceptor());

  // CORS
  app.enableCors({
    origin: true,
    credentials: true,
  });
}
