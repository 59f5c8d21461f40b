import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  StreamableFile,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { ApiResponse } from '../interfaces/response.interface';

function isApiResponse(value: unknown): value is ApiResponse {
  return value !== null && typeof value === 'object' && 'data' in value && 'error' in value;
}

/**
 * 统一响应拦截器
 * 将所有 JSON 响应包装为 { data: T, error: null } 格式
 * 字幕文本与音频文件原样返回
 */
@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ApiResponse<T> | T> {
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T> | T> {
    return next.handle().pipe(
      map((data) => {
        if (typeof data === 'string' || data instanceof StreamableFile) {
          return data;
        }
        // 已经是 ApiResponse 格式，直接返回
        if (isApiResponse(data)) {
          return data;
        }
        return {
          data,
          error: null,
        };
      }),
    );
  }
}
