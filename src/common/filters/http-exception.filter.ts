import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiResponse, ErrorCode } from '../interfaces/response.interface';
import { StorageError } from '../exceptions/domain.exceptions';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let errorCode: string = ErrorCode.INTERNAL_ERROR;
    let message = 'Internal server error';
    let details: Record<string, unknown> | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const resp: Record<string, unknown> = { ...exceptionResponse };
        message = this.readMessage(resp.message) ?? exception.message;
        errorCode = typeof resp.code === 'string' ? resp.code : this.mapStatusToErrorCode(status);
        if (resp.details && typeof resp.details === 'object') {
          details = { ...resp.details };
        } else if (Array.isArray(resp.message)) {
          // ValidationPipe 的逐字段错误
          details = { errors: resp.message };
        }
      } else {
        message = exceptionResponse;
        errorCode = this.mapStatusToErrorCode(status);
      }
    } else if (exception instanceof StorageError) {
      errorCode = ErrorCode.STORAGE_ERROR;
      message = exception.message;
      this.logger.error(`Storage error: ${exception.message}`, exception.stack);
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    const errorResponse: ApiResponse = {
      data: null,
      error: {
        code: errorCode,
        message,
        ...(details && { details }),
      },
    };

    response.status(status).send(errorResponse);
  }

  private readMessage(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.map(String).join('; ');
    return undefined;
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.CONFLICT:
        return ErrorCode.CONFLICT;
      case HttpStatus.PAYLOAD_TOO_LARGE:
        return ErrorCode.PAYLOAD_TOO_LARGE;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }
}
