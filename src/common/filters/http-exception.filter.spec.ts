import { BadRequestException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { HttpExceptionFilter } from './http-exception.filter';
import {
  AudioItemNotFoundException,
  InvalidTransitionException,
  SegmentOutOfRangeException,
  StorageError,
} from '../exceptions/domain.exceptions';

interface FakeReply {
  statusCode: number;
  body: unknown;
  status(code: number): FakeReply;
  send(payload: unknown): FakeReply;
}

function createReply(): FakeReply {
  const reply: FakeReply = {
    statusCode: 0,
    body: undefined,
    status(code: number) {
      reply.statusCode = code;
      return reply;
    },
    send(payload: unknown) {
      reply.body = payload;
      return reply;
    },
  };
  return reply;
}

function run(exception: unknown) {
  const reply = createReply();
  new HttpExceptionFilter().catch(exception, new ExecutionContextHost([{}, reply]));
  return reply;
}

describe('HttpExceptionFilter', () => {
  test('maps NotFound to 404', () => {
    const reply = run(new AudioItemNotFoundException('abc'));
    expect(reply.statusCode).toBe(404);
    expect(reply.body).toEqual({
      data: null,
      error: { code: 'NOT_FOUND', message: '音频不存在: abc' },
    });
  });

  test('maps InvalidTransition to 409 with details', () => {
    const reply = run(new InvalidTransitionException('abc', 'completed', 'processing'));
    expect(reply.statusCode).toBe(409);
    expect(reply.body).toEqual({
      data: null,
      error: {
        code: 'INVALID_TRANSITION',
        message: '不允许的状态迁移: completed -> processing',
        details: { id: 'abc', from: 'completed', to: 'processing' },
      },
    });
  });

  test('maps OutOfRange to 400', () => {
    const reply = run(new SegmentOutOfRangeException(3, 2));
    expect(reply.statusCode).toBe(400);
    expect(reply.body).toMatchObject({ error: { code: 'OUT_OF_RANGE', details: { index: 3, count: 2 } } });
  });

  test('collects validation pipe messages', () => {
    const reply = run(new BadRequestException(['t must be a number', 'format must be one of srt, vtt']));
    expect(reply.statusCode).toBe(400);
    expect(reply.body).toEqual({
      data: null,
      error: {
        code: 'INVALID_INPUT',
        message: 't must be a number; format must be one of srt, vtt',
        details: { errors: ['t must be a number', 'format must be one of srt, vtt'] },
      },
    });
  });

  test('maps storage failures to 500 STORAGE_ERROR', () => {
    const reply = run(new StorageError('bucket unavailable'));
    expect(reply.statusCode).toBe(500);
    expect(reply.body).toEqual({
      data: null,
      error: { code: 'STORAGE_ERROR', message: 'bucket unavailable' },
    });
  });

  test('maps unknown errors to 500', () => {
    const reply = run(new Error('boom'));
    expect(reply.statusCode).toBe(500);
    expect(reply.body).toEqual({ data: null, error: { code: 'INTERNAL_ERROR', message: 'boom' } });
  });
});
