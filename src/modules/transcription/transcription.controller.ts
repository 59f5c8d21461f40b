import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  PayloadTooLargeException,
  Post,
  Req,
} from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import type { FastifyRequest } from 'fastify';
import type { MultipartFields, MultipartFile } from '@fastify/multipart';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { LibraryService } from '../library/library.service';
import { AudioItemResponseDto } from '../library/dto/audio-item.dto';
import { TranscriptionService } from './transcription.service';
import { SubmitAudioFieldsDto } from './dto/submit-audio.dto';

function readTextFields(fields: MultipartFields): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [name, entry] of Object.entries(fields)) {
    const part = Array.isArray(entry) ? entry[0] : entry;
    if (part && part.type === 'field' && typeof part.value === 'string') {
      values[name] = part.value;
    }
  }
  return values;
}

function isFileTooLarge(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 413;
}

@Controller('audio-items')
export class TranscriptionController {
  constructor(
    private readonly transcriptionService: TranscriptionService,
    private readonly libraryService: LibraryService,
  ) {}

  /**
   * POST /api/audio-items
   * 上传音频（multipart: file，可选 language / model_size / device）
   */
  @Post()
  async upload(@Req() request: FastifyRequest): Promise<AudioItemResponseDto> {
    if (!request.isMultipart()) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: '请使用 multipart/form-data 上传音频文件',
      });
    }

    const file = await request.file();
    if (!file) {
      throw new BadRequestException({ code: ErrorCode.INVALID_INPUT, message: '缺少 file 字段' });
    }

    const fields = await this.parseFields(file);
    const buffer = await this.readFile(file);

    const item = await this.transcriptionService.submit({
      buffer,
      filename: file.filename,
      overrides: {
        language: fields.language,
        modelSize: fields.model_size,
        device: fields.device,
      },
    });

    return this.libraryService.formatItem(item);
  }

  /**
   * POST /api/audio-items/:id/transcribe
   * 重新提交失败（或尚未开始）的条目
   */
  @Post(':id/transcribe')
  @HttpCode(HttpStatus.ACCEPTED)
  async resubmit(@Param('id', ParseUUIDPipe) id: string): Promise<AudioItemResponseDto> {
    return this.libraryService.formatItem(await this.transcriptionService.resubmit(id));
  }

  private async parseFields(file: MultipartFile): Promise<SubmitAudioFieldsDto> {
    const dto = plainToInstance(SubmitAudioFieldsDto, readTextFields(file.fields));
    const errors = await validate(dto, { whitelist: true, forbidNonWhitelisted: true });

    if (errors.length > 0) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: errors.flatMap((error) => Object.values(error.constraints ?? {})).join('; '),
      });
    }
    return dto;
  }

  private async readFile(file: MultipartFile): Promise<Buffer> {
    try {
      return await file.toBuffer();
    } catch (error) {
      if (isFileTooLarge(error)) {
        throw new PayloadTooLargeException({
          code: ErrorCode.PAYLOAD_TOO_LARGE,
          message: '文件过大',
        });
      }
      throw error;
    }
  }
}
