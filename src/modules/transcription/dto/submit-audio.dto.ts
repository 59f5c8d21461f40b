import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';

/**
 * 上传时可覆盖的转录配置（multipart 文本字段，需放在 file 之前）
 */
export class SubmitAudioFieldsDto {
  @IsString()
  @Matches(/^[a-z]{2,3}(-[A-Za-z]{2,4})?$/, { message: 'language must be a language code such as ja or en-US' })
  @IsOptional()
  language?: string;

  @IsString()
  @MaxLength(64)
  @IsOptional()
  model_size?: string;

  @IsString()
  @Matches(/^(cpu|cuda(:\d+)?|mps|auto)$/, { message: 'device must be cpu, cuda, cuda:N, mps or auto' })
  @IsOptional()
  device?: string;
}
