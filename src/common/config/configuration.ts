import { existsSync, readFileSync } from 'fs';
import { Logger } from '@nestjs/common';

const CONFIG_PATH = process.env.TRANSCRIBE_CONFIG_PATH || 'config.json';

/**
 * 转录默认配置（上传时快照到每条 AudioItem）
 */
export interface TranscriptionDefaults {
  language: string;
  modelSize: string;
  device: string;
}

const BUILTIN_DEFAULTS: TranscriptionDefaults = {
  language: 'ja',
  modelSize: 'base',
  device: 'cpu',
};

/**
 * 读取 config.json（可选），缺失字段回落到内置默认值
 */
export function loadTranscriptionDefaults(path: string = CONFIG_PATH): TranscriptionDefaults {
  const defaults = { ...BUILTIN_DEFAULTS };

  if (existsSync(path)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        const file: Record<string, unknown> = { ...parsed };
        if (typeof file.language === 'string') defaults.language = file.language;
        if (typeof file.model_size === 'string') defaults.modelSize = file.model_size;
        if (typeof file.device === 'string') defaults.device = file.device;
      }
    } catch (err) {
      new Logger('Configuration').warn(`Ignoring unreadable ${path}: ${err}`);
    }
  }

  return {
    language: process.env.TRANSCRIBE_LANGUAGE || defaults.language,
    modelSize: process.env.TRANSCRIBE_MODEL_SIZE || defaults.modelSize,
    device: process.env.TRANSCRIBE_DEVICE || defaults.device,
  };
}

export default () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  database: {
    driver: process.env.DATABASE_DRIVER || 'supabase', // supabase | memory
  },

  supabase: {
    url: process.env.SUPABASE_URL,
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY,
  },

  storage: {
    driver: process.env.STORAGE_DRIVER || 'local', // local | r2
    localDir: process.env.STORAGE_LOCAL_DIR || 'uploads',
    maxFileSizeMb: parseInt(process.env.STORAGE_MAX_FILE_SIZE_MB || '200', 10),
  },

  r2: {
    bucket: process.env.R2_BUCKET,
    accessKey: process.env.R2_ACCESS_KEY,
    secretKey: process.env.R2_SECRET_KEY,
    endpoint: process.env.R2_ENDPOINT,
  },

  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
  },

  recognition: {
    engine: process.env.RECOGNITION_ENGINE || 'openai', // openai | deepgram
    timeoutSeconds: parseInt(process.env.RECOGNITION_TIMEOUT_SECONDS || '600', 10),
    minDurationSeconds: parseFloat(process.env.RECOGNITION_MIN_DURATION_SECONDS || '1'),
  },

  openai: {
    apiKey: process.env.OPENAI_API_KEY,
    baseUrl: process.env.OPENAI_BASE_URL,
  },

  deepgram: {
    apiKey: process.env.DEEPGRAM_API_KEY,
  },

  transcription: loadTranscriptionDefaults(),

  task: {
    pollIntervalSeconds: 5, // 客户端轮询间隔
    stuckTimeoutMinutes: 15, // processing 超过此时长视为卡住
  },
});
