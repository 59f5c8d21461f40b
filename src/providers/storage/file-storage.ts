import { basename, extname } from 'path';
import { v4 as uuidv4 } from 'uuid';

// 常见音频扩展名 -> MIME
const CONTENT_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.oga': 'audio/ogg',
  '.opus': 'audio/opus',
  '.webm': 'audio/webm',
  '.flac': 'audio/flac',
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * 生成存储名：<uuid>_<原始文件名>，去掉路径与不安全字符
 */
export function generateStorageName(filename: string): string {
  const safe = basename(filename).replace(/[^\w.\-]+/g, '_') || 'audio';
  return `${uuidv4()}_${safe}`;
}

/**
 * 文件存储
 * 失败抛出 StorageError，文件不存在抛出 StorageNotFoundError
 */
export abstract class FileStorage {
  /** 保存文件，返回 storage_ref */
  abstract save(bytes: Buffer, filename: string): Promise<string>;

  abstract load(storageRef: string): Promise<Buffer>;

  abstract delete(storageRef: string): Promise<void>;
}
