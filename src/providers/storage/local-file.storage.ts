import { Logger } from '@nestjs/common';
import { mkdir, readFile, unlink, writeFile } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { StorageError, StorageNotFoundError } from '../../common/exceptions/domain.exceptions';
import { FileStorage, generateStorageName } from './file-storage';

// fs 的错误不一定来自当前 realm 的 Error，按结构判断
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * 本地目录存储，storage_ref 即目录下的文件名
 */
export class LocalFileStorage extends FileStorage {
  private readonly logger = new Logger(LocalFileStorage.name);
  private readonly root: string;

  constructor(directory: string) {
    super();
    this.root = resolve(directory);
  }

  async save(bytes: Buffer, filename: string): Promise<string> {
    const storageRef = generateStorageName(filename);
    try {
      await mkdir(this.root, { recursive: true });
      await writeFile(join(this.root, storageRef), bytes);
    } catch (err) {
      this.logger.error(`Failed to write ${storageRef}: ${err}`);
      throw new StorageError(`Failed to save file: ${filename}`, { cause: err });
    }
    return storageRef;
  }

  async load(storageRef: string): Promise<Buffer> {
    const path = this.pathFor(storageRef);
    try {
      return await readFile(path);
    } catch (err) {
      if (isMissingFile(err)) throw new StorageNotFoundError(storageRef);
      throw new StorageError(`Failed to read file: ${storageRef}`, { cause: err });
    }
  }

  async delete(storageRef: string): Promise<void> {
    const path = this.pathFor(storageRef);
    try {
      await unlink(path);
    } catch (err) {
      if (isMissingFile(err)) throw new StorageNotFoundError(storageRef);
      throw new StorageError(`Failed to delete file: ${storageRef}`, { cause: err });
    }
  }

  private pathFor(storageRef: string): string {
    // storage_ref 只能是单个文件名
    if (basename(storageRef) !== storageRef || storageRef.startsWith('.')) {
      throw new StorageNotFoundError(storageRef);
    }
    return join(this.root, storageRef);
  }
}
