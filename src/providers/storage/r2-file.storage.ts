import { Logger } from '@nestjs/common';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  NoSuchKey,
  NotFound,
} from '@aws-sdk/client-s3';
import { StorageError, StorageNotFoundError } from '../../common/exceptions/domain.exceptions';
import { FileStorage, contentTypeFor, generateStorageName } from './file-storage';

export interface R2Options {
  endpoint: string;
  bucket: string;
  accessKey: string;
  secretKey: string;
}

/**
 * Cloudflare R2（S3 兼容）存储，storage_ref 为对象 key
 */
export class R2FileStorage extends FileStorage {
  private readonly logger = new Logger(R2FileStorage.name);
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: R2Options) {
    super();
    this.bucket = options.bucket;
    this.client = new S3Client({
      region: 'auto',
      endpoint: options.endpoint,
      credentials: {
        accessKeyId: options.accessKey,
        secretAccessKey: options.secretKey,
      },
    });
    this.logger.log('R2 client initialized');
  }

  async save(bytes: Buffer, filename: string): Promise<string> {
    const key = `uploads/${generateStorageName(filename)}`;
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: bytes,
          ContentType: contentTypeFor(filename),
        }),
      );
    } catch (err) {
      this.logger.error(`R2 upload failed for ${key}: ${err}`);
      throw new StorageError(`Failed to save file: ${filename}`, { cause: err });
    }
    return key;
  }

  async load(storageRef: string): Promise<Buffer> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: storageRef }),
      );
      if (!response.Body) {
        throw new StorageError(`Empty object body: ${storageRef}`);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (err) {
      if (err instanceof NoSuchKey) throw new StorageNotFoundError(storageRef);
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Failed to read file: ${storageRef}`, { cause: err });
    }
  }

  /**
   * S3 的 DeleteObject 对不存在的 key 也返回成功，先 HEAD 确认存在
   */
  async delete(storageRef: string): Promise<void> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: storageRef }));
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: storageRef }));
    } catch (err) {
      if (err instanceof NotFound || err instanceof NoSuchKey) {
        throw new StorageNotFoundError(storageRef);
      }
      throw new StorageError(`Failed to delete file: ${storageRef}`, { cause: err });
    }
  }
}
