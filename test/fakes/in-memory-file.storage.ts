import { FileStorage } from '../../src/providers/storage/file-storage';
import { StorageError, StorageNotFoundError } from '../../src/common/exceptions/domain.exceptions';

export class InMemoryFileStorage extends FileStorage {
  readonly files = new Map<string, Buffer>();
  failDeletes = false;
  private counter = 0;

  async save(bytes: Buffer, filename: string): Promise<string> {
    this.counter += 1;
    const ref = `file-${this.counter}_${filename}`;
    this.files.set(ref, Buffer.from(bytes));
    return ref;
  }

  async load(storageRef: string): Promise<Buffer> {
    const bytes = this.files.get(storageRef);
    if (!bytes) {
      throw new StorageNotFoundError(storageRef);
    }
    return bytes;
  }

  async delete(storageRef: string): Promise<void> {
    if (this.failDeletes) {
      throw new StorageError('bucket unavailable');
    }
    if (!this.files.delete(storageRef)) {
      throw new StorageNotFoundError(storageRef);
    }
  }
}
