import { Injectable } from '@nestjs/common';
import { AudioItem, AudioItemStatus, AudioItemStatusPatch } from '../entities';
import { AudioItemsCursor, AudioItemsRepository, ListAudioItemsQuery } from './audio-items.repository';
import { MemoryDatabase } from './memory.database';

// 按码位比较，与 Postgres 对 ISO 时间戳 / uuid 的排序一致
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * 与 ORDER BY created_at DESC, id DESC 一致：row 排在 cursor 之后时返回正数
 */
function compareNewestFirst(row: AudioItem, cursor: AudioItemsCursor): number {
  return compareText(cursor.createdAt, row.created_at) || compareText(cursor.id, row.id);
}

@Injectable()
export class MemoryAudioItemsRepository extends AudioItemsRepository {
  constructor(private readonly db: MemoryDatabase) {
    super();
  }

  async insert(item: AudioItem): Promise<AudioItem> {
    this.db.audioItems.set(item.id, { ...item });
    return { ...item };
  }

  async findById(id: string): Promise<AudioItem | null> {
    const row = this.db.audioItems.get(id);
    return row ? { ...row } : null;
  }

  async list(query: ListAudioItemsQuery): Promise<AudioItem[]> {
    const { cursor } = query;
    return [...this.db.audioItems.values()]
      .filter((row) => !query.status || row.status === query.status)
      .filter((row) => !cursor || compareNewestFirst(row, cursor) > 0)
      .sort((a, b) => compareNewestFirst(a, { createdAt: b.created_at, id: b.id }))
      .slice(0, query.limit)
      .map((row) => ({ ...row }));
  }

  async compareAndSetStatus(
    id: string,
    expected: AudioItemStatus[],
    patch: AudioItemStatusPatch,
    attemptId?: string,
  ): Promise<AudioItem | null> {
    const row = this.db.audioItems.get(id);
    if (!row || !expected.includes(row.status)) {
      return null;
    }
    if (attemptId !== undefined && row.attempt_id !== attemptId) {
      return null;
    }
    const updated = { ...row, ...patch };
    this.db.audioItems.set(id, updated);
    return { ...updated };
  }

  async findStale(status: AudioItemStatus, updatedBefore: string): Promise<AudioItem[]> {
    return [...this.db.audioItems.values()]
      .filter((row) => row.status === status && row.updated_at < updatedBefore)
      .map((row) => ({ ...row }));
  }

  async deleteWithSegments(id: string): Promise<boolean> {
    this.db.segments.delete(id);
    return this.db.audioItems.delete(id);
  }
}
