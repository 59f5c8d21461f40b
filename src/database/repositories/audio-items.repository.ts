import { AudioItem, AudioItemStatus, AudioItemStatusPatch } from '../entities';

/**
 * 分页游标：上一页最后一条的 (created_at, id)
 */
export interface AudioItemsCursor {
  createdAt: string;
  id: string;
}

export interface ListAudioItemsQuery {
  status?: AudioItemStatus;
  limit: number;
  cursor?: AudioItemsCursor;
}

/**
 * audio_items 表访问
 */
export abstract class AudioItemsRepository {
  abstract insert(item: AudioItem): Promise<AudioItem>;

  abstract findById(id: string): Promise<AudioItem | null>;

  /** 按 (created_at, id) 倒序，游标之后（不含）的条目 */
  abstract list(query: ListAudioItemsQuery): Promise<AudioItem[]>;

  /**
   * 条件更新：仅当当前状态属于 expected（且给出 attemptId 时 attempt_id 相同）时写入 patch
   * 未命中任何行时返回 null
   */
  abstract compareAndSetStatus(
    id: string,
    expected: AudioItemStatus[],
    patch: AudioItemStatusPatch,
    attemptId?: string,
  ): Promise<AudioItem | null>;

  /** 查找处于 status 且 updated_at 早于 updatedBefore 的条目 */
  abstract findStale(status: AudioItemStatus, updatedBefore: string): Promise<AudioItem[]>;

  /** 同一事务内删除片段与元数据，条目不存在时返回 false */
  abstract deleteWithSegments(id: string): Promise<boolean>;
}
