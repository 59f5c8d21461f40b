import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { StorageError } from '../../common/exceptions/domain.exceptions';
import { AudioItem, AudioItemStatus, AudioItemStatusPatch } from '../entities';
import { AudioItemsRepository, ListAudioItemsQuery } from './audio-items.repository';

const TABLE = 'audio_items';

@Injectable()
export class SupabaseAudioItemsRepository extends AudioItemsRepository {
  private readonly logger = new Logger(SupabaseAudioItemsRepository.name);

  constructor(private supabaseService: SupabaseService) {
    super();
  }

  async insert(item: AudioItem): Promise<AudioItem> {
    const { data, error } = await this.supabaseService
      .from(TABLE)
      .insert(item)
      .select()
      .single();

    if (error || !data) {
      this.logger.error(`Failed to insert audio item ${item.id}: ${error?.message}`);
      throw new StorageError(`Failed to insert audio item: ${error?.message}`);
    }
    return data as AudioItem;
  }

  async findById(id: string): Promise<AudioItem | null> {
    const { data, error } = await this.supabaseService
      .from(TABLE)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      this.logger.error(`Failed to fetch audio item ${id}: ${error.message}`);
      throw new StorageError(`Failed to fetch audio item: ${error.message}`);
    }
    return (data as AudioItem | null) ?? null;
  }

  async list(query: ListAudioItemsQuery): Promise<AudioItem[]> {
    let queryBuilder = this.supabaseService
      .from(TABLE)
      .select('*')
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(query.limit);

    if (query.status) {
      queryBuilder = queryBuilder.eq('status', query.status);
    }

    // 游标分页：同一 created_at 的条目按 id 继续
    if (query.cursor) {
      const createdAt = `"${query.cursor.createdAt}"`;
      queryBuilder = queryBuilder.or(
        `created_at.lt.${createdAt},and(created_at.eq.${createdAt},id.lt.${query.cursor.id})`,
      );
    }

    const { data, error } = await queryBuilder;
    if (error) {
      this.logger.error(`Failed to list audio items: ${error.message}`);
      throw new StorageError(`Failed to list audio items: ${error.message}`);
    }
    return (data as AudioItem[] | null) ?? [];
  }

  /**
   * 单条 UPDATE ... WHERE id = ? AND status IN (...) [AND attempt_id = ?]，并发 claim 只有一个能命中
   */
  async compareAndSetStatus(
    id: string,
    expected: AudioItemStatus[],
    patch: AudioItemStatusPatch,
    attemptId?: string,
  ): Promise<AudioItem | null> {
    let queryBuilder = this.supabaseService
      .from(TABLE)
      .update(patch)
      .eq('id', id)
      .in('status', expected);

    // 只允许本次尝试落终态
    if (attemptId !== undefined) {
      queryBuilder = queryBuilder.eq('attempt_id', attemptId);
    }

    const { data, error } = await queryBuilder.select().maybeSingle();

    if (error) {
      this.logger.error(`Failed to update status of ${id}: ${error.message}`);
      throw new StorageError(`Failed to update audio item status: ${error.message}`);
    }
    return (data as AudioItem | null) ?? null;
  }

  async findStale(status: AudioItemStatus, updatedBefore: string): Promise<AudioItem[]> {
    const { data, error } = await this.supabaseService
      .from(TABLE)
      .select('*')
      .eq('status', status)
      .lt('updated_at', updatedBefore);

    if (error) {
      this.logger.error(`Failed to query stale audio items: ${error.message}`);
      throw new StorageError(`Failed to query stale audio items: ${error.message}`);
    }
    return (data as AudioItem[] | null) ?? [];
  }

  async deleteWithSegments(id: string): Promise<boolean> {
    const { data, error } = await this.supabaseService.rpc('delete_audio_item', { p_id: id });

    if (error) {
      this.logger.error(`Failed to delete audio item ${id}: ${error.message}`);
      throw new StorageError(`Failed to delete audio item: ${error.message}`);
    }
    return data === true;
  }
}
