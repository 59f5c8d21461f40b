import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { StorageError } from '../../common/exceptions/domain.exceptions';
import { Segment } from '../entities';
import { SegmentsRepository } from './segments.repository';

const TABLE = 'segments';

@Injectable()
export class SupabaseSegmentsRepository extends SegmentsRepository {
  private readonly logger = new Logger(SupabaseSegmentsRepository.name);

  constructor(private supabaseService: SupabaseService) {
    super();
  }

  /**
   * 通过 replace_segments() 在一个事务内删除旧片段并插入新片段
   */
  async replaceAll(audioItemId: string, segments: Segment[]): Promise<boolean> {
    const { data, error } = await this.supabaseService.rpc('replace_segments', {
      p_audio_item_id: audioItemId,
      p_segments: segments.map(({ index, start_seconds, end_seconds, text }) => ({
        index,
        start_seconds,
        end_seconds,
        text,
      })),
    });

    if (error) {
      this.logger.error(`Failed to replace segments of ${audioItemId}: ${error.message}`);
      throw new StorageError(`Failed to replace segments: ${error.message}`);
    }
    return data === true;
  }

  async findByAudioItem(audioItemId: string): Promise<Segment[]> {
    const { data, error } = await this.supabaseService
      .from(TABLE)
      .select('*')
      .eq('audio_item_id', audioItemId)
      .order('index', { ascending: true });

    if (error) {
      this.logger.error(`Failed to fetch segments of ${audioItemId}: ${error.message}`);
      throw new StorageError(`Failed to fetch segments: ${error.message}`);
    }
    return (data as Segment[] | null) ?? [];
  }

  async deleteByAudioItem(audioItemId: string): Promise<void> {
    const { error } = await this.supabaseService
      .from(TABLE)
      .delete()
      .eq('audio_item_id', audioItemId);

    if (error) {
      this.logger.error(`Failed to delete segments of ${audioItemId}: ${error.message}`);
      throw new StorageError(`Failed to delete segments: ${error.message}`);
    }
  }
}
