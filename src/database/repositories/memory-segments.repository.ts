import { Injectable } from '@nestjs/common';
import { Segment } from '../entities';
import { SegmentsRepository } from './segments.repository';
import { MemoryDatabase } from './memory.database';

@Injectable()
export class MemorySegmentsRepository extends SegmentsRepository {
  constructor(private readonly db: MemoryDatabase) {
    super();
  }

  async replaceAll(audioItemId: string, segments: Segment[]): Promise<boolean> {
    if (!this.db.audioItems.has(audioItemId)) {
      return false;
    }
    // 整体替换数组引用，读者只会看到旧集合或新集合
    this.db.segments.set(
      audioItemId,
      Object.freeze(segments.map((segment) => ({ ...segment }))),
    );
    return true;
  }

  async findByAudioItem(audioItemId: string): Promise<Segment[]> {
    return (this.db.segments.get(audioItemId) ?? []).map((segment) => ({ ...segment }));
  }

  async deleteByAudioItem(audioItemId: string): Promise<void> {
    this.db.segments.delete(audioItemId);
  }
}
