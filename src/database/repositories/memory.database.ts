import { Injectable } from '@nestjs/common';
import { AudioItem, Segment } from '../entities';

/**
 * 进程内数据库（本地开发 / 测试用）
 * 所有写操作都是同步完成的，单线程下天然原子
 */
@Injectable()
export class MemoryDatabase {
  readonly audioItems = new Map<string, AudioItem>();
  readonly segments = new Map<string, readonly Segment[]>();

  reset(): void {
    this.audioItems.clear();
    this.segments.clear();
  }
}
