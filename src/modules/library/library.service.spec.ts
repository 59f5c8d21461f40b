import { LibraryService } from './library.service';
import { AudioItemStatus, FailureReason } from '../../database/entities';
import {
  AudioItemNotFoundException,
  InvalidTransitionException,
} from '../../common/exceptions/domain.exceptions';
import { createTestContext, SAMPLE_DRAFTS, TestContext } from '../../../test/fakes/test-context';

const UNKNOWN_ID = '3f1f4f0e-0000-4000-8000-000000000000';

describe('LibraryService', () => {
  let ctx: TestContext;
  let library: LibraryService;

  beforeEach(async () => {
    ctx = await createTestContext();
    library = ctx.library;
  });

  // ── createItem / getItem ──

  describe('createItem', () => {
    test('creates a queued item with a config snapshot', async () => {
      const item = await library.createItem({
        filename: 'lesson.mp3',
        storageRef: 'file-1_lesson.mp3',
        config: { language: 'en', modelSize: 'small', device: 'cuda:0' },
      });

      expect(item).toMatchObject({
        filename: 'lesson.mp3',
        storage_ref: 'file-1_lesson.mp3',
        language: 'en',
        model_size: 'small',
        device: 'cuda:0',
        status: AudioItemStatus.QUEUED,
        error_reason: null,
        error_message: null,
        duration_sec: null,
      });
      expect(await library.getItem(item.id)).toEqual(item);
    });

    test('getItem throws NotFound for unknown ids', async () => {
      await expect(library.getItem(UNKNOWN_ID)).rejects.toBeInstanceOf(AudioItemNotFoundException);
    });
  });

  // ── listItems ──

  describe('listItems', () => {
    beforeEach(() => {
      jest.useFakeTimers({ now: new Date('2026-03-01T00:00:00.000Z') });
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    const seedAt = async (filename: string, iso: string) => {
      jest.setSystemTime(new Date(iso));
      return library.createItem({
        filename,
        storageRef: `ref-${filename}`,
        config: { language: 'ja', modelSize: 'base', device: 'cpu' },
      });
    };

    test('lists newest first and pages with a cursor', async () => {
      await seedAt('a.mp3', '2026-03-01T00:00:01.000Z');
      const b = await seedAt('b.mp3', '2026-03-01T00:00:02.000Z');
      await seedAt('c.mp3', '2026-03-01T00:00:03.000Z');

      const first = await library.listItems({ limit: 2 });
      expect(first.items.map((i) => i.filename)).toEqual(['c.mp3', 'b.mp3']);
      expect(first.next_cursor).toBe(`2026-03-01T00:00:02.000Z_${b.id}`);

      const second = await library.listItems({ limit: 2, cursor: first.next_cursor ?? undefined });
      expect(second.items.map((i) => i.filename)).toEqual(['a.mp3']);
      expect(second.next_cursor).toBeNull();
    });

    test('pages through items created at the same instant', async () => {
      const created = [
        await seedAt('a.mp3', '2026-03-01T00:00:05.000Z'),
        await seedAt('b.mp3', '2026-03-01T00:00:05.000Z'),
        await seedAt('c.mp3', '2026-03-01T00:00:05.000Z'),
      ];

      const seen: string[] = [];
      let cursor: string | undefined;
      for (let page = 0; page < 5; page += 1) {
        const result = await library.listItems({ limit: 1, cursor });
        seen.push(...result.items.map((i) => i.id));
        if (!result.next_cursor) break;
        cursor = result.next_cursor;
      }

      const expected = created.map((i) => i.id).sort().reverse();
      expect(seen).toEqual(expected);
    });

    test('rejects a malformed cursor', async () => {
      await expect(library.listItems({ cursor: 'not-a-date_abc' })).rejects.toMatchObject({
        message: '无效的游标: not-a-date_abc',
      });
    });

    test('filters by status', async () => {
      const a = await seedAt('a.mp3', '2026-03-01T00:00:01.000Z');
      await seedAt('b.mp3', '2026-03-01T00:00:02.000Z');
      await library.updateStatus(a.id, { status: AudioItemStatus.PROCESSING });

      const page = await library.listItems({ status: AudioItemStatus.PROCESSING });
      expect(page.items.map((i) => i.filename)).toEqual(['a.mp3']);
    });
  });

  // ── updateStatus ──

  describe('updateStatus', () => {
    test('follows queued -> processing -> completed', async () => {
      const item = await ctx.seedQueued();

      const processing = await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });
      expect(processing.status).toBe(AudioItemStatus.PROCESSING);

      const completed = await library.updateStatus(item.id, {
        status: AudioItemStatus.COMPLETED,
        durationSec: 12.5,
      });
      expect(completed.status).toBe(AudioItemStatus.COMPLETED);
      expect(completed.duration_sec).toBe(12.5);
    });

    test('records the failure reason and message', async () => {
      const item = await ctx.seedQueued();
      await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });

      const failed = await library.updateStatus(item.id, {
        status: AudioItemStatus.FAILED,
        reason: FailureReason.RECOGNITION_ERROR,
        message: 'unsupported codec',
      });
      expect(failed.error_reason).toBe(FailureReason.RECOGNITION_ERROR);
      expect(failed.error_message).toBe('unsupported codec');
    });

    test('clears the failure when a failed item is claimed again', async () => {
      const item = await ctx.seedQueued();
      await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });
      await library.updateStatus(item.id, {
        status: AudioItemStatus.FAILED,
        reason: FailureReason.TIMEOUT,
        message: 'too slow',
      });

      const retried = await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });
      expect(retried.status).toBe(AudioItemStatus.PROCESSING);
      expect(retried.error_reason).toBeNull();
      expect(retried.error_message).toBeNull();
    });

    test('rejects transitions outside the state machine', async () => {
      const item = await ctx.seedQueued();

      await expect(
        library.updateStatus(item.id, { status: AudioItemStatus.COMPLETED }),
      ).rejects.toMatchObject({ from: AudioItemStatus.QUEUED, to: AudioItemStatus.COMPLETED });

      const completed = await ctx.seedCompleted(SAMPLE_DRAFTS);
      await expect(
        library.updateStatus(completed.id, { status: AudioItemStatus.PROCESSING }),
      ).rejects.toBeInstanceOf(InvalidTransitionException);
    });

    test('stamps each claim with a new attempt id', async () => {
      const item = await ctx.seedQueued();
      const first = await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });
      await library.updateStatus(item.id, {
        status: AudioItemStatus.FAILED,
        reason: FailureReason.TIMEOUT,
        message: 'too slow',
      });
      const second = await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });

      expect(first.attempt_id).toEqual(expect.any(String));
      expect(second.attempt_id).toEqual(expect.any(String));
      expect(second.attempt_id).not.toBe(first.attempt_id);
    });

    test('ignores a terminal update from a superseded attempt', async () => {
      const item = await ctx.seedQueued();
      const first = await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });
      await library.updateStatus(item.id, {
        status: AudioItemStatus.FAILED,
        reason: FailureReason.TIMEOUT,
        message: 'swept',
      });
      await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });

      await expect(
        library.updateStatus(item.id, {
          status: AudioItemStatus.COMPLETED,
          attemptId: first.attempt_id ?? undefined,
        }),
      ).rejects.toBeInstanceOf(InvalidTransitionException);
      expect((await library.getItem(item.id)).status).toBe(AudioItemStatus.PROCESSING);
    });

    test('lets only one of two concurrent claims win', async () => {
      const item = await ctx.seedQueued();

      const results = await Promise.allSettled([
        library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING }),
        library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING }),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(InvalidTransitionException);
    });

    test('throws NotFound for unknown ids', async () => {
      await expect(
        library.updateStatus(UNKNOWN_ID, { status: AudioItemStatus.PROCESSING }),
      ).rejects.toBeInstanceOf(AudioItemNotFoundException);
    });
  });

  // ── deleteItem ──

  describe('deleteItem', () => {
    test('removes the item, its segments and its file', async () => {
      const item = await ctx.seedCompleted(SAMPLE_DRAFTS);

      const result = await library.deleteItem(item.id);

      expect(result).toEqual({ id: item.id, deleted: true, file_deleted: true, warning: null });
      await expect(library.getItem(item.id)).rejects.toBeInstanceOf(AudioItemNotFoundException);
      expect(ctx.db.segments.has(item.id)).toBe(false);
      expect(await ctx.segments.getSegments(item.id)).toEqual([]);
      expect(ctx.storage.files.has(item.storage_ref)).toBe(false);
    });

    test('reports a storage warning when the file cannot be removed', async () => {
      const item = await ctx.seedQueued();
      ctx.storage.failDeletes = true;

      const result = await library.deleteItem(item.id);

      expect(result).toEqual({
        id: item.id,
        deleted: true,
        file_deleted: false,
        warning: { code: 'STORAGE_ERROR', message: 'bucket unavailable' },
      });
      await expect(library.getItem(item.id)).rejects.toBeInstanceOf(AudioItemNotFoundException);
    });

    test('throws NotFound for unknown ids', async () => {
      await expect(library.deleteItem(UNKNOWN_ID)).rejects.toBeInstanceOf(AudioItemNotFoundException);
    });
  });

  // ── formatItem ──

  describe('formatItem', () => {
    test('adds a poll hint while work is pending', async () => {
      const item = await ctx.seedQueued();
      const formatted = library.formatItem(item);
      expect(formatted.retry_after).toBe(5);
      expect(formatted.error).toBeNull();
      expect(formatted).not.toHaveProperty('storage_ref');
    });

    test('exposes the failure as an error object', async () => {
      const item = await ctx.seedQueued();
      await library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });
      const failed = await library.updateStatus(item.id, {
        status: AudioItemStatus.FAILED,
        reason: FailureReason.STORAGE_ERROR,
        message: 'disk full',
      });

      const formatted = library.formatItem(failed);
      expect(formatted.error).toEqual({ code: 'storage_error', message: 'disk full' });
      expect(formatted.retry_after).toBeUndefined();
    });
  });
});
