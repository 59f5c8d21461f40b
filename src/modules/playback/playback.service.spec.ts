import { PlaybackService } from './playback.service';
import { AudioItemStatus, FailureReason } from '../../database/entities';
import {
  AudioItemNotFoundException,
  InvalidTransitionException,
  SegmentOutOfRangeException,
} from '../../common/exceptions/domain.exceptions';
import { createTestContext, SAMPLE_DRAFTS, TestContext } from '../../../test/fakes/test-context';

const UNKNOWN_ID = '3f1f4f0e-0000-4000-8000-000000000000';

describe('PlaybackService', () => {
  let ctx: TestContext;
  let playback: PlaybackService;

  beforeEach(async () => {
    ctx = await createTestContext();
    playback = ctx.playback;
  });

  // ── completed items ──

  describe('completed item', () => {
    test('returns the item with its ordered segments', async () => {
      const item = await ctx.seedCompleted(SAMPLE_DRAFTS);

      const transcript = await playback.fetchTranscript(item.id);

      expect(transcript.item.status).toBe(AudioItemStatus.COMPLETED);
      expect(transcript.segments.map((s) => s.index)).toEqual([0, 1]);
    });

    test('locates and seeks', async () => {
      const item = await ctx.seedCompleted(SAMPLE_DRAFTS);

      expect(await playback.locateSegmentAt(item.id, 0)).toBe(0);
      expect(await playback.locateSegmentAt(item.id, 5)).toBe(1);
      expect(await playback.locateSegmentAt(item.id, -1)).toBeNull();
      expect(await playback.seekTargetForSegment(item.id, 0)).toBe(0);
      expect(await playback.seekTargetForSegment(item.id, 1)).toBe(4.5);
    });

    test('rejects seeks outside the segment list', async () => {
      const item = await ctx.seedCompleted(SAMPLE_DRAFTS);

      await expect(playback.seekTargetForSegment(item.id, 2)).rejects.toBeInstanceOf(
        SegmentOutOfRangeException,
      );
      await expect(playback.seekTargetForSegment(item.id, -1)).rejects.toBeInstanceOf(
        SegmentOutOfRangeException,
      );
    });

    test('exports subtitles', async () => {
      const item = await ctx.seedCompleted(SAMPLE_DRAFTS);

      expect(await playback.exportSubtitles(item.id, 'srt')).toBe(
        '1\n00:00:00,000 --> 00:00:04,500\nhello\n\n2\n00:00:04,500 --> 00:00:09,800\nworld\n',
      );
    });

    test('opens the stored audio', async () => {
      const item = await ctx.seedCompleted(SAMPLE_DRAFTS, 'lesson.mp3');

      const audio = await playback.openAudio(item.id);

      expect(audio.buffer.toString()).toBe('fake-audio');
      expect(audio.contentType).toBe('audio/mpeg');
      expect(audio.filename).toBe('lesson.mp3');
    });
  });

  // ── unfinished items ──

  describe('unfinished item', () => {
    test('hides segments until the item completes', async () => {
      const item = await ctx.seedQueued();
      await ctx.segments.replaceSegments(item.id, SAMPLE_DRAFTS);

      const transcript = await playback.fetchTranscript(item.id);

      expect(transcript.item.status).toBe(AudioItemStatus.QUEUED);
      expect(transcript.segments).toEqual([]);
      expect(await playback.locateSegmentAt(item.id, 5)).toBeNull();
    });

    test('hides segments left by a failed attempt while a retry is processing', async () => {
      const item = await ctx.seedQueued();
      await ctx.library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });
      await ctx.segments.replaceSegments(item.id, SAMPLE_DRAFTS);
      await ctx.library.updateStatus(item.id, {
        status: AudioItemStatus.FAILED,
        reason: FailureReason.RECOGNITION_ERROR,
        message: 'engine crashed',
      });
      await ctx.library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });

      const transcript = await playback.fetchTranscript(item.id);

      expect(transcript.item.status).toBe(AudioItemStatus.PROCESSING);
      expect(transcript.segments).toEqual([]);
      expect(await playback.locateSegmentAt(item.id, 5)).toBeNull();
    });

    test('has nothing to seek to', async () => {
      const item = await ctx.seedQueued();

      await expect(playback.seekTargetForSegment(item.id, 0)).rejects.toMatchObject({
        message: '片段索引越界: 0（共 0 个片段）',
      });
    });

    test('refuses to export subtitles', async () => {
      const item = await ctx.seedQueued();
      await ctx.library.updateStatus(item.id, { status: AudioItemStatus.PROCESSING });

      await expect(playback.exportSubtitles(item.id, 'vtt')).rejects.toBeInstanceOf(
        InvalidTransitionException,
      );
    });
  });

  test('throws NotFound for unknown items', async () => {
    await expect(playback.fetchTranscript(UNKNOWN_ID)).rejects.toBeInstanceOf(AudioItemNotFoundException);
    await expect(playback.locateSegmentAt(UNKNOWN_ID, 1)).rejects.toBeInstanceOf(
      AudioItemNotFoundException,
    );
    await expect(playback.openAudio(UNKNOWN_ID)).rejects.toBeInstanceOf(AudioItemNotFoundException);
  });
});
