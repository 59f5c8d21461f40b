export const TRANSCRIPTION_QUEUE = 'transcription';

export interface TranscriptionJobData {
  audio_item_id: string;
}
