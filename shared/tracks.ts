/**
 * Canonical track record shared by every stage of the pipeline.
 * Keys are snake_case where they end up in the exported JSON/CSV as-is.
 */
export type TrackRecord = Readonly<{
  name: string | null,
  artists: string,
  album: string | null,
  uri: string | null,
  id: string | null,
  duration_ms: number | null,
  cover_url: string | null,
}>;

export type FailureRecord = Readonly<{
  name: string | null,
  artists: string,
  reason: FailureReason,
}>;

export type FailureReason =
  'tool error' |
  'file not found after download' |
  'unexpected error';

export type AudioFormat = 'mp3' | 'm4a' | 'opus' | 'vorbis' | 'wav';

export const AUDIO_FORMATS: ReadonlyArray<AudioFormat> = ['mp3', 'm4a', 'opus', 'vorbis', 'wav'];

export type ExportFormat = 'json' | 'csv';

export type TrackOutcome = {
  ok: true,
  index: number,
  track: TrackRecord,
  filePath: string,
  tagged: boolean,
} | {
  ok: false,
  index: number,
  track: TrackRecord,
  reason: FailureReason,
};
