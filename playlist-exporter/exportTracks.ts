import { writeFileSync } from 'fs';
import PlaylistExportError from '../shared/PlaylistExportError';
import type { ExportFormat, TrackRecord } from '../shared/tracks';

export const CSV_COLUMNS = ['name', 'artists', 'album', 'uri', 'id', 'duration_ms'] as const;

const csvCell = (value: string | number | null) => {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export function formatTracksCsv(tracks: ReadonlyArray<TrackRecord>) {
  const rows = tracks.map(track => CSV_COLUMNS.map(column => csvCell(track[column])).join(','));
  return [CSV_COLUMNS.join(','), ...rows].map(row => `${row}\r\n`).join('');
}

export function writeTracksCsv(path: string, tracks: ReadonlyArray<TrackRecord>) {
  writeFileSync(path, formatTracksCsv(tracks), 'utf-8');
}

export function writeTracksJson(path: string, tracks: ReadonlyArray<TrackRecord>) {
  writeFileSync(path, JSON.stringify(tracks, null, 2), 'utf-8');
}

export const isExportFormat = (format: string): format is ExportFormat =>
  format === 'json' || format === 'csv';

export default function exportTracks(path: string, tracks: ReadonlyArray<TrackRecord>, format: string) {
  const normalized = format.toLowerCase();
  if (!isExportFormat(normalized)) {
    throw new PlaylistExportError('UNSUPPORTED_FORMAT', 'Unsupported format. Use json or csv.');
  }
  if (normalized === 'json') {
    writeTracksJson(path, tracks);
  } else {
    writeTracksCsv(path, tracks);
  }
}
