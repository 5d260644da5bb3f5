import { mkdirSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import defaultDownloadCover from './downloadCover';
import defaultEmbedTags from './embedTags';
import { writeTracksJson } from './exportTracks';
import { downloadAudio, isYtDlpAvailable, type AudioDownloadRequest, type AudioDownloadResult } from './wrappers/yt-dlp';
import PlaylistExportError from '../shared/PlaylistExportError';
import { createLogger, zeroPad, type Logger } from '../shared/util';
import type { AudioFormat, FailureRecord, TrackOutcome, TrackRecord } from '../shared/tracks';

export const METADATA_FILENAME = 'metadata.json';
export const FAILURE_REPORT_FILENAME = 'failed.json';
export const MAX_FILENAME_LENGTH = 100;

export interface AcquisitionOptions {
  outputDir: string,
  audioFormat: AudioFormat,
}

export interface AcquisitionDeps {
  isToolAvailable: () => Promise<boolean>,
  downloadAudio: (request: AudioDownloadRequest) => Promise<AudioDownloadResult>,
  downloadCover: (url: string | null) => Promise<Buffer | null>,
  embedTags: (filePath: string, track: TrackRecord, cover: Buffer | null) => unknown,
  log: Logger,
  warn: Logger,
}

export interface AcquisitionSummary {
  total: number,
  succeeded: number,
  outcomes: TrackOutcome[],
  failures: FailureRecord[],
  metadataPath: string,
  failureReportPath: string | null,
}

const defaultDeps: AcquisitionDeps = {
  isToolAvailable: () => isYtDlpAvailable(),
  downloadAudio: (request) => downloadAudio(request),
  downloadCover: defaultDownloadCover,
  embedTags: defaultEmbedTags,
  log: createLogger('Acquisition'),
  warn: createLogger('Acquisition', 'warn'),
};

export const buildSearchQuery = (track: TrackRecord) => `${track.name ?? ''} ${track.artists}`.trim();

/** `NNN_<name>` without characters that are illegal in paths, at most 100 characters long. */
export const safeFileName = (index: number, name: string | null) =>
  // counted in code points so a surrogate pair is never cut in half
  Array.from(`${zeroPad(index, 3)}_${name ?? ''}`.replace(/[<>:"/\\|?*]/g, ''))
    .slice(0, MAX_FILENAME_LENGTH)
    .join('');

/**
 * Files yt-dlp produced for an output template of `<baseName>.%(ext)s`.
 * Sorted so that the pick is the same on every platform when there is more than one.
 */
export const findDownloadedFiles = (outputDir: string, baseName: string) =>
  readdirSync(outputDir)
    .filter(file => file.startsWith(`${baseName}.`))
    .sort()
    .map(file => join(outputDir, file));

const errorMessage = (err: unknown) => err instanceof Error ? err.message : String(err);

async function acquireTrack(
  track: TrackRecord,
  index: number,
  total: number,
  { outputDir, audioFormat }: AcquisitionOptions,
  deps: AcquisitionDeps,
): Promise<TrackOutcome> {
  const query = buildSearchQuery(track);
  try {
    const baseName = safeFileName(index, track.name);
    const outputTemplate = join(outputDir, `${baseName}.%(ext)s`);
    const cover = await deps.downloadCover(track.cover_url);

    deps.log(`[${index}/${total}] Downloading: ${query}`);
    const result = await deps.downloadAudio({ query, outputTemplate, audioFormat });
    if (!result.ok) {
      deps.warn(`Failed: ${query} (${result.detail})`);
      return { ok: false, index, track, reason: 'tool error' };
    }

    const [filePath] = findDownloadedFiles(outputDir, baseName);
    if (!filePath) {
      return { ok: false, index, track, reason: 'file not found after download' };
    }

    try {
      await deps.embedTags(filePath, track, cover);
    } catch (err) {
      // the audio is there; an untagged file still counts
      deps.warn(`Tagging failed for ${filePath}: ${errorMessage(err)}`);
      return { ok: true, index, track, filePath, tagged: false };
    }
    return { ok: true, index, track, filePath, tagged: true };
  } catch (err) {
    deps.warn(`Error: ${errorMessage(err)}`);
    return { ok: false, index, track, reason: 'unexpected error' };
  }
}

/**
 * Download and tag audio for every track, one at a time, into `outputDir`.
 *
 * metadata.json (every track) is written before the first download; failed.json only when
 * something failed. A failing track never stops the batch. Throws `TOOL_NOT_FOUND` before
 * touching the filesystem if yt-dlp cannot be run. Any of `deps` left out fall back to the
 * real implementations.
 */
export default async function acquirePlaylistAudio(
  tracks: ReadonlyArray<TrackRecord>,
  options: AcquisitionOptions,
  overrides: Partial<AcquisitionDeps> = {},
): Promise<AcquisitionSummary> {
  const deps: AcquisitionDeps = { ...defaultDeps, ...overrides };
  if (!(await deps.isToolAvailable())) {
    throw new PlaylistExportError('TOOL_NOT_FOUND', 'yt-dlp not found. Install it: pip install yt-dlp');
  }

  mkdirSync(options.outputDir, { recursive: true });
  const metadataPath = join(options.outputDir, METADATA_FILENAME);
  writeTracksJson(metadataPath, tracks);
  deps.log(`Metadata saved to ${metadataPath}`);

  const outcomes: TrackOutcome[] = [];
  for (let i = 0; i < tracks.length; i++) {
    outcomes.push(await acquireTrack(tracks[i], i + 1, tracks.length, options, deps));
  }

  const failures: FailureRecord[] = [];
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push({ name: outcome.track.name, artists: outcome.track.artists, reason: outcome.reason });
    }
  }
  const succeeded = outcomes.length - failures.length;
  deps.log(`Download complete. ${succeeded}/${tracks.length} succeeded.`);

  let failureReportPath: string | null = null;
  if (failures.length) {
    failureReportPath = join(options.outputDir, FAILURE_REPORT_FILENAME);
    writeFileSync(failureReportPath, JSON.stringify(failures, null, 2), 'utf-8');
    deps.log(`Failed tracks: ${failureReportPath}`);
  }

  return {
    total: tracks.length,
    succeeded,
    outcomes,
    failures,
    metadataPath,
    failureReportPath,
  };
}
