import { spawn } from 'child_process';
import { config } from '../../shared/config';
import { createLogger } from '../../shared/util';
import type { AudioFormat } from '../../shared/tracks';

export const AUDIO_QUALITY = '192';
export const DOWNLOAD_TIMEOUT_MS = 60_000;
const STDERR_TAIL_LENGTH = 500;

const log = createLogger('yt-dlp', 'debug');

export interface AudioDownloadRequest {
  query: string,
  outputTemplate: string,
  audioFormat: AudioFormat,
}

export type AudioDownloadResult = { ok: true } | { ok: false, detail: string };

export function buildDownloadArgs({ query, outputTemplate, audioFormat }: AudioDownloadRequest) {
  return [
    '-f', 'bestaudio/best',
    '--extract-audio',
    '--audio-format', audioFormat,
    '--audio-quality', AUDIO_QUALITY,
    '-o', outputTemplate,
    `ytsearch:${query}`,
  ];
}

export function isYtDlpAvailable(binary: string = config.ytDlpPath) {
  return new Promise<boolean>((resolve) => {
    const cmd = spawn(binary, ['--version'], { stdio: 'ignore' });
    cmd.on('error', () => resolve(false));
    cmd.on('close', (code) => resolve(code === 0));
  });
}

/**
 * Search for `query` and extract the best audio stream into `outputTemplate`.
 * Never rejects: a non-zero exit, the timeout, or a spawn failure all come back as `ok: false`.
 */
export function downloadAudio(
  request: AudioDownloadRequest,
  binary: string = config.ytDlpPath,
  timeoutMs: number = DOWNLOAD_TIMEOUT_MS,
) {
  return new Promise<AudioDownloadResult>((resolve) => {
    const cmd = spawn(binary, buildDownloadArgs(request), {
      timeout: timeoutMs,
      stdio: ['ignore', 'ignore', 'pipe'],
    });
    let stderr = '';
    cmd.stderr?.on('data', (msg) => {
      stderr = (stderr + msg.toString()).slice(-STDERR_TAIL_LENGTH);
    });
    cmd.on('error', (err) => {
      resolve({ ok: false, detail: err.message });
    });
    cmd.on('close', (code, signal) => {
      if (code === 0) return resolve({ ok: true });
      if (stderr) log('stderr:', stderr.trim());
      // `killed` is only set when the kill came from us, i.e. the spawn timeout
      if (signal === 'SIGTERM' && cmd.killed) return resolve({ ok: false, detail: `timed out after ${timeoutMs}ms` });
      if (signal) return resolve({ ok: false, detail: `killed by ${signal}` });
      resolve({ ok: false, detail: `exit code ${code}` });
    });
  });
}
