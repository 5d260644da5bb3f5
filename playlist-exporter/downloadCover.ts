import { createLogger } from '../shared/util';

export const COVER_TIMEOUT_MS = 10_000;

const log = createLogger('Cover', 'debug');

/** Cover art bytes, or null for anything other than a 200 within the timeout. */
export default async function downloadCover(url?: string | null): Promise<Buffer | null> {
  if (!url) return null;
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(COVER_TIMEOUT_MS) });
    if (response.status !== 200) {
      log('Cover request returned', response.status, url);
      return null;
    }
    return Buffer.from(await response.arrayBuffer());
  } catch (err) {
    log('Cover request failed', url, err instanceof Error ? err.message : err);
    return null;
  }
}
