import { existsSync, readFileSync } from 'fs';
import { asArray, asRecord, readString } from './extractTrack';
import PlaylistExportError from '../shared/PlaylistExportError';

export interface Session {
  cookies: Record<string, string>,
  cookieHeader: string,
}

const REQUIRED_COOKIE = 'sp_dc';

// { cookies: { name: value } }, a flat { name: value } map, or a browser export [{ name, value }]
function readCookies(dump: unknown): Record<string, string> {
  const cookies: Record<string, string> = {};
  const nested = asRecord(dump)?.cookies ?? dump;
  if (Array.isArray(nested)) {
    for (const entry of asArray(nested)) {
      const name = readString(asRecord(entry), 'name');
      const value = readString(asRecord(entry), 'value');
      if (name && value !== null) cookies[name] = value;
    }
    return cookies;
  }
  for (const [name, value] of Object.entries(asRecord(nested) ?? {})) {
    if (typeof value === 'string') cookies[name] = value;
  }
  return cookies;
}

/** Session from a cookie dump on disk. A missing file is fatal and is not retried. */
export default function loadSession(path: string): Session {
  if (!existsSync(path)) {
    throw new PlaylistExportError('CREDENTIALS_NOT_FOUND', `Cookies file not found: ${path}`);
  }
  const cookies = readCookies(JSON.parse(readFileSync(path, 'utf-8')));
  if (!cookies[REQUIRED_COOKIE]) {
    throw new PlaylistExportError('INVALID_CREDENTIALS', `Cookies file has no ${REQUIRED_COOKIE} cookie: ${path}`);
  }
  return {
    cookies,
    cookieHeader: Object.entries(cookies).map(([name, value]) => `${name}=${value}`).join('; '),
  };
}
