import { isLogLevelEnabled, type LogLevel } from './config';

export type Logger = (...args: unknown[]) => void;

export const createLogger = (name: string, logLevel: LogLevel = 'info'): Logger => {
  return (...args: unknown[]) => {
    if (!isLogLevelEnabled(logLevel)) return;
    console[logLevel](new Date().toLocaleString(), `[${name}]`, ...args);
  };
};

export const isURL = (s: string) => {
  try {
    return Boolean(s.match(/^\s*https?:/) && new URL(s));
  } catch (err) {
    return false;
  }
};

// raw ID, spotify:track:ID or https://open.spotify.com/track/ID
export const parseTrackId = (s: string) => {
  const match = s.match(/(?:(?:spotify:track:)|(?:open\.spotify\.com\/track\/))?([A-Za-z0-9]{10,})/);
  return match ? match[1] : s;
};

export const parsePlaylistId = (s: string) => {
  const trimmed = s.trim();
  if (isURL(trimmed)) {
    const url = new URL(trimmed);
    const pathMatch = url.pathname.match(/\/playlist\/([A-Za-z0-9]+)/);
    if (pathMatch) return pathMatch[1];
  }
  const uriMatch = trimmed.match(/playlist:([A-Za-z0-9]+)/);
  if (uriMatch) return uriMatch[1];
  return trimmed;
};

export const zeroPad = (n: number, width: number) => String(n).padStart(width, '0');
