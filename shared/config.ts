export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

// defaults for the web player's persisted GraphQL queries, override with env when they rotate
const DEFAULT_FETCH_PLAYLIST_HASH = '19ff1327c29e99c208c86d7a9d8f1929cfdf3d3202a0ff4253c821f1901aa94d';
const DEFAULT_SEARCH_HASH = '21969b655b795601fb2d2204a4243188e75fdc6d3520e7b9cd3f4db2aff9591e';

const readEnv = (name: string) => {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
};

const readLogLevel = (): LogLevel => {
  const raw = readEnv('LOG_LEVEL')?.toLowerCase();
  return LOG_LEVELS.find(level => level === raw) ?? 'info';
};

const readPositiveInt = (name: string, fallback: number) => {
  const parsed = Number.parseInt(readEnv(name) ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const config = {
  logLevel: readLogLevel(),
  ytDlpPath: readEnv('YT_DLP_PATH') ?? 'yt-dlp',
  spotifyAuthToken: readEnv('SPOTIFY_AUTH_TOKEN'),
  spotifyFetchPlaylistHash: readEnv('SPOTIFY_FETCH_PLAYLIST_HASH') ?? DEFAULT_FETCH_PLAYLIST_HASH,
  spotifySearchHash: readEnv('SPOTIFY_SEARCH_HASH') ?? DEFAULT_SEARCH_HASH,
  spotifyMinRequestIntervalMs: readPositiveInt('SPOTIFY_MIN_REQUEST_INTERVAL_MS', 334),
};

export const isLogLevelEnabled = (level: LogLevel) =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(config.logLevel);
