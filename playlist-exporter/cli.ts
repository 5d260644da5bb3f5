import { parseArgs, type ParseArgsConfig } from 'util';
import acquirePlaylistAudio from './acquirePlaylistAudio';
import collectPlaylistTracks, { type PlaylistSource } from './collectPlaylistTracks';
import exportTracks, { isExportFormat } from './exportTracks';
import extractTrack, { asRecord, dig, getPlaylistItems, joinArtistNames, readString } from './extractTrack';
import loadSession, { type Session } from './loadSession';
import { PublicPlaylist, getSearchItems, searchSongs } from './wrappers/spotify';
import { PrivatePlaylist } from './wrappers/spotifyLibrary';
import { isYtDlpAvailable } from './wrappers/yt-dlp';
import PlaylistExportError from '../shared/PlaylistExportError';
import { AUDIO_FORMATS, type AudioFormat } from '../shared/tracks';
import { parseTrackId, zeroPad } from '../shared/util';

export interface CliDeps {
  openPlaylist: (playlist: string) => PlaylistSource,
  searchSongs: (query: string, limit: number, offset: number) => Promise<unknown>,
  isToolAvailable: () => Promise<boolean>,
  acquirePlaylistAudio: typeof acquirePlaylistAudio,
  loadSession: (path: string) => Session,
  openPrivatePlaylist: (session: Session, playlist?: string) => Pick<PrivatePlaylist, 'createPlaylist' | 'addTrack'>,
  print: (line: string) => void,
  printError: (line: string) => void,
}

const defaultDeps: CliDeps = {
  openPlaylist: (playlist) => new PublicPlaylist(playlist),
  searchSongs,
  isToolAvailable: () => isYtDlpAvailable(),
  acquirePlaylistAudio,
  loadSession,
  openPrivatePlaylist: (session, playlist) => new PrivatePlaylist(session, playlist),
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
};

type Options = NonNullable<ParseArgsConfig['options']>;
type Values = Record<string, string | undefined>;

interface Command {
  description: string,
  options: Options,
  required: string[],
  handler: (values: Values, deps: CliDeps) => Promise<number>,
}

const USAGE = 'Usage: playlist-exporter <command> [options]';

const readInt = (raw: string | undefined, name: string, fallback: number) => {
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new PlaylistExportError('USAGE', `--${name} must be a non-negative integer`);
  }
  return parsed;
};

const formatListing = (index: number, name: string | null, artists: string, uri: string | null) =>
  `${zeroPad(index, 2)} | ${name ?? ''} — ${artists} | ${uri ?? ''}`;

const NO_TRACKS = 'No tracks found or playlist inaccessible.';

async function cmdSearch(values: Values, deps: CliDeps) {
  const limit = readInt(values.limit, 'limit', 10);
  const offset = readInt(values.offset, 'offset', 0);
  const result = await deps.searchSongs(values.query ?? '', limit, offset);
  getSearchItems(result).forEach((item, index) => {
    const data = asRecord(dig(item, 'item', 'data'));
    deps.print(formatListing(index, readString(data, 'name'), joinArtistNames(data?.artists), readString(data, 'uri')));
  });
  return 0;
}

async function cmdPublicPlaylist(values: Values, deps: CliDeps) {
  const limit = readInt(values.limit, 'limit', 25);
  const offset = readInt(values.offset, 'offset', 0);
  const info = await deps.openPlaylist(values.playlist ?? '').getPlaylistInfo(limit, offset);
  const header = dig(info, 'data', 'playlistV2', 'name');
  deps.print(typeof header === 'string' && header ? header : 'Playlist');
  getPlaylistItems(info).forEach((entry, index) => {
    const track = extractTrack(entry);
    if (!track) return;
    deps.print(formatListing(index, track.name, track.artists, track.uri));
  });
  return 0;
}

async function cmdExportPlaylist(values: Values, deps: CliDeps) {
  const format = (values.format ?? 'json').toLowerCase();
  if (!isExportFormat(format)) {
    throw new PlaylistExportError('UNSUPPORTED_FORMAT', 'Unsupported format. Use json or csv.');
  }
  const tracks = await collectPlaylistTracks(deps.openPlaylist(values.playlist ?? ''));
  if (!tracks.length) {
    throw new PlaylistExportError('EMPTY_PLAYLIST', NO_TRACKS);
  }
  const output = values.output ?? '';
  exportTracks(output, tracks, format);
  deps.print(`Exported ${tracks.length} tracks to ${output}`);
  return 0;
}

const isAudioFormat = (format: string): format is AudioFormat =>
  AUDIO_FORMATS.some(candidate => candidate === format);

async function cmdExportPlaylistWithAudio(values: Values, deps: CliDeps) {
  const audioFormat = values['audio-format'] ?? 'mp3';
  if (!isAudioFormat(audioFormat)) {
    throw new PlaylistExportError('USAGE', `--audio-format must be one of ${AUDIO_FORMATS.join(', ')}`);
  }
  // checked before fetching; acquisition reuses the same answer
  const toolCheck = deps.isToolAvailable();
  if (!(await toolCheck)) {
    throw new PlaylistExportError('TOOL_NOT_FOUND', 'yt-dlp not found. Install it: pip install yt-dlp');
  }
  const tracks = await collectPlaylistTracks(deps.openPlaylist(values.playlist ?? ''));
  if (!tracks.length) {
    throw new PlaylistExportError('EMPTY_PLAYLIST', NO_TRACKS);
  }
  await deps.acquirePlaylistAudio(
    tracks,
    { outputDir: values.output ?? '', audioFormat },
    { isToolAvailable: () => toolCheck },
  );
  return 0;
}

async function cmdCreatePlaylist(values: Values, deps: CliDeps) {
  const session = deps.loadSession(values.cookies ?? '');
  const uri = await deps.openPrivatePlaylist(session).createPlaylist(values.name ?? '');
  deps.print(uri);
  return 0;
}

async function resolveSongId(values: Values, deps: CliDeps) {
  if (values['song-id']) return parseTrackId(values['song-id']);

  const result = await deps.searchSongs(values.query ?? '', 1, 0);
  const [top] = getSearchItems(result);
  if (top === undefined) {
    throw new PlaylistExportError('EMPTY_PLAYLIST', 'No results found for query.');
  }
  const uri = readString(asRecord(dig(top, 'item', 'data')), 'uri');
  if (!uri) {
    throw new PlaylistExportError('EMPTY_PLAYLIST', 'Top result missing URI.');
  }
  return parseTrackId(uri);
}

async function cmdAddToPlaylist(values: Values, deps: CliDeps) {
  if (Boolean(values['song-id']) === Boolean(values.query)) {
    throw new PlaylistExportError('USAGE', 'Provide either --song-id or --query');
  }
  const session = deps.loadSession(values.cookies ?? '');
  const songId = await resolveSongId(values, deps);
  await deps.openPrivatePlaylist(session, values.playlist).addTrack(songId);
  deps.print('Added.');
  return 0;
}

const stringOption = { type: 'string' } as const;

export const COMMANDS: Record<string, Command> = {
  'search': {
    description: 'Search songs (public)',
    options: { query: stringOption, limit: stringOption, offset: stringOption },
    required: ['query'],
    handler: cmdSearch,
  },
  'public-playlist': {
    description: 'Fetch public playlist info',
    options: { playlist: stringOption, limit: stringOption, offset: stringOption },
    required: ['playlist'],
    handler: cmdPublicPlaylist,
  },
  'export-playlist': {
    description: 'Export playlist tracks to JSON/CSV',
    options: { playlist: stringOption, format: stringOption, output: stringOption },
    required: ['playlist', 'output'],
    handler: cmdExportPlaylist,
  },
  'export-playlist-with-audio': {
    description: 'Export playlist metadata and download audio with yt-dlp',
    options: { 'playlist': stringOption, 'output': stringOption, 'audio-format': stringOption },
    required: ['playlist', 'output'],
    handler: cmdExportPlaylistWithAudio,
  },
  'create-playlist': {
    description: 'Create a playlist (auth)',
    options: { name: stringOption, cookies: stringOption },
    required: ['name', 'cookies'],
    handler: cmdCreatePlaylist,
  },
  'add-to-playlist': {
    description: 'Add a song to a playlist (auth)',
    options: { 'playlist': stringOption, 'song-id': stringOption, 'query': stringOption, 'cookies': stringOption },
    required: ['playlist', 'cookies'],
    handler: cmdAddToPlaylist,
  },
};

export const usage = () => [
  USAGE,
  '',
  'Commands:',
  ...Object.entries(COMMANDS).map(([name, command]) => `  ${name.padEnd(28)}${command.description}`),
].join('\n');

function parseCommandArgs(command: Command, args: string[]): Values {
  const values: Values = {};
  try {
    const parsed = parseArgs({ args, options: command.options, strict: true, allowPositionals: false });
    for (const [key, value] of Object.entries(parsed.values)) {
      if (typeof value === 'string') values[key] = value;
    }
  } catch (err) {
    throw new PlaylistExportError('USAGE', err instanceof Error ? err.message : String(err));
  }
  const missing = command.required.filter(name => !values[name]);
  if (missing.length) {
    throw new PlaylistExportError('USAGE', `Missing required option(s): ${missing.map(name => `--${name}`).join(', ')}`);
  }
  return values;
}

/**
 * Run one command. Returns the process exit status:
 * 0 on success, 2 for problems the user can fix, 1 for anything unexpected.
 */
export default async function run(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const [name, ...args] = argv;
  const command = name && Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) {
    deps.printError(name ? `Unknown command: ${name}\n\n${usage()}` : usage());
    return 2;
  }
  try {
    return await command.handler(parseCommandArgs(command, args), deps);
  } catch (err) {
    if (err instanceof PlaylistExportError && err.isRecoverable) {
      deps.printError(err.message);
      return 2;
    }
    deps.printError(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
