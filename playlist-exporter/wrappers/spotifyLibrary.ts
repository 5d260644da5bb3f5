import { getAccessToken } from './spotify';
import { asRecord, readString } from '../extractTrack';
import type { Session } from '../loadSession';
import PlaylistExportError from '../../shared/PlaylistExportError';
import { parsePlaylistId } from '../../shared/util';

const API_BASE = 'https://api.spotify.com/v1';
const REQUEST_TIMEOUT_MS = 15_000;

/** Playlist mutations on behalf of a logged-in session. */
export class PrivatePlaylist {
  private session: Session;
  public readonly playlistId?: string;

  constructor(session: Session, playlist?: string) {
    this.session = session;
    this.playlistId = playlist ? parsePlaylistId(playlist) : undefined;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const token = await getAccessToken(this.session);
    const response = await fetch(`${API_BASE}${path}`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`Spotify API error (${response.status}) on ${path}`);
    }
    return response.json();
  }

  /** Creates a private playlist and returns its URI. */
  async createPlaylist(name: string): Promise<string> {
    const created = asRecord(await this.post('/me/playlists', { name, public: false }));
    const uri = readString(created, 'uri');
    if (!uri) throw new Error('Playlist was created but the response had no URI');
    return uri;
  }

  async addTrack(trackId: string): Promise<void> {
    if (!this.playlistId) {
      throw new PlaylistExportError('USAGE', 'No playlist to add the track to');
    }
    await this.post(`/playlists/${this.playlistId}/tracks`, { uris: [`spotify:track:${trackId}`] });
  }
}
