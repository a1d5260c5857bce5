/**
 * Spotify Web API access through spotify-web-api-node, using the Client
 * Credentials flow (no user login). Playlist tracks are paged 100 at a time.
 */

import SpotifyWebApi from 'spotify-web-api-node';
import type { AppConfig } from './config.js';
import { requireCredentials } from './config.js';
import { normalizePlaylist, withGenres } from './normalize.js';
import type { PlaylistMeta, PlaylistSummary, RawPlaylistItem, TrackDescriptor } from './types.js';
import type { Logger } from './utils.js';

const PAGE_SIZE = 100;
export const PLAYLIST_SEARCH_LIMIT = 20;
/** Refresh this long before the token would actually expire. */
const TOKEN_REFRESH_BUFFER_MS = 60_000;

export interface PlaylistContents {
  readonly meta: PlaylistMeta;
  readonly items: readonly RawPlaylistItem[];
}

export interface LoadedPlaylist {
  readonly meta: PlaylistMeta;
  readonly tracks: readonly TrackDescriptor[];
  /** Entries dropped because they were local files, episodes or empty. */
  readonly skippedCount: number;
}

export class SpotifyCatalog {
  private readonly client: SpotifyWebApi;
  private expiresAt = 0;
  private readonly genreCache = new Map<string, readonly string[]>();

  constructor(
    clientId: string,
    clientSecret: string,
    private readonly logger: Logger,
  ) {
    this.client = new SpotifyWebApi({ clientId, clientSecret });
  }

  static fromConfig(config: AppConfig, logger: Logger): SpotifyCatalog {
    requireCredentials(config);
    return new SpotifyCatalog(config.spotifyClientId, config.spotifyClientSecret, logger);
  }

  private async authorize(): Promise<void> {
    if (Date.now() < this.expiresAt - TOKEN_REFRESH_BUFFER_MS) {
      return;
    }
    const grant = await this.client.clientCredentialsGrant();
    this.client.setAccessToken(grant.body.access_token);
    this.expiresAt = Date.now() + grant.body.expires_in * 1000;
  }

  /**
   * Fetches playlist metadata and every entry, following pagination.
   */
  async getPlaylist(playlistId: string): Promise<PlaylistContents> {
    await this.authorize();
    const playlist = await this.client.getPlaylist(playlistId);

    const items: RawPlaylistItem[] = [];
    let offset = 0;
    for (;;) {
      const page = await this.client.getPlaylistTracks(playlistId, { offset, limit: PAGE_SIZE });
      items.push(...page.body.items);
      offset += page.body.items.length;
      if (!page.body.next || page.body.items.length === 0) {
        break;
      }
    }

    return {
      meta: {
        id: playlistId,
        name: playlist.body.name,
        description: playlist.body.description ?? '',
        owner: playlist.body.owner.display_name ?? playlist.body.owner.id,
        totalTracks: playlist.body.tracks.total,
      },
      items,
    };
  }

  /**
   * Genres of one artist; an empty list when the lookup fails.
   */
  async getArtistGenres(artistId: string): Promise<readonly string[]> {
    const cached = this.genreCache.get(artistId);
    if (cached) {
      return cached;
    }
    try {
      await this.authorize();
      const artist = await this.client.getArtist(artistId);
      const genres = artist.body.genres;
      this.genreCache.set(artistId, genres);
      return genres;
    } catch (error) {
      this.logger.warn(
        `Could not load genres for artist ${artistId}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }
  }

  /**
   * Searches public playlists by keyword, dropping empty ones.
   */
  async searchPlaylists(query: string, limit: number = PLAYLIST_SEARCH_LIMIT): Promise<PlaylistSummary[]> {
    await this.authorize();
    const response = await this.client.searchPlaylists(query, { limit });
    const items = response.body.playlists?.items ?? [];
    return items
      .filter((playlist) => (playlist?.tracks?.total ?? 0) > 0)
      .map((playlist) => ({
        id: playlist.id,
        name: playlist.name,
        tracks: playlist.tracks.total,
        owner: playlist.owner.display_name ?? 'Unknown',
        url: `https://open.spotify.com/playlist/${playlist.id}`,
        image: playlist.images[0]?.url ?? null,
      }));
  }

  /**
   * Authorizes and runs a minimal search. Throws when Spotify cannot be reached.
   */
  async testConnection(): Promise<void> {
    await this.authorize();
    await this.client.searchArtists('test', { limit: 1 });
  }

  /**
   * Loads, normalizes and enriches a playlist with the first artist's genres.
   */
  async loadPlaylist(playlistId: string): Promise<LoadedPlaylist> {
    const { meta, items } = await this.getPlaylist(playlistId);
    const normalized = normalizePlaylist(items);
    const artistIds = firstArtistIds(items);

    const tracks: TrackDescriptor[] = [];
    for (const [index, track] of normalized.tracks.entries()) {
      const artistId = artistIds.get(track.catalogUrl);
      const genres = artistId ? await this.getArtistGenres(artistId) : [];
      tracks.push(withGenres(track, genres));
      if ((index + 1) % 10 === 0) {
        this.logger.info(`📝 Processed ${index + 1}/${normalized.tracks.length} tracks...`);
      }
    }
    return { meta, tracks, skippedCount: normalized.skippedCount };
  }
}

/**
 * Maps each entry's catalog URL to the id of its first artist.
 */
const firstArtistIds = (items: readonly RawPlaylistItem[]): Map<string, string> => {
  const ids = new Map<string, string>();
  for (const item of items) {
    const track = item.track;
    const artistId = track?.artists?.[0]?.id;
    const url = track?.external_urls?.spotify;
    if (url && artistId) {
      ids.set(url, artistId);
    }
  }
  return ids;
};
