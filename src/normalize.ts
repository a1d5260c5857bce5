import { InvalidTrackKindError, isDownloaderError } from './errors.js';
import type { RawImage, RawPlaylistItem, TrackDescriptor } from './types.js';

export const MAX_GENRES = 3;

export type TrackFields = Omit<TrackDescriptor, 'searchQuery'>;

/**
 * `Artist One, Artist Two - Title`, used both as the search query and the file name.
 */
export const buildSearchQuery = (artists: readonly string[], title: string): string =>
  `${artists.join(', ')} - ${title}`;

/**
 * The only way descriptors are made: the search query is derived here, every time.
 */
export const createTrackDescriptor = (fields: TrackFields): TrackDescriptor =>
  Object.freeze({
    ...fields,
    artists: Object.freeze([...fields.artists]),
    genres: Object.freeze(fields.genres.slice(0, MAX_GENRES)),
    searchQuery: buildSearchQuery(fields.artists, fields.title),
  });

/**
 * Copies a descriptor with some fields replaced, re-deriving the search query.
 */
export const withChanges = (
  track: TrackDescriptor,
  changes: Partial<TrackFields>,
): TrackDescriptor => {
  const { searchQuery: _previous, ...fields } = track;
  return createTrackDescriptor({ ...fields, ...changes });
};

export const withGenres = (track: TrackDescriptor, genres: readonly string[]): TrackDescriptor =>
  withChanges(track, { genres });

/**
 * Accepts "2021", "2021-06" or "2021-06-04"; anything else is treated as unknown.
 */
export const parseReleaseYear = (releaseDate: string | null | undefined): number | null => {
  const match = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/.exec((releaseDate ?? '').trim());
  if (!match) {
    return null;
  }
  return Number.parseInt(match[1], 10);
};

const pickLargestImage = (images: readonly RawImage[] | undefined): string | null => {
  if (!images || images.length === 0) {
    return null;
  }
  const [largest] = [...images].sort((a, b) => (b.width ?? 0) - (a.width ?? 0));
  return largest.url;
};

/**
 * Converts one raw playlist entry into a descriptor.
 * Throws InvalidTrackKindError for local files, episodes and empty slots.
 */
export const normalizeTrack = (item: RawPlaylistItem): TrackDescriptor => {
  const track = item.track;
  if (!track) {
    throw new InvalidTrackKindError('Playlist entry has no track');
  }
  if (item.is_local || track.is_local) {
    throw new InvalidTrackKindError(`Local file "${track.name}" cannot be downloaded`);
  }
  if (track.type !== 'track') {
    throw new InvalidTrackKindError(`Unsupported item type "${track.type}" for "${track.name}"`);
  }

  const artists = (track.artists ?? []).map((artist) => artist.name).filter((name) => name.length > 0);
  if (artists.length === 0) {
    throw new InvalidTrackKindError(`Track "${track.name}" has no artists`);
  }

  const album = track.album;
  const albumArtist = album?.artists?.[0]?.name || artists[0];
  const trackNumber = track.track_number && track.track_number > 0 ? track.track_number : 1;
  const discNumber = track.disc_number && track.disc_number > 0 ? track.disc_number : 1;

  return createTrackDescriptor({
    title: track.name,
    artists,
    album: album?.name ?? '',
    albumArtist,
    trackNumber,
    discNumber,
    durationMs: Math.max(0, track.duration_ms),
    releaseYear: parseReleaseYear(album?.release_date),
    catalogUrl: track.external_urls?.spotify ?? track.uri ?? (track.id ? `spotify:track:${track.id}` : ''),
    coverArtUrl: pickLargestImage(album?.images),
    genres: [],
    isrc: track.external_ids?.isrc || null,
    explicit: track.explicit ?? false,
  });
};

export interface NormalizedPlaylist {
  readonly tracks: readonly TrackDescriptor[];
  readonly skippedCount: number;
}

/**
 * Normalizes every entry, dropping the ones that are not playable tracks.
 */
export const normalizePlaylist = (items: readonly RawPlaylistItem[]): NormalizedPlaylist => {
  const tracks: TrackDescriptor[] = [];
  let skippedCount = 0;
  for (const item of items) {
    try {
      tracks.push(normalizeTrack(item));
    } catch (error) {
      if (isDownloaderError(error) && error.category === 'InvalidTrackKind') {
        skippedCount += 1;
        continue;
      }
      throw error;
    }
  }
  return { tracks, skippedCount };
};
