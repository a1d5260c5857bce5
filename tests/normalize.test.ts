import { describe, expect, it } from 'vitest';
import { InvalidTrackKindError } from '../src/errors.js';
import {
  buildSearchQuery,
  normalizePlaylist,
  normalizeTrack,
  parseReleaseYear,
  withChanges,
  withGenres,
} from '../src/normalize.js';
import { makeRawTrack, makeTrack, playlistItem } from './fixtures.js';

describe('buildSearchQuery', () => {
  it('joins artists with a comma and appends the title', () => {
    expect(buildSearchQuery(['A'], 'Test')).toBe('A - Test');
    expect(buildSearchQuery(['Artist One', 'Artist Two'], 'Duet')).toBe('Artist One, Artist Two - Duet');
  });
});

describe('parseReleaseYear', () => {
  it('reads the year from every Spotify date precision', () => {
    expect(parseReleaseYear('2021')).toBe(2021);
    expect(parseReleaseYear('2021-06')).toBe(2021);
    expect(parseReleaseYear('2021-06-04')).toBe(2021);
  });

  it('returns null for missing or malformed dates', () => {
    expect(parseReleaseYear(undefined)).toBeNull();
    expect(parseReleaseYear(null)).toBeNull();
    expect(parseReleaseYear('')).toBeNull();
    expect(parseReleaseYear('June 2021')).toBeNull();
    expect(parseReleaseYear('0000-00-00x')).toBeNull();
  });
});

describe('normalizeTrack', () => {
  it('maps every catalog field', () => {
    const track = normalizeTrack(playlistItem(makeRawTrack()));

    expect(track).toEqual({
      title: 'Song One',
      artists: ['Band'],
      album: 'First Album',
      albumArtist: 'Band',
      trackNumber: 4,
      discNumber: 1,
      durationMs: 215_000,
      releaseYear: 2019,
      catalogUrl: 'https://open.spotify.com/track/track-1',
      coverArtUrl: 'https://img.example/large.jpg',
      genres: [],
      isrc: 'TEST00000001',
      explicit: false,
      searchQuery: 'Band - Song One',
    });
    expect(Object.isFrozen(track)).toBe(true);
  });

  it('falls back to the first track artist when the album has none', () => {
    const raw = makeRawTrack({
      artists: [
        { id: 'x', name: 'Lead' },
        { id: 'y', name: 'Guest' },
      ],
      album: { name: 'Solo', artists: [], images: [], release_date: null },
    });

    const track = normalizeTrack(playlistItem(raw));

    expect(track.albumArtist).toBe('Lead');
    expect(track.searchQuery).toBe('Lead, Guest - Song One');
    expect(track.coverArtUrl).toBeNull();
    expect(track.releaseYear).toBeNull();
  });

  it('defaults missing positions and identifiers', () => {
    const raw = makeRawTrack({
      track_number: 0,
      disc_number: undefined,
      external_ids: {},
      external_urls: {},
      uri: undefined,
    });

    const track = normalizeTrack(playlistItem(raw));

    expect(track.trackNumber).toBe(1);
    expect(track.discNumber).toBe(1);
    expect(track.isrc).toBeNull();
    expect(track.catalogUrl).toBe('spotify:track:track-1');
  });

  it('rejects local files, episodes, empty slots and artistless tracks', () => {
    expect(() => normalizeTrack(playlistItem(null))).toThrow(InvalidTrackKindError);
    expect(() => normalizeTrack(playlistItem(makeRawTrack(), true))).toThrow(InvalidTrackKindError);
    expect(() => normalizeTrack(playlistItem(makeRawTrack({ type: 'episode' })))).toThrow(
      'Unsupported item type "episode" for "Song One"',
    );
    expect(() => normalizeTrack(playlistItem(makeRawTrack({ artists: [] })))).toThrow(InvalidTrackKindError);
  });
});

describe('normalizePlaylist', () => {
  it('keeps playable tracks in order and counts the rest', () => {
    const result = normalizePlaylist([
      playlistItem(makeRawTrack({ name: 'One' })),
      playlistItem(makeRawTrack({ type: 'episode', name: 'Podcast' })),
      playlistItem(makeRawTrack({ name: 'Two' })),
      playlistItem(null),
      playlistItem(makeRawTrack({ name: 'Local', is_local: true })),
    ]);

    expect(result.tracks.map((track) => track.title)).toEqual(['One', 'Two']);
    expect(result.skippedCount).toBe(3);
  });
});

describe('descriptor copies', () => {
  it('re-derives the search query when fields change', () => {
    const original = makeTrack();
    const renamed = withChanges(original, { title: 'Other', artists: ['B', 'C'] });

    expect(renamed.searchQuery).toBe('B, C - Other');
    expect(original.searchQuery).toBe('A - Test');
  });

  it('caps genres at three', () => {
    const track = withGenres(makeTrack(), ['rock', 'indie', 'pop', 'folk']);
    expect(track.genres).toEqual(['rock', 'indie', 'pop']);
  });
});
