import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { type Mock, vi } from 'vitest';
import { createTrackDescriptor, type TrackFields } from '../src/normalize.js';
import type { RawPlaylistItem, RawTrack, TrackDescriptor } from '../src/types.js';
import type { Logger } from '../src/utils.js';

export const makeTrack = (overrides: Partial<TrackFields> = {}): TrackDescriptor =>
  createTrackDescriptor({
    title: 'Test',
    artists: ['A'],
    album: 'Album',
    albumArtist: 'A',
    trackNumber: 1,
    discNumber: 1,
    durationMs: 180_000,
    releaseYear: 2021,
    catalogUrl: 'https://open.spotify.com/track/track-a',
    coverArtUrl: null,
    genres: [],
    isrc: null,
    explicit: false,
    ...overrides,
  });

export const makeRawTrack = (overrides: Partial<RawTrack> = {}): RawTrack => ({
  type: 'track',
  id: 'track-1',
  name: 'Song One',
  artists: [{ id: 'artist-1', name: 'Band' }],
  album: {
    name: 'First Album',
    artists: [{ id: 'artist-1', name: 'Band' }],
    images: [
      { url: 'https://img.example/small.jpg', width: 64, height: 64 },
      { url: 'https://img.example/large.jpg', width: 640, height: 640 },
    ],
    release_date: '2019-05-17',
  },
  track_number: 4,
  disc_number: 1,
  duration_ms: 215_000,
  explicit: false,
  external_ids: { isrc: 'TEST00000001' },
  external_urls: { spotify: 'https://open.spotify.com/track/track-1' },
  uri: 'spotify:track:track-1',
  ...overrides,
});

export const playlistItem = (track: RawTrack | null, isLocal = false): RawPlaylistItem => ({
  is_local: isLocal,
  track,
});

export interface RecordingLogger extends Logger {
  readonly info: Mock<[string], void>;
  readonly warn: Mock<[string], void>;
  readonly error: Mock<[string], void>;
}

export const createRecordingLogger = (): RecordingLogger => ({
  info: vi.fn<[string], void>(),
  warn: vi.fn<[string], void>(),
  error: vi.fn<[string], void>(),
});

export const makeTempDir = (prefix: string): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
