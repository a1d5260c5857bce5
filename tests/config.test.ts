import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_PORT,
  DESKTOP_MAX_FILENAME_LENGTH,
  DESKTOP_PACING_DELAY_MS,
  MOBILE_MAX_FILENAME_LENGTH,
  MOBILE_PACING_DELAY_MS,
  isTermuxEnvironment,
  ledgerPathFor,
  loadConfig,
  requireCredentials,
} from '../src/config.js';
import { CredentialsMissingError } from '../src/errors.js';

const CWD = path.resolve('/work');
const TERMUX_PREFIX = '/data/data/com.termux/files/usr';

describe('loadConfig', () => {
  it('uses desktop defaults', () => {
    const config = loadConfig({}, CWD);

    expect(config.downloadsDir).toBe(path.join(CWD, 'downloads'));
    expect(config.tempDir).toBe(path.join(os.tmpdir(), 'playlist-to-mp3'));
    expect(config.isTermux).toBe(false);
    expect(config.pacingDelayMs).toBe(DESKTOP_PACING_DELAY_MS);
    expect(config.maxFileNameLength).toBe(DESKTOP_MAX_FILENAME_LENGTH);
    expect(config.artworkMaxSize).toBe(640);
    expect(config.qualityPreference).toEqual(['lossless', 'high', 'any']);
    expect(config.ffmpegPath).toBeUndefined();
    expect(config.port).toBe(DEFAULT_PORT);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('switches to mobile defaults inside Termux', () => {
    const config = loadConfig({ PREFIX: TERMUX_PREFIX }, CWD);

    expect(config.isTermux).toBe(true);
    expect(config.downloadsDir).toBe(path.join('/storage/emulated/0', 'Music', 'SpotifyDownloads'));
    expect(config.pacingDelayMs).toBe(MOBILE_PACING_DELAY_MS);
    expect(config.maxFileNameLength).toBe(MOBILE_MAX_FILENAME_LENGTH);
    expect(config.artworkMaxSize).toBe(500);
  });

  it('applies environment overrides and ignores invalid numbers', () => {
    const config = loadConfig(
      {
        SPOTIFY_CLIENT_ID: ' test-client ',
        SPOTIFY_CLIENT_SECRET: 'test-secret',
        DOWNLOADS_DIR: 'music',
        TEMP_DIR: 'scratch',
        PACING_DELAY_MS: 'soon',
        MAX_FILENAME_LENGTH: '-5',
        FFMPEG_PATH: '/opt/ffmpeg',
        PORT: '8080',
      },
      CWD,
    );

    expect(config.spotifyClientId).toBe('test-client');
    expect(config.spotifyClientSecret).toBe('test-secret');
    expect(config.downloadsDir).toBe(path.join(CWD, 'music'));
    expect(config.tempDir).toBe(path.join(CWD, 'scratch'));
    expect(config.pacingDelayMs).toBe(DESKTOP_PACING_DELAY_MS);
    expect(config.maxFileNameLength).toBe(DESKTOP_MAX_FILENAME_LENGTH);
    expect(config.ffmpegPath).toBe('/opt/ffmpeg');
    expect(config.port).toBe(8080);
    expect(ledgerPathFor(config)).toBe(path.join(CWD, 'music', 'failed_downloads.json'));
  });
});

describe('isTermuxEnvironment', () => {
  it('looks at the install prefix', () => {
    expect(isTermuxEnvironment({ PREFIX: TERMUX_PREFIX })).toBe(true);
    expect(isTermuxEnvironment({ PREFIX: '/usr/local' })).toBe(false);
    expect(isTermuxEnvironment({})).toBe(false);
  });
});

describe('requireCredentials', () => {
  it('names every missing variable', () => {
    expect(() => requireCredentials(loadConfig({}, CWD))).toThrow(
      'Missing Spotify credentials: SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET',
    );
    expect(() => requireCredentials(loadConfig({ SPOTIFY_CLIENT_ID: 'test-client' }, CWD))).toThrow(
      CredentialsMissingError,
    );
  });

  it('passes when both are present', () => {
    const config = loadConfig({ SPOTIFY_CLIENT_ID: 'test-client', SPOTIFY_CLIENT_SECRET: 'test-secret' }, CWD);
    expect(() => requireCredentials(config)).not.toThrow();
  });
});
