import path from 'node:path';
import os from 'node:os';
import { CredentialsMissingError } from './errors.js';
import type { AudioQualityTier } from './download.js';

export interface AppConfig {
  readonly spotifyClientId: string;
  readonly spotifyClientSecret: string;
  readonly downloadsDir: string;
  readonly tempDir: string;
  readonly isTermux: boolean;
  readonly pacingDelayMs: number;
  readonly maxFileNameLength: number;
  readonly artworkMaxSize: number;
  readonly qualityPreference: readonly AudioQualityTier[];
  readonly ffmpegPath?: string;
  readonly port: number;
}

export const DESKTOP_MAX_FILENAME_LENGTH = 200;
export const MOBILE_MAX_FILENAME_LENGTH = 150;
export const DESKTOP_PACING_DELAY_MS = 500;
export const MOBILE_PACING_DELAY_MS = 1500;
export const DEFAULT_PORT = 5000;
export const LEDGER_FILE_NAME = 'failed_downloads.json';
export const RETRY_FOLDER_NAME = 'RetryDownloads';

const TERMUX_STORAGE_ROOT = '/storage/emulated/0';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Detects a Termux (Android) shell from its install prefix.
 */
export const isTermuxEnvironment = (env: Env): boolean =>
  (env.PREFIX ?? '').includes('com.termux');

const readPositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

/**
 * Builds the process-wide configuration. Called once at start-up; the result is frozen.
 */
export const loadConfig = (env: Env = process.env, cwd: string = process.cwd()): AppConfig => {
  const isTermux = isTermuxEnvironment(env);

  const defaultDownloads = isTermux
    ? path.join(TERMUX_STORAGE_ROOT, 'Music', 'SpotifyDownloads')
    : path.resolve(cwd, 'downloads');
  const downloadsDir = env.DOWNLOADS_DIR ? path.resolve(cwd, env.DOWNLOADS_DIR) : defaultDownloads;

  return Object.freeze({
    spotifyClientId: env.SPOTIFY_CLIENT_ID?.trim() ?? '',
    spotifyClientSecret: env.SPOTIFY_CLIENT_SECRET?.trim() ?? '',
    downloadsDir,
    tempDir: env.TEMP_DIR
      ? path.resolve(cwd, env.TEMP_DIR)
      : path.join(os.tmpdir(), 'playlist-to-mp3'),
    isTermux,
    pacingDelayMs: readPositiveInt(
      env.PACING_DELAY_MS,
      isTermux ? MOBILE_PACING_DELAY_MS : DESKTOP_PACING_DELAY_MS,
    ),
    maxFileNameLength: readPositiveInt(
      env.MAX_FILENAME_LENGTH,
      isTermux ? MOBILE_MAX_FILENAME_LENGTH : DESKTOP_MAX_FILENAME_LENGTH,
    ),
    artworkMaxSize: isTermux ? 500 : 640,
    qualityPreference: Object.freeze<AudioQualityTier[]>(['lossless', 'high', 'any']),
    ffmpegPath: env.FFMPEG_PATH || undefined,
    port: readPositiveInt(env.PORT, DEFAULT_PORT),
  });
};

/**
 * Throws when either Spotify credential is absent.
 */
export const requireCredentials = (config: AppConfig): void => {
  const missing: string[] = [];
  if (!config.spotifyClientId) {
    missing.push('SPOTIFY_CLIENT_ID');
  }
  if (!config.spotifyClientSecret) {
    missing.push('SPOTIFY_CLIENT_SECRET');
  }
  if (missing.length > 0) {
    throw new CredentialsMissingError(missing);
  }
};

/** Location of the retry ledger under the output root. */
export const ledgerPathFor = (config: AppConfig): string =>
  path.join(config.downloadsDir, LEDGER_FILE_NAME);
