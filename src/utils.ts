import path from 'node:path';
import fs from 'fs-extra';
import { InvalidLocatorError } from './errors.js';

export const ERRORS_LOG_NAME = 'errors.log';
export const DOWNLOADED_LOG_NAME = 'downloaded.log';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Sanitizes a display string into a path segment no longer than `maxLength` characters.
 * Truncation counts code points, so a surrogate pair is never split.
 */
export const sanitizeFileName = (raw: string, maxLength: number): string => {
  const cleaned = raw.replace(INVALID_FILENAME_CHARS, '').replace(/\s+/g, ' ').trim();
  return Array.from(cleaned).slice(0, Math.max(0, maxLength)).join('').trim();
};

/**
 * Path of the file in `directory` whose name without extension is `baseName`, or null.
 * Directories never match.
 */
export const findExistingFile = async (directory: string, baseName: string): Promise<string | null> => {
  if (!baseName || !(await fs.pathExists(directory))) {
    return null;
  }
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const match = entries.find((entry) => entry.isFile() && path.parse(entry.name).name === baseName);
  return match ? path.join(directory, match.name) : null;
};

/**
 * Checks whether `directory` already holds a file named `baseName` with any extension.
 */
export const hasExistingFile = async (directory: string, baseName: string): Promise<boolean> =>
  (await findExistingFile(directory, baseName)) !== null;

/**
 * Ensures a dedicated folder exists for a playlist and returns its path.
 */
export const createPlaylistDirectory = async (
  root: string,
  playlistName: string,
  maxLength: number,
): Promise<string> => {
  const folderName = sanitizeFileName(playlistName, maxLength) || `playlist-${Date.now()}`;
  const playlistDir = path.resolve(root, folderName);
  await fs.ensureDir(playlistDir);
  return playlistDir;
};

const PLAYLIST_ID = /^[A-Za-z0-9]{22}$/;

/**
 * Extracts a playlist id from an open.spotify.com URL, a spotify: URI, or a bare id.
 */
export const parsePlaylistLocator = (input: string): string => {
  const value = input.trim();

  if (value.startsWith('spotify:playlist:')) {
    const id = value.slice('spotify:playlist:'.length);
    if (PLAYLIST_ID.test(id)) {
      return id;
    }
    throw new InvalidLocatorError(input);
  }

  if (PLAYLIST_ID.test(value)) {
    return value;
  }

  try {
    const parsed = new URL(value);
    if (parsed.hostname === 'open.spotify.com') {
      const segments = parsed.pathname.split('/').filter(Boolean);
      const marker = segments.indexOf('playlist');
      const id = marker >= 0 ? segments[marker + 1] : undefined;
      if (id && PLAYLIST_ID.test(id)) {
        return id;
      }
    }
  } catch {
    // not a URL; reported below
  }
  throw new InvalidLocatorError(input);
};

/** Resolves after `ms` milliseconds. */
export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Appends error information to a persistent log so the user can review failures.
 */
export const logFailure = async (root: string, message: string): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.ensureDir(root);
  await fs.appendFile(path.join(root, ERRORS_LOG_NAME), `[${timestamp}] ${message}\n`);
};

/**
 * Appends a downloaded file name, with its playlist folder, to the download log.
 */
export const logSuccess = async (
  root: string,
  filePath: string,
  playlistTitle?: string,
): Promise<void> => {
  const timestamp = new Date().toISOString();
  const fileName = path.basename(filePath);
  const folderName = path.basename(path.dirname(filePath));
  const line = playlistTitle
    ? `[${timestamp}] [PLAYLIST: ${playlistTitle}] [FOLDER: ${folderName}] ${fileName}\n`
    : `[${timestamp}] ${fileName}\n`;
  await fs.ensureDir(root);
  await fs.appendFile(path.join(root, DOWNLOADED_LOG_NAME), line);
};

/**
 * Logs a playlist session summary to the download log.
 */
export const logPlaylistSummary = async (
  root: string,
  playlistTitle: string,
  totalFiles: number,
  completedFiles: number,
): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.ensureDir(root);
  await fs.appendFile(
    path.join(root, DOWNLOADED_LOG_NAME),
    `\n[${timestamp}] ========================================\n` +
      `[${timestamp}] PLAYLIST SUMMARY: ${playlistTitle}\n` +
      `[${timestamp}] COMPLETED: ${completedFiles}/${totalFiles} files\n` +
      `[${timestamp}] ========================================\n\n`,
  );
};

/**
 * Removes temporary files older than `maxAgeMs` from the scratch directory.
 */
export const cleanupTempFiles = async (
  tempDir: string,
  maxAgeMs: number,
  logger: Logger,
): Promise<number> => {
  if (!(await fs.pathExists(tempDir))) {
    return 0;
  }
  const cutoff = Date.now() - maxAgeMs;
  const entries = await fs.readdir(tempDir);
  let removed = 0;
  for (const name of entries) {
    const filePath = path.join(tempDir, name);
    try {
      const stat = await fs.stat(filePath);
      if (stat.isFile() && stat.mtimeMs < cutoff) {
        await fs.remove(filePath);
        removed += 1;
      }
    } catch (error) {
      logger.warn(`Cleanup failed for ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return removed;
};
