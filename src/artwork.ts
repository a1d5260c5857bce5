import axios from 'axios';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import { ArtworkUnavailableError } from './errors.js';
import type { Logger } from './utils.js';

export const ARTWORK_TIMEOUT_MS = 30_000;

export interface ArtworkOptions {
  /** Longest edge of the stored JPEG, in pixels. */
  readonly maxSize: number;
  readonly logger: Logger;
}

/**
 * Downloads image bytes.
 */
export const downloadImage = async (url: string): Promise<Buffer> => {
  try {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: ARTWORK_TIMEOUT_MS,
      maxRedirects: 5,
    });
    return Buffer.from(response.data);
  } catch (error) {
    throw new ArtworkUnavailableError(url, { cause: error });
  }
};

const resizeToJpeg = (source: string, target: string, maxSize: number): Promise<void> =>
  new Promise((resolve, reject) => {
    ffmpeg(source)
      .videoFilters(
        `scale='min(${maxSize},iw)':'min(${maxSize},ih)':force_original_aspect_ratio=decrease`,
      )
      .outputOptions(['-frames:v 1', '-q:v 3'])
      .on('error', reject)
      .on('end', () => resolve())
      .save(target);
  });

/**
 * Fetches cover art into `<destinationTemplate>.jpg`, re-encoded within `maxSize`.
 * Keeps the original bytes when the re-encode fails.
 */
export const fetchArtwork = async (
  url: string,
  destinationTemplate: string,
  { maxSize, logger }: ArtworkOptions,
): Promise<string> => {
  const bytes = await downloadImage(url);
  const sourcePath = `${destinationTemplate}.src`;
  const targetPath = `${destinationTemplate}.jpg`;

  await fs.writeFile(sourcePath, bytes);
  try {
    await resizeToJpeg(sourcePath, targetPath, maxSize);
    await fs.remove(sourcePath);
  } catch (error) {
    logger.warn(`Artwork resize failed, keeping original: ${error instanceof Error ? error.message : String(error)}`);
    await fs.move(sourcePath, targetPath, { overwrite: true });
  }
  return targetPath;
};
