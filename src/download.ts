import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import ytdl from '@distube/ytdl-core';
import { FetchError, toErrorMessage } from './errors.js';

/** lossless > high-bitrate lossy > anything with audio */
export type AudioQualityTier = 'lossless' | 'high' | 'any';

export const HIGH_BITRATE_KBPS = 128;

/** The parts of a ytdl format that decide tier and container. */
export type AudioFormatInfo = Pick<
  ytdl.videoFormat,
  'hasAudio' | 'hasVideo' | 'audioBitrate' | 'audioCodec' | 'container'
>;

export interface FetchOptions {
  readonly url: string;
  /** Destination path without extension; the chosen container decides it. */
  readonly destinationTemplate: string;
  readonly preference: readonly AudioQualityTier[];
}

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://www.youtube.com/',
  Origin: 'https://www.youtube.com',
};

/**
 * Points fluent-ffmpeg at a specific binary; otherwise it looks on PATH.
 */
export const configureFfmpeg = (ffmpegPath: string | undefined): void => {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  }
};

/**
 * Classifies a format: flac or alac is lossless, 128 kbps and up is high.
 */
export const tierOf = (format: AudioFormatInfo): AudioQualityTier => {
  const codec = (format.audioCodec ?? '').toLowerCase();
  if (codec.includes('flac') || codec.includes('alac')) {
    return 'lossless';
  }
  if ((format.audioBitrate ?? 0) >= HIGH_BITRATE_KBPS) {
    return 'high';
  }
  return 'any';
};

/**
 * Picks the best audio-only format whose tier comes first in `preference`.
 * 'any' accepts every remaining audio format.
 */
export const selectAudioFormat = <T extends AudioFormatInfo>(
  formats: readonly T[],
  preference: readonly AudioQualityTier[],
): T | null => {
  const audioOnly = formats
    .filter((format) => format.hasAudio && !format.hasVideo)
    .sort((a, b) => (b.audioBitrate ?? 0) - (a.audioBitrate ?? 0));

  for (const tier of preference) {
    const match =
      tier === 'any' ? audioOnly[0] : audioOnly.find((format) => tierOf(format) === tier);
    if (match) {
      return match;
    }
  }
  return null;
};

/**
 * File extension for a format's container; mp4 audio is stored as m4a.
 */
export const extensionFor = (format: AudioFormatInfo): string => {
  const codec = (format.audioCodec ?? '').toLowerCase();
  if (codec.includes('flac')) {
    return 'flac';
  }
  return format.container === 'mp4' ? 'm4a' : format.container;
};

/**
 * Streams the chosen format to disk untouched.
 */
const downloadFormat = async (
  info: ytdl.videoInfo,
  format: ytdl.videoFormat,
  targetPath: string,
): Promise<string> => {
  const stream = ytdl.downloadFromInfo(info, {
    format,
    highWaterMark: 1 << 25,
    dlChunkSize: 1 << 20,
    requestOptions: { headers: REQUEST_HEADERS },
  });
  try {
    await pipeline(stream, fs.createWriteStream(targetPath));
    return targetPath;
  } catch (error) {
    await fs.remove(targetPath);
    throw error;
  }
};

/**
 * Transcodes ytdl's highest audio stream to mp3 when no audio-only format qualifies.
 */
const downloadTranscoded = async (url: string, targetPath: string): Promise<string> => {
  const tempPath = `${targetPath}.part`;
  await fs.remove(tempPath);

  return new Promise((resolve, reject) => {
    const stream = ytdl(url, {
      quality: 'highestaudio',
      highWaterMark: 1 << 25,
      dlChunkSize: 1 << 20,
      requestOptions: { headers: REQUEST_HEADERS },
    });

    const fail = (error: Error): void => {
      fs.remove(tempPath).then(
        () => reject(error),
        () => reject(error),
      );
    };

    stream.on('error', fail);

    ffmpeg(stream)
      .audioBitrate(320)
      .format('mp3')
      .on('error', fail)
      .on('end', () => {
        fs.move(tempPath, targetPath, { overwrite: true }).then(
          () => resolve(targetPath),
          (error: unknown) => reject(error instanceof Error ? error : new Error(String(error))),
        );
      })
      .save(tempPath);
  });
};

/**
 * Fetches the audio of a YouTube video into `<destinationTemplate>.<ext>` and returns the path.
 */
export const fetchAudio = async ({
  url,
  destinationTemplate,
  preference,
}: FetchOptions): Promise<string> => {
  if (!ytdl.validateURL(url)) {
    throw new FetchError(`Invalid YouTube URL: ${url}`);
  }

  await fs.ensureDir(path.dirname(destinationTemplate));

  try {
    const info = await ytdl.getInfo(url, { requestOptions: { headers: REQUEST_HEADERS } });
    const format = selectAudioFormat(info.formats, preference);
    if (format) {
      return await downloadFormat(info, format, `${destinationTemplate}.${extensionFor(format)}`);
    }
    return await downloadTranscoded(url, `${destinationTemplate}.mp3`);
  } catch (error) {
    throw new FetchError(toErrorMessage(error), { cause: error });
  }
};
