import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import NodeID3 from 'node-id3';
import { TagError, toErrorMessage } from './errors.js';
import type { TrackDescriptor } from './types.js';

export type TagFormat = 'mp3' | 'flac';

export const TRANSCODE_BITRATE_KBPS = 320;

/**
 * Tag format for a file, from its extension; null when it must be transcoded first.
 */
export const getTagFormat = (filePath: string): TagFormat | null => {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  if (ext === 'mp3' || ext === 'flac') {
    return ext;
  }
  return null;
};

export const buildComment = (track: TrackDescriptor): string => {
  const isrc = track.isrc ? ` | ISRC: ${track.isrc}` : '';
  return `Downloaded from YouTube | Spotify: ${track.catalogUrl}${isrc}`;
};

/**
 * Builds the ID3 frame set for a track.
 */
export const buildId3Tags = (track: TrackDescriptor, artwork?: Buffer): NodeID3.Tags => {
  const tags: NodeID3.Tags = {
    title: track.title,
    artist: track.artists.join(', '),
    album: track.album,
    performerInfo: track.albumArtist,
    trackNumber: String(track.trackNumber),
    partOfSet: String(track.discNumber),
    comment: { language: 'eng', text: buildComment(track) },
  };

  if (track.releaseYear !== null) {
    tags.year = String(track.releaseYear);
  }
  if (track.genres.length > 0) {
    tags.genre = track.genres.join(', ');
  }
  if (track.isrc) {
    tags.ISRC = track.isrc;
  }
  if (artwork) {
    tags.image = {
      mime: 'image/jpeg',
      type: { id: 3, name: 'front cover' },
      description: 'Album Cover',
      imageBuffer: artwork,
    };
  }
  return tags;
};

/**
 * Vorbis comment fields for FLAC, in ffmpeg `-metadata key=value` form.
 */
export const buildVorbisComments = (track: TrackDescriptor): string[] => {
  const fields: Array<[string, string]> = [
    ['TITLE', track.title],
    ['ARTIST', track.artists.join(', ')],
    ['ALBUM', track.album],
    ['ALBUMARTIST', track.albumArtist],
    ['TRACKNUMBER', String(track.trackNumber)],
    ['DISCNUMBER', String(track.discNumber)],
    ['COMMENT', buildComment(track)],
  ];
  if (track.releaseYear !== null) {
    fields.push(['DATE', String(track.releaseYear)]);
  }
  if (track.genres.length > 0) {
    fields.push(['GENRE', track.genres.join(', ')]);
  }
  if (track.isrc) {
    fields.push(['ISRC', track.isrc]);
  }
  return fields.flatMap(([key, value]) => ['-metadata', `${key}=${value}`]);
};

const writeMp3Tags = async (filePath: string, track: TrackDescriptor, artworkPath?: string): Promise<void> => {
  const artwork = artworkPath && (await fs.pathExists(artworkPath)) ? await fs.readFile(artworkPath) : undefined;
  const result = NodeID3.write(buildId3Tags(track, artwork), filePath);
  if (result instanceof Error) {
    throw result;
  }
};

const runFfmpeg = (command: ffmpeg.FfmpegCommand, output: string): Promise<void> =>
  new Promise((resolve, reject) => {
    command
      .on('error', reject)
      .on('end', () => resolve())
      .save(output);
  });

const writeFlacTags = async (filePath: string, track: TrackDescriptor, artworkPath?: string): Promise<void> => {
  const tagged = `${filePath}.tagged.flac`;
  const command = ffmpeg(filePath);
  const args = ['-map_metadata', '-1', '-map', '0:a'];

  if (artworkPath && (await fs.pathExists(artworkPath))) {
    command.input(artworkPath);
    args.push('-map', '1:v', '-disposition:v', 'attached_pic', '-metadata:s:v', 'comment=Cover (front)');
  }

  // spread form: fluent-ffmpeg only splits on spaces when given a single array
  command.outputOptions(...args, '-codec', 'copy', ...buildVorbisComments(track));
  await runFfmpeg(command, tagged);
  await fs.move(tagged, filePath, { overwrite: true });
};

/**
 * Converts any other container to mp3 next to the source and removes the source.
 */
export const transcodeToMp3 = async (filePath: string): Promise<string> => {
  const parsed = path.parse(filePath);
  const target = path.join(parsed.dir, `${parsed.name}.mp3`);
  await runFfmpeg(
    ffmpeg(filePath).noVideo().audioCodec('libmp3lame').audioBitrate(TRANSCODE_BITRATE_KBPS),
    target,
  );
  await fs.remove(filePath);
  return target;
};

/**
 * Writes tags and cover art into the file, dispatching on its extension.
 * Returns the tagged file's path, which changes when a transcode was needed.
 */
export const embedTags = async (
  filePath: string,
  track: TrackDescriptor,
  artworkPath?: string,
): Promise<string> => {
  try {
    const format = getTagFormat(filePath);
    if (format === 'flac') {
      await writeFlacTags(filePath, track, artworkPath);
      return filePath;
    }
    const mp3Path = format === 'mp3' ? filePath : await transcodeToMp3(filePath);
    await writeMp3Tags(mp3Path, track, artworkPath);
    return mp3Path;
  } catch (error) {
    throw new TagError(toErrorMessage(error), { cause: error, query: track.searchQuery });
  }
};
