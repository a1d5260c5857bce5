/**
 * Download orchestration: one track at a time, in playlist order,
 * skip-check → search → select → fetch → artwork → tag → move.
 *
 * Every per-track failure becomes a failed outcome; nothing here aborts the batch.
 */

import path from 'node:path';
import fs from 'fs-extra';
import type { AppConfig } from './config.js';
import { fetchArtwork } from './artwork.js';
import { fetchAudio } from './download.js';
import { toErrorMessage } from './errors.js';
import { selectBest } from './match.js';
import { type Notifier, silentNotifier } from './notify.js';
import { searchCandidates } from './search.js';
import { embedTags } from './tagger.js';
import type {
  CandidateMatch,
  DownloadOutcome,
  FailureReason,
  RunProgress,
  TrackDescriptor,
} from './types.js';
import {
  type Logger,
  consoleLogger,
  findExistingFile,
  logFailure,
  logSuccess,
  sanitizeFileName,
  sleep,
} from './utils.js';

export interface PipelineCollaborators {
  search(query: string): Promise<readonly CandidateMatch[] | null | undefined>;
  fetchAudio(url: string, destinationTemplate: string): Promise<string>;
  fetchArtwork(url: string, destinationTemplate: string): Promise<string>;
  embedTags(filePath: string, track: TrackDescriptor, artworkPath?: string): Promise<string>;
}

export interface OrchestratorOptions {
  readonly tempDir: string;
  readonly pacingDelayMs: number;
  readonly maxFileNameLength: number;
  readonly logger?: Logger;
  readonly notifier?: Notifier;
  /** When set, errors.log and downloaded.log are appended under this directory. */
  readonly logRoot?: string;
  readonly playlistName?: string;
  readonly onProgress?: (progress: RunProgress) => void;
  readonly delay?: (ms: number) => Promise<void>;
}

/**
 * Wires the real search, fetch, artwork and tag modules.
 */
export const createCollaborators = (config: AppConfig, logger: Logger): PipelineCollaborators => ({
  search: (query) => searchCandidates(query),
  fetchAudio: (url, destinationTemplate) =>
    fetchAudio({ url, destinationTemplate, preference: config.qualityPreference }),
  fetchArtwork: (url, destinationTemplate) =>
    fetchArtwork(url, destinationTemplate, { maxSize: config.artworkMaxSize, logger }),
  embedTags: (filePath, track, artworkPath) => embedTags(filePath, track, artworkPath),
});

export const orchestratorOptionsFrom = (
  config: AppConfig,
  extra: Partial<OrchestratorOptions> = {},
): OrchestratorOptions => ({
  tempDir: config.tempDir,
  pacingDelayMs: config.pacingDelayMs,
  maxFileNameLength: config.maxFileNameLength,
  logRoot: config.downloadsDir,
  ...extra,
});

export class DownloadOrchestrator {
  private readonly logger: Logger;
  private readonly notifier: Notifier;
  private readonly delay: (ms: number) => Promise<void>;
  private outcomes: DownloadOutcome[] = [];
  private queue: readonly TrackDescriptor[] = [];
  private processed = 0;
  private stopRequested = false;

  constructor(
    private readonly collaborators: PipelineCollaborators,
    private readonly options: OrchestratorOptions,
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.notifier = options.notifier ?? silentNotifier;
    this.delay = options.delay ?? sleep;
  }

  /**
   * Processes every track in order and returns one outcome per processed track.
   */
  async run(tracks: readonly TrackDescriptor[], targetDir: string): Promise<DownloadOutcome[]> {
    this.outcomes = [];
    this.queue = tracks;
    this.processed = 0;
    this.stopRequested = false;

    await fs.ensureDir(targetDir);
    await fs.ensureDir(this.options.tempDir);

    for (let index = 0; index < tracks.length; index += 1) {
      if (this.stopRequested) {
        this.logger.warn(`Stopped with ${tracks.length - index} track(s) pending`);
        break;
      }
      const track = tracks[index];
      this.logger.info(`\n[${index + 1}/${tracks.length}] Processing: ${track.searchQuery}`);
      this.emitProgress(index, track.searchQuery);

      const result = await this.processTrack(track, targetDir);
      this.outcomes.push(result);
      this.processed = index + 1;
      await this.record(result);
      this.emitProgress(index + 1, track.searchQuery);

      if (index < tracks.length - 1 && !this.stopRequested) {
        await this.delay(this.options.pacingDelayMs);
      }
    }

    const successCount = this.count('success');
    await this.notifier.notify(
      'Playlist download complete',
      `${successCount}/${tracks.length} tracks downloaded`,
    );
    return [...this.outcomes];
  }

  /**
   * Asks the running batch to stop before its next track. The track in flight finishes.
   */
  stop(): void {
    this.stopRequested = true;
  }

  /**
   * Tracks that failed so far plus every track not yet finished, in playlist order.
   */
  unfinished(): TrackDescriptor[] {
    const failed = this.outcomes
      .filter((outcome) => outcome.status === 'failed')
      .map((outcome) => outcome.track);
    return [...failed, ...this.queue.slice(this.processed)];
  }

  private async processTrack(track: TrackDescriptor, targetDir: string): Promise<DownloadOutcome> {
    const baseName = sanitizeFileName(track.searchQuery, this.options.maxFileNameLength);

    const existing = await findExistingFile(targetDir, baseName);
    if (existing) {
      this.logger.info(`⏭️  Skipping (already exists): ${baseName}`);
      return makeOutcome(track, 'skipped', { reason: 'AlreadyExists', filePath: existing });
    }

    let candidate: CandidateMatch;
    try {
      const candidates = await this.collaborators.search(track.searchQuery);
      candidate = selectBest(track, candidates ?? [], this.logger);
    } catch (error) {
      return this.failure(track, 'NoMatch', error);
    }
    this.logger.info(`🎯 Found: ${candidate.title}`);

    const template = path.join(this.options.tempDir, baseName);
    let audioPath: string;
    try {
      audioPath = await this.collaborators.fetchAudio(candidate.url, template);
    } catch (error) {
      return this.failure(track, 'FetchError', error);
    }

    let artworkPath: string | undefined;
    if (track.coverArtUrl) {
      try {
        artworkPath = await this.collaborators.fetchArtwork(track.coverArtUrl, `${template}_artwork`);
      } catch (error) {
        this.logger.warn(`⚠️  ArtworkUnavailable for ${track.searchQuery}: ${toErrorMessage(error)}`);
      }
    }

    try {
      let taggedPath: string;
      try {
        taggedPath = await this.collaborators.embedTags(audioPath, track, artworkPath);
      } catch (error) {
        return this.failure(track, 'TagError', error);
      }

      const finalPath = path.join(targetDir, `${baseName}${path.extname(taggedPath)}`);
      try {
        await fs.move(taggedPath, finalPath, { overwrite: true });
      } catch (error) {
        return this.failure(track, 'TagError', error);
      }

      this.logger.info(`✅ Completed: ${baseName}`);
      await this.notifier.notify(`Downloaded: ${track.title}`, `By ${track.artists.join(', ')}`);
      return makeOutcome(track, 'success', { filePath: finalPath });
    } finally {
      if (artworkPath) {
        await fs.remove(artworkPath);
      }
    }
  }

  private failure(track: TrackDescriptor, reason: FailureReason, error: unknown): DownloadOutcome {
    const detail = toErrorMessage(error);
    this.logger.error(`❌ ${reason} for ${track.searchQuery}: ${detail}`);
    return makeOutcome(track, 'failed', { reason, detail });
  }

  private async record(result: DownloadOutcome): Promise<void> {
    const root = this.options.logRoot;
    if (!root) {
      return;
    }
    try {
      if (result.status === 'failed') {
        await logFailure(root, `${result.track.searchQuery} :: ${result.reason} :: ${result.detail ?? ''}`);
      } else if (result.status === 'success' && result.filePath) {
        await logSuccess(root, result.filePath, this.options.playlistName);
      }
    } catch (error) {
      this.logger.warn(`Could not write download log: ${toErrorMessage(error)}`);
    }
  }

  private count(status: DownloadOutcome['status']): number {
    return this.outcomes.filter((item) => item.status === status).length;
  }

  private emitProgress(index: number, current: string): void {
    this.options.onProgress?.({
      index,
      total: this.queue.length,
      current,
      successCount: this.count('success'),
      skippedCount: this.count('skipped'),
      failedCount: this.count('failed'),
    });
  }
}

const makeOutcome = (
  track: TrackDescriptor,
  status: DownloadOutcome['status'],
  extra: Pick<DownloadOutcome, 'reason' | 'detail' | 'filePath'> = {},
): DownloadOutcome =>
  Object.freeze({ track, status, ...extra, timestamp: new Date().toISOString() });
