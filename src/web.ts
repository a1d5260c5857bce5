/**
 * HTTP (express) front for queued playlist downloads.
 * Runs execute one at a time on a single worker; status requests read the
 * progress store, which the worker updates with whole snapshots.
 */
import path from 'node:path';
import express from 'express';
import pLimit from 'p-limit';
import type { AppConfig } from './config.js';
import { ledgerPathFor } from './config.js';
import { toErrorMessage } from './errors.js';
import { persistLedger, summarize } from './ledger.js';
import type { SpotifyCatalog } from './catalog.js';
import { DownloadOrchestrator, type PipelineCollaborators, orchestratorOptionsFrom } from './orchestrator.js';
import {
  type ProgressSnapshot,
  type ProgressStore,
  applyRunProgress,
  initialSnapshot,
} from './progress.js';
import { type Logger, createPlaylistDirectory, parsePlaylistLocator } from './utils.js';

export const DEFAULT_MAX_SONGS = 300;

export interface StartRequest {
  readonly playlistId: string;
  readonly maxSongs: number;
}

/** The catalog calls the web front makes. */
export type PlaylistCatalog = Pick<SpotifyCatalog, 'loadPlaylist' | 'searchPlaylists' | 'testConnection'>;

export interface WebDependencies {
  readonly config: AppConfig;
  readonly store: ProgressStore;
  readonly logger: Logger;
  readonly catalog: PlaylistCatalog;
  readonly collaborators: PipelineCollaborators;
}

/**
 * Validates the body of a start request. Throws InvalidLocatorError on a bad playlist.
 */
export const parseStartRequest = (body: unknown): StartRequest => {
  const record = typeof body === 'object' && body !== null ? body : {};
  const playlist = 'playlist' in record && typeof record.playlist === 'string' ? record.playlist : '';
  const rawMax = 'maxSongs' in record ? Number(record.maxSongs) : DEFAULT_MAX_SONGS;
  const maxSongs = Number.isInteger(rawMax) && rawMax > 0 ? rawMax : DEFAULT_MAX_SONGS;
  return { playlistId: parsePlaylistLocator(playlist), maxSongs };
};

export class DownloadJobRunner {
  private readonly worker = pLimit(1);
  private sequence = 0;

  constructor(private readonly deps: WebDependencies) {}

  /**
   * Queues a run and returns its id straight away.
   */
  enqueue(request: StartRequest): string {
    this.sequence += 1;
    const id = `download_${Date.now()}_${this.sequence}`;
    this.deps.store.set(id, initialSnapshot());

    this.worker(() => this.execute(id, request)).catch((error: unknown) => {
      this.deps.logger.error(`Download job ${id} crashed: ${toErrorMessage(error)}`);
    });
    return id;
  }

  /** Resolves once every queued job has finished. */
  async idle(): Promise<void> {
    while (this.worker.activeCount > 0 || this.worker.pendingCount > 0) {
      await new Promise<void>((resolve) => {
        setImmediate(resolve);
      });
    }
  }

  private update(id: string, changes: Partial<ProgressSnapshot>): ProgressSnapshot {
    const current = this.deps.store.get(id) ?? initialSnapshot();
    const next = { ...current, ...changes };
    this.deps.store.set(id, next);
    return next;
  }

  private async execute(id: string, request: StartRequest): Promise<void> {
    const { config, logger } = this.deps;
    try {
      this.update(id, { status: 'fetching_playlist' });
      const playlist = await this.deps.catalog.loadPlaylist(request.playlistId);
      const tracks = playlist.tracks.slice(0, request.maxSongs);
      if (tracks.length === 0) {
        throw new Error('No tracks found or playlist not accessible');
      }
      this.update(id, { status: 'downloading', total: tracks.length, playlistName: playlist.meta.name });

      const targetDir = await createPlaylistDirectory(config.downloadsDir, playlist.meta.name, config.maxFileNameLength);
      const orchestrator = new DownloadOrchestrator(
        this.deps.collaborators,
        orchestratorOptionsFrom(config, {
          logger,
          playlistName: playlist.meta.name,
          onProgress: (event) => {
            const current = this.deps.store.get(id) ?? initialSnapshot();
            this.deps.store.set(id, applyRunProgress(current, event));
          },
        }),
      );
      const outcomes = await orchestrator.run(tracks, targetDir);
      const summary = summarize(outcomes);
      await persistLedger(summary.failedTracks, ledgerPathFor(config));

      this.update(id, {
        status: 'completed',
        progress: 100,
        currentTrack: '',
        successCount: summary.successCount,
        skippedCount: summary.skippedCount,
        failedCount: summary.failedCount,
        completedAt: new Date().toISOString(),
      });
    } catch (error) {
      logger.error(`Download job ${id} failed: ${toErrorMessage(error)}`);
      this.update(id, {
        status: 'error',
        error: toErrorMessage(error),
        completedAt: new Date().toISOString(),
      });
    }
  }
}

export const createWebApp = (deps: WebDependencies, runner = new DownloadJobRunner(deps)): express.Express => {
  const app = express();
  app.use(express.json());
  app.use('/files', express.static(path.resolve(deps.config.downloadsDir)));

  app.post('/api/downloads', (req, res) => {
    let request: StartRequest;
    try {
      request = parseStartRequest(req.body);
    } catch (error) {
      res.status(400).json({ status: 'error', error: toErrorMessage(error) });
      return;
    }
    const id = runner.enqueue(request);
    res.status(202).json({ id });
  });

  app.get('/api/status/:id', (req, res) => {
    const snapshot = deps.store.get(req.params.id);
    if (!snapshot) {
      res.status(404).json({ status: 'not_found', error: 'Download not found' });
      return;
    }
    res.json(snapshot);
  });

  app.get('/api/playlists/search', async (req, res) => {
    const query = typeof req.query.q === 'string' ? req.query.q.trim() : '';
    if (!query) {
      res.status(400).json({ status: 'error', error: 'Search query is required' });
      return;
    }
    try {
      const playlists = await deps.catalog.searchPlaylists(query);
      res.json({ status: 'success', playlists, count: playlists.length });
    } catch (error) {
      deps.logger.error(`Playlist search failed: ${toErrorMessage(error)}`);
      res.status(502).json({ status: 'error', error: `Search failed: ${toErrorMessage(error)}` });
    }
  });

  app.get('/api/connection', async (_req, res) => {
    try {
      await deps.catalog.testConnection();
      res.json({ status: 'success', message: 'Spotify API connected successfully' });
    } catch (error) {
      res.status(502).json({ status: 'error', error: `Connection failed: ${toErrorMessage(error)}` });
    }
  });

  return app;
};

export const startWebServer = (deps: WebDependencies): void => {
  const app = createWebApp(deps);
  app.listen(deps.config.port, () => {
    deps.logger.info(`HTTP server listening on port ${deps.config.port}`);
  });
};
