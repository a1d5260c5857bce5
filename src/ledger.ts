import path from 'node:path';
import fs from 'fs-extra';
import { LedgerNotFoundError } from './errors.js';
import { createTrackDescriptor, type TrackFields } from './normalize.js';
import type { DownloadOrchestrator } from './orchestrator.js';
import type { DownloadOutcome, TrackDescriptor } from './types.js';

export interface BatchSummary {
  readonly successCount: number;
  readonly skippedCount: number;
  readonly failedCount: number;
  readonly failedTracks: readonly TrackDescriptor[];
}

/**
 * Counts outcomes by status and collects the failed tracks in run order.
 */
export const summarize = (outcomes: readonly DownloadOutcome[]): BatchSummary => {
  const failedTracks = outcomes
    .filter((outcome) => outcome.status === 'failed')
    .map((outcome) => outcome.track);
  return {
    successCount: outcomes.filter((outcome) => outcome.status === 'success').length,
    skippedCount: outcomes.filter((outcome) => outcome.status === 'skipped').length,
    failedCount: failedTracks.length,
    failedTracks,
  };
};

/**
 * Replaces the ledger file with exactly these tracks. An empty list still writes `[]`.
 */
export const persistLedger = async (
  tracks: readonly TrackDescriptor[],
  ledgerPath: string,
): Promise<void> => {
  await fs.ensureDir(path.dirname(ledgerPath));
  await fs.writeJson(ledgerPath, tracks, { spaces: 2 });
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown, fallback = ''): string =>
  typeof value === 'string' ? value : fallback;

const asNumber = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

const asStringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

/**
 * Rebuilds a descriptor from one ledger entry; the search query is re-derived, never trusted.
 */
export const parseLedgerEntry = (entry: unknown): TrackDescriptor | null => {
  if (!isRecord(entry)) {
    return null;
  }
  const artists = asStringList(entry.artists);
  const title = asString(entry.title);
  if (!title || artists.length === 0) {
    return null;
  }
  const fields: TrackFields = {
    title,
    artists,
    album: asString(entry.album),
    albumArtist: asString(entry.albumArtist, artists[0]),
    trackNumber: asNumber(entry.trackNumber, 1),
    discNumber: asNumber(entry.discNumber, 1),
    durationMs: asNumber(entry.durationMs, 0),
    releaseYear: typeof entry.releaseYear === 'number' ? entry.releaseYear : null,
    catalogUrl: asString(entry.catalogUrl),
    coverArtUrl: typeof entry.coverArtUrl === 'string' ? entry.coverArtUrl : null,
    genres: asStringList(entry.genres),
    isrc: typeof entry.isrc === 'string' ? entry.isrc : null,
    explicit: entry.explicit === true,
  };
  return createTrackDescriptor(fields);
};

/**
 * Reads the ledger back in file order. Throws LedgerNotFoundError when there is none.
 */
export const loadForRetry = async (ledgerPath: string): Promise<TrackDescriptor[]> => {
  if (!(await fs.pathExists(ledgerPath))) {
    throw new LedgerNotFoundError(ledgerPath);
  }
  const raw: unknown = await fs.readJson(ledgerPath);
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw
    .map((entry: unknown) => parseLedgerEntry(entry))
    .filter((track): track is TrackDescriptor => track !== null);
};

/**
 * Re-runs the ledger's tracks and rewrites it with whatever still fails.
 * Returns null when there is no ledger to retry.
 */
export const retryFailed = async (
  orchestrator: DownloadOrchestrator,
  ledgerPath: string,
  targetDir: string,
): Promise<BatchSummary | null> => {
  let tracks: TrackDescriptor[];
  try {
    tracks = await loadForRetry(ledgerPath);
  } catch (error) {
    if (error instanceof LedgerNotFoundError) {
      return null;
    }
    throw error;
  }

  const outcomes = await orchestrator.run(tracks, targetDir);
  const summary = summarize(outcomes);
  await persistLedger(orchestrator.unfinished(), ledgerPath);
  return summary;
};
