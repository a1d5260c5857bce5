import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LedgerNotFoundError } from '../src/errors.js';
import { loadForRetry, parseLedgerEntry, persistLedger, retryFailed, summarize } from '../src/ledger.js';
import { DownloadOrchestrator } from '../src/orchestrator.js';
import type { CandidateMatch, DownloadOutcome, TrackDescriptor } from '../src/types.js';
import { createRecordingLogger, makeTempDir, makeTrack } from './fixtures.js';

const outcome = (track: TrackDescriptor, status: DownloadOutcome['status']): DownloadOutcome => ({
  track,
  status,
  timestamp: '2024-01-01T00:00:00.000Z',
});

describe('summarize', () => {
  it('counts outcomes and lists failed tracks in order', () => {
    const tracks = ['One', 'Two', 'Three', 'Four', 'Five'].map((title) => makeTrack({ title }));
    const summary = summarize([
      outcome(tracks[0], 'success'),
      outcome(tracks[1], 'failed'),
      outcome(tracks[2], 'failed'),
      outcome(tracks[3], 'success'),
      outcome(tracks[4], 'failed'),
    ]);

    expect(summary.successCount).toBe(2);
    expect(summary.skippedCount).toBe(0);
    expect(summary.failedCount).toBe(3);
    expect(summary.failedTracks.map((track) => track.title)).toEqual(['Two', 'Three', 'Five']);
  });
});

describe('ledger file', () => {
  let root: string;
  let ledgerPath: string;

  beforeEach(async () => {
    root = await makeTempDir('ledger');
    ledgerPath = path.join(root, 'failed_downloads.json');
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('round-trips tracks in order', async () => {
    const tracks = [
      makeTrack({ title: 'Two', genres: ['rock'], isrc: 'TEST00000002' }),
      makeTrack({ title: 'Three', coverArtUrl: 'https://img.example/3.jpg' }),
      makeTrack({ title: 'Five', releaseYear: null }),
    ];

    await persistLedger(tracks, ledgerPath);
    const loaded = await loadForRetry(ledgerPath);

    expect(loaded).toEqual(tracks);
  });

  it('always overwrites, writing an empty array when nothing failed', async () => {
    await persistLedger([makeTrack()], ledgerPath);
    await persistLedger([], ledgerPath);

    expect(await fs.readJson(ledgerPath)).toEqual([]);
  });

  it('throws LedgerNotFoundError when there is no ledger', async () => {
    await expect(loadForRetry(ledgerPath)).rejects.toBeInstanceOf(LedgerNotFoundError);
  });

  it('ignores malformed entries and a non-array document', async () => {
    await fs.writeJson(ledgerPath, [{ title: 'No Artists' }, 42, { title: 'Ok', artists: ['B'] }]);
    expect((await loadForRetry(ledgerPath)).map((track) => track.searchQuery)).toEqual(['B - Ok']);

    await fs.writeJson(ledgerPath, { tracks: [] });
    expect(await loadForRetry(ledgerPath)).toEqual([]);
  });

  it('re-derives the search query instead of trusting the file', () => {
    const track = parseLedgerEntry({ title: 'Song', artists: ['X', 'Y'], searchQuery: 'something else' });
    expect(track?.searchQuery).toBe('X, Y - Song');
    expect(track?.albumArtist).toBe('X');
    expect(track?.trackNumber).toBe(1);
  });
});

describe('retryFailed', () => {
  let root: string;
  let ledgerPath: string;
  let targetDir: string;

  const orchestratorFailing = (failingTitle: string): DownloadOrchestrator =>
    new DownloadOrchestrator(
      {
        search: vi.fn<[string], Promise<readonly CandidateMatch[]>>(async (query) =>
          query.endsWith(failingTitle)
            ? []
            : [{ title: query, durationSeconds: 180, url: 'https://www.youtube.com/watch?v=abcdefghijk', confident: false }],
        ),
        fetchAudio: vi.fn<[string, string], Promise<string>>(async (_url, template) => {
          await fs.writeFile(`${template}.mp3`, 'audio');
          return `${template}.mp3`;
        }),
        fetchArtwork: vi.fn<[string, string], Promise<string>>(async () => ''),
        embedTags: vi.fn<[string, TrackDescriptor, string?], Promise<string>>(async (filePath) => filePath),
      },
      {
        tempDir: path.join(root, 'tmp'),
        pacingDelayMs: 0,
        maxFileNameLength: 200,
        logger: createRecordingLogger(),
        delay: async () => undefined,
      },
    );

  beforeEach(async () => {
    root = await makeTempDir('retry');
    ledgerPath = path.join(root, 'failed_downloads.json');
    targetDir = path.join(root, 'RetryDownloads');
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('returns null when there is no ledger', async () => {
    expect(await retryFailed(orchestratorFailing('none'), ledgerPath, targetDir)).toBeNull();
  });

  it('rewrites the ledger with only the tracks that still fail', async () => {
    const tracks = ['One', 'Two', 'Three'].map((title) => makeTrack({ title }));
    await persistLedger(tracks, ledgerPath);

    const summary = await retryFailed(orchestratorFailing('Two'), ledgerPath, targetDir);

    expect(summary?.successCount).toBe(2);
    expect(summary?.failedCount).toBe(1);
    const remaining = await loadForRetry(ledgerPath);
    expect(remaining.map((track) => track.title)).toEqual(['Two']);
    expect(await fs.pathExists(path.join(targetDir, 'A - One.mp3'))).toBe(true);
    expect(await fs.pathExists(path.join(targetDir, 'A - Three.mp3'))).toBe(true);
  });

  it('leaves an empty ledger once every track succeeds', async () => {
    await persistLedger([makeTrack({ title: 'One' })], ledgerPath);

    await retryFailed(orchestratorFailing('none'), ledgerPath, targetDir);

    expect(await fs.readJson(ledgerPath)).toEqual([]);
  });
});
