import type { RunProgress } from './types.js';

export type JobStatus = 'queued' | 'fetching_playlist' | 'downloading' | 'completed' | 'error';

export interface ProgressSnapshot {
  readonly status: JobStatus;
  readonly progress: number;
  readonly currentTrack: string;
  readonly total: number;
  readonly successCount: number;
  readonly skippedCount: number;
  readonly failedCount: number;
  readonly playlistName: string | null;
  readonly error: string | null;
  readonly startedAt: string;
  readonly completedAt: string | null;
}

/**
 * Keyed progress records. One writer (the worker) and many readers (status requests).
 */
export interface ProgressStore {
  get(id: string): ProgressSnapshot | undefined;
  set(id: string, snapshot: ProgressSnapshot): void;
}

/**
 * Holds frozen snapshots; every write swaps in a whole new object.
 */
export class InMemoryProgressStore implements ProgressStore {
  private readonly snapshots = new Map<string, ProgressSnapshot>();

  get(id: string): ProgressSnapshot | undefined {
    return this.snapshots.get(id);
  }

  set(id: string, snapshot: ProgressSnapshot): void {
    this.snapshots.set(id, Object.freeze({ ...snapshot }));
  }
}

export const initialSnapshot = (now: Date = new Date()): ProgressSnapshot => ({
  status: 'queued',
  progress: 0,
  currentTrack: '',
  total: 0,
  successCount: 0,
  skippedCount: 0,
  failedCount: 0,
  playlistName: null,
  error: null,
  startedAt: now.toISOString(),
  completedAt: null,
});

/**
 * Folds an orchestrator progress event into a snapshot.
 */
export const applyRunProgress = (snapshot: ProgressSnapshot, event: RunProgress): ProgressSnapshot => ({
  ...snapshot,
  status: 'downloading',
  progress: event.total > 0 ? Math.floor((event.index / event.total) * 100) : 0,
  currentTrack: event.current,
  total: event.total,
  successCount: event.successCount,
  skippedCount: event.skippedCount,
  failedCount: event.failedCount,
});
