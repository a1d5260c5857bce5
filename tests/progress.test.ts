import { describe, expect, it } from 'vitest';
import { InMemoryProgressStore, applyRunProgress, initialSnapshot } from '../src/progress.js';

describe('InMemoryProgressStore', () => {
  it('stores frozen copies of each snapshot', () => {
    const store = new InMemoryProgressStore();
    const snapshot = initialSnapshot(new Date('2024-03-01T10:00:00.000Z'));

    store.set('job-1', snapshot);
    const stored = store.get('job-1');

    expect(stored).toEqual(snapshot);
    expect(stored).not.toBe(snapshot);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(store.get('job-2')).toBeUndefined();
  });
});

describe('initialSnapshot', () => {
  it('starts queued with zero counts', () => {
    expect(initialSnapshot(new Date('2024-03-01T10:00:00.000Z'))).toEqual({
      status: 'queued',
      progress: 0,
      currentTrack: '',
      total: 0,
      successCount: 0,
      skippedCount: 0,
      failedCount: 0,
      playlistName: null,
      error: null,
      startedAt: '2024-03-01T10:00:00.000Z',
      completedAt: null,
    });
  });
});

describe('applyRunProgress', () => {
  it('folds counts and a floored percentage into the snapshot', () => {
    const base = { ...initialSnapshot(), playlistName: 'Mix' };

    const next = applyRunProgress(base, {
      index: 1,
      total: 3,
      current: 'A - Test',
      successCount: 1,
      skippedCount: 0,
      failedCount: 0,
    });

    expect(next.status).toBe('downloading');
    expect(next.progress).toBe(33);
    expect(next.currentTrack).toBe('A - Test');
    expect(next.total).toBe(3);
    expect(next.successCount).toBe(1);
    expect(next.playlistName).toBe('Mix');
  });

  it('reports zero progress for an empty run', () => {
    const next = applyRunProgress(initialSnapshot(), {
      index: 0,
      total: 0,
      current: '',
      successCount: 0,
      skippedCount: 0,
      failedCount: 0,
    });
    expect(next.progress).toBe(0);
  });
});
