import { NoMatchError } from './errors.js';
import type { CandidateMatch, TrackDescriptor } from './types.js';
import type { Logger } from './utils.js';

export const DURATION_TOLERANCE_SECONDS = 30;

export const isDurationClose = (track: TrackDescriptor, durationSeconds: number): boolean =>
  Math.abs(durationSeconds - track.durationMs / 1000) <= DURATION_TOLERANCE_SECONDS;

/**
 * Takes the search engine's top-ranked candidate. Duration only sets the confidence
 * flag; a mismatch is logged, never rejected.
 */
export const selectBest = (
  track: TrackDescriptor,
  candidates: readonly CandidateMatch[],
  logger: Logger,
): CandidateMatch => {
  const [first] = candidates;
  if (!first) {
    throw new NoMatchError(track.searchQuery);
  }

  const confident = isDurationClose(track, first.durationSeconds);
  if (!confident) {
    const expected = Math.round(track.durationMs / 1000);
    logger.warn(
      `Duration mismatch for "${track.searchQuery}": expected ${expected}s, got ${Math.round(first.durationSeconds)}s`,
    );
  }
  return { ...first, confident };
};
