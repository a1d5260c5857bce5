import ytSearch, { type VideoSearchResult } from 'yt-search';
import type { CandidateMatch } from './types.js';

export const DEFAULT_SEARCH_LIMIT = 5;

/**
 * Maps a yt-search video to a candidate match.
 */
export const toCandidate = (video: VideoSearchResult): CandidateMatch => ({
  title: video.title,
  durationSeconds: video.seconds,
  url: video.url,
  // recomputed against the track by selectBest
  confident: false,
});

/**
 * Performs a keyword search on YouTube and returns the videos in the engine's ranking.
 */
export const searchCandidates = async (
  query: string,
  limit: number = DEFAULT_SEARCH_LIMIT,
): Promise<CandidateMatch[]> => {
  const searchResult = await ytSearch(query);
  const videos = searchResult.videos ?? [];
  return videos.slice(0, limit).map(toCandidate);
};
