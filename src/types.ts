export interface TrackDescriptor {
  readonly title: string;
  readonly artists: readonly string[];
  readonly album: string;
  readonly albumArtist: string;
  readonly trackNumber: number;
  readonly discNumber: number;
  readonly durationMs: number;
  readonly releaseYear: number | null;
  readonly catalogUrl: string;
  readonly coverArtUrl: string | null;
  readonly genres: readonly string[];
  readonly isrc: string | null;
  readonly explicit: boolean;
  /** Always `buildSearchQuery(artists, title)`; see normalize.ts. */
  readonly searchQuery: string;
}

export type OutcomeStatus = 'success' | 'skipped' | 'failed';

export type FailureReason = 'NoMatch' | 'FetchError' | 'TagError';

export interface DownloadOutcome {
  readonly track: TrackDescriptor;
  readonly status: OutcomeStatus;
  readonly reason?: FailureReason | 'AlreadyExists';
  readonly detail?: string;
  readonly filePath?: string;
  readonly timestamp: string;
}

export interface CandidateMatch {
  readonly title: string;
  readonly durationSeconds: number;
  readonly url: string;
  readonly confident: boolean;
}

export interface PlaylistMeta {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly owner: string;
  readonly totalTracks: number;
}

/** One playlist search hit, as listed by the web front. */
export interface PlaylistSummary {
  readonly id: string;
  readonly name: string;
  readonly tracks: number;
  readonly owner: string;
  readonly url: string;
  readonly image: string | null;
}

export interface RunProgress {
  readonly index: number;
  readonly total: number;
  readonly current: string;
  readonly successCount: number;
  readonly skippedCount: number;
  readonly failedCount: number;
}

// Raw catalog shapes. Only the fields the normalizer reads; the Spotify SDK's
// richer objects are structurally assignable to these.

export interface RawArtist {
  readonly id?: string | null;
  readonly name: string;
}

export interface RawImage {
  readonly url: string;
  readonly width?: number | null;
  readonly height?: number | null;
}

export interface RawAlbum {
  readonly name: string;
  readonly artists?: readonly RawArtist[];
  readonly images?: readonly RawImage[];
  readonly release_date?: string | null;
}

export interface RawTrack {
  readonly type: string;
  readonly id?: string | null;
  readonly name: string;
  readonly is_local?: boolean;
  readonly artists?: readonly RawArtist[];
  readonly album?: RawAlbum;
  readonly track_number?: number;
  readonly disc_number?: number;
  readonly duration_ms: number;
  readonly explicit?: boolean;
  readonly external_ids?: { readonly isrc?: string };
  readonly external_urls?: { readonly spotify?: string };
  readonly uri?: string;
}

export interface RawPlaylistItem {
  readonly is_local?: boolean;
  readonly track: RawTrack | null;
}
