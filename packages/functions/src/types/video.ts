import type { ExerciseProposal } from './generation.js';

export type VideoHost = 'youtube' | 'vimeo';

export interface RecognizedVideo {
  host: VideoHost;
  video_id: string;
  /** Canonical watch URL for the host. */
  url: string;
}

/** Transient: a search hit that passed the hosting-pattern filter. Never stored on its own. */
export interface VideoCandidate extends RecognizedVideo {
  thumbnail_url: string;
  query: string;
}

export interface EnrichedProposal extends ExerciseProposal {
  video_url: string;
  video_thumbnail_url: string;
}

export interface VideoSearchCredentials {
  apiKey: string;
  searchEngineId: string;
}

export interface VideoEnrichmentDeps {
  fetchFn: typeof fetch;
  credentials: VideoSearchCredentials;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}
