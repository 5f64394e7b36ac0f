import { info, warn } from 'firebase-functions/logger';
import type { ExerciseProposal, SecretStore } from '../types/generation.js';
import type {
  EnrichedProposal,
  RecognizedVideo,
  VideoCandidate,
  VideoEnrichmentDeps,
} from '../types/video.js';
import { EnrichmentFailure } from '../types/errors.js';
import { searchResponseSchema, type SearchResultItem } from '../schemas/video-search.schema.js';

export const GOOGLE_SEARCH_API_KEY_SECRET = 'GOOGLE_SEARCH_API_KEY';
export const GOOGLE_SEARCH_ENGINE_ID_SECRET = 'GOOGLE_SEARCH_ENGINE_ID';

const SEARCH_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';
const SEARCH_RESULT_COUNT = 5;
const SEARCH_TIMEOUT_MS = 10_000;
const PROBE_TIMEOUT_MS = 5_000;

export const PRIMARY_QUERY_QUALIFIER = 'physical therapy exercise';
export const ALTERNATE_QUERY_QUALIFIER = 'rehabilitation exercise demonstration';

const YOUTUBE_PATTERNS: readonly RegExp[] = [
  /^https?:\/\/(?:www\.|m\.)?youtube\.com\/watch\?(?:[^#]*&)?v=([A-Za-z0-9_-]{11})(?:[&#]|$)/,
  /^https?:\/\/(?:www\.|m\.)?youtube\.com\/(?:shorts|embed)\/([A-Za-z0-9_-]{11})(?:[?/#]|$)/,
  /^https?:\/\/youtu\.be\/([A-Za-z0-9_-]{11})(?:[?/#]|$)/,
];

const VIMEO_PATTERN = /^https?:\/\/(?:www\.)?vimeo\.com\/(\d+)(?:[?/#]|$)/;

export function buildPrimaryQuery(exerciseName: string): string {
  return `${exerciseName} ${PRIMARY_QUERY_QUALIFIER}`;
}

export function buildAlternateQuery(exerciseName: string): string {
  return `${exerciseName} ${ALTERNATE_QUERY_QUALIFIER}`;
}

/**
 * Matches a link against the supported hosting platforms. Anything else is
 * not a video this service will store.
 */
export function recognizeVideoUrl(link: string): RecognizedVideo | null {
  for (const pattern of YOUTUBE_PATTERNS) {
    const videoId = pattern.exec(link)?.[1];
    if (videoId !== undefined) {
      return {
        host: 'youtube',
        video_id: videoId,
        url: `https://www.youtube.com/watch?v=${videoId}`,
      };
    }
  }

  const vimeoId = VIMEO_PATTERN.exec(link)?.[1];
  if (vimeoId !== undefined) {
    return { host: 'vimeo', video_id: vimeoId, url: `https://vimeo.com/${vimeoId}` };
  }

  return null;
}

/** Thumbnail embedded in the search metadata, if the result carries one. */
export function readMetadataThumbnail(item: SearchResultItem): string | null {
  const candidates = [
    item.pagemap?.cse_thumbnail?.[0]?.src,
    item.pagemap?.videoobject?.[0]?.thumbnailurl,
  ];
  for (const candidate of candidates) {
    if (candidate !== undefined && candidate.startsWith('https://')) {
      return candidate;
    }
  }
  return null;
}

export function deriveThumbnailUrl(video: RecognizedVideo): string {
  if (video.host === 'youtube') {
    return `https://img.youtube.com/vi/${video.video_id}/hqdefault.jpg`;
  }
  return '';
}

export function buildProbeUrl(video: RecognizedVideo): string {
  const target = encodeURIComponent(video.url);
  if (video.host === 'youtube') {
    return `https://www.youtube.com/oembed?url=${target}&format=json`;
  }
  return `https://vimeo.com/api/oembed.json?url=${target}`;
}

function emptyMedia(proposal: ExerciseProposal): EnrichedProposal {
  return { ...proposal, video_url: '', video_thumbnail_url: '' };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

/**
 * Attaches a validated demonstration video to each proposal.
 *
 * A proposal gets at most two searches: the primary query and, when that
 * yields nothing usable, a single alternate query. Enrichment never throws;
 * an unresolved proposal keeps empty media fields.
 */
export class VideoEnrichmentService {
  constructor(private readonly deps: VideoEnrichmentDeps) {}

  async enrich(proposal: ExerciseProposal): Promise<EnrichedProposal> {
    const queries = [buildPrimaryQuery(proposal.name), buildAlternateQuery(proposal.name)];

    for (const [index, query] of queries.entries()) {
      const attempt = index + 1;
      try {
        const candidate = await this.findValidCandidate(query);
        this.deps.info('video:resolved', {
          phase: 'video_enrichment',
          exercise: proposal.name,
          attempt,
          host: candidate.host,
        });
        return {
          ...proposal,
          video_url: candidate.url,
          video_thumbnail_url: candidate.thumbnail_url,
        };
      } catch (err) {
        this.deps.warn('video:attempt_failed', {
          phase: 'video_enrichment',
          exercise: proposal.name,
          attempt,
          query,
          error_message: describeError(err),
        });
      }
    }

    return emptyMedia(proposal);
  }

  /** Runs one search and validates its top recognized hit. */
  private async findValidCandidate(query: string): Promise<VideoCandidate> {
    const items = await this.search(query);

    let candidate: VideoCandidate | null = null;
    for (const item of items) {
      const video = item.link !== undefined ? recognizeVideoUrl(item.link) : null;
      if (video !== null) {
        candidate = {
          ...video,
          thumbnail_url: readMetadataThumbnail(item) ?? deriveThumbnailUrl(video),
          query,
        };
        break;
      }
    }

    if (candidate === null) {
      throw new EnrichmentFailure(`No recognized video link for "${query}"`);
    }

    const exists = await this.probe(candidate);
    if (!exists) {
      throw new EnrichmentFailure(`Video ${candidate.url} failed validation`);
    }
    return candidate;
  }

  private async search(query: string): Promise<SearchResultItem[]> {
    const url = new URL(SEARCH_ENDPOINT);
    url.searchParams.set('key', this.deps.credentials.apiKey);
    url.searchParams.set('cx', this.deps.credentials.searchEngineId);
    url.searchParams.set('q', query);
    url.searchParams.set('num', String(SEARCH_RESULT_COUNT));

    const response = await this.deps.fetchFn(url.toString(), {
      signal: AbortSignal.timeout(SEARCH_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new EnrichmentFailure(`Video search returned ${response.status}`);
    }

    const body: unknown = await response.json();
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EnrichmentFailure('Video search response has an unexpected shape', parsed.error);
    }
    return parsed.data.items ?? [];
  }

  private async probe(video: RecognizedVideo): Promise<boolean> {
    try {
      const response = await this.deps.fetchFn(buildProbeUrl(video), {
        signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
      });
      return response.ok;
    } catch (err) {
      this.deps.warn('video:probe_failed', {
        phase: 'video_validation',
        url: video.url,
        error_message: describeError(err),
      });
      return false;
    }
  }
}

export function createVideoEnrichmentService(secrets: SecretStore): VideoEnrichmentService {
  return new VideoEnrichmentService({
    fetchFn: fetch,
    credentials: {
      apiKey: secrets.get(GOOGLE_SEARCH_API_KEY_SECRET),
      searchEngineId: secrets.get(GOOGLE_SEARCH_ENGINE_ID_SECRET),
    },
    info,
    warn,
  });
}
