/**
 * Exercise Recommendation Service
 *
 * Runs the recommendation pipeline for one request:
 * 1. Load the patient profile (404 when unknown)
 * 2. Resolve cached exercises; a hit returns without any provider call
 * 3. Generate proposals with the requested provider
 * 4. Enrich proposals with video, one at a time
 * 5. Persist with name dedup and link each exercise to the patient
 */

import { info } from 'firebase-functions/logger';
import type { Exercise } from '../types/database.js';
import type {
  ExerciseGenerationProvider,
  ExerciseProposal,
  GenerationProviderTag,
} from '../types/generation.js';
import type { EnrichedProposal } from '../types/video.js';
import type { RecommendationSource } from '../types/api.js';
import { loadPatientProfile, type PatientProfileDeps } from './patient-profile.service.js';
import {
  isCacheHit,
  resolveCachedExercises,
  type ExerciseCacheDeps,
} from './exercise-cache.service.js';
import {
  ExercisePersistenceService,
  type ExercisePersistenceDeps,
} from './exercise-persistence.service.js';

export interface VideoEnricher {
  enrich(proposal: ExerciseProposal): Promise<EnrichedProposal>;
}

export interface ExerciseRecommendationDeps {
  patients: PatientProfileDeps['patients'];
  painPoints: PatientProfileDeps['painPoints'] & ExerciseCacheDeps['painPoints'];
  exercises: ExerciseCacheDeps['exercises'] & ExercisePersistenceDeps['exercises'];
  patientExercises: ExerciseCacheDeps['patientExercises'] & ExercisePersistenceDeps['patientExercises'];
  /** Built per request so credentials are read fresh on every invocation. */
  createProvider: (tag: GenerationProviderTag) => ExerciseGenerationProvider;
  createVideoEnricher: () => VideoEnricher;
}

export interface RecommendationRequest {
  patientId: string;
  provider: GenerationProviderTag;
}

export interface RecommendationResult {
  exercises: Exercise[];
  source: RecommendationSource;
}

export class ExerciseRecommendationService {
  private readonly persistence: ExercisePersistenceService;

  constructor(private readonly deps: ExerciseRecommendationDeps) {
    this.persistence = new ExercisePersistenceService({
      exercises: deps.exercises,
      patientExercises: deps.patientExercises,
    });
  }

  async recommend(request: RecommendationRequest): Promise<RecommendationResult> {
    const { patientId } = request;
    const profile = await loadPatientProfile(this.deps, patientId);

    const cached = await resolveCachedExercises(this.deps, patientId);
    if (isCacheHit(cached)) {
      info('recommendation:cache_hit', {
        phase: 'cache',
        patient_id: patientId,
        kind: cached.kind,
        exercise_count: cached.exercises.length,
      });
      return { exercises: cached.exercises, source: 'cache' };
    }

    // Resolve both clients before spending a generation call on a misconfigured deploy.
    const provider = this.deps.createProvider(request.provider);
    const enricher = this.deps.createVideoEnricher();

    info('recommendation:cache_miss', {
      phase: 'cache',
      patient_id: patientId,
      kind: cached.kind,
      provider: provider.name,
      pain_point_count: profile.pain_points.length,
    });

    const proposals = await provider.generate(profile);

    const enriched: EnrichedProposal[] = [];
    for (const proposal of proposals) {
      enriched.push(await enricher.enrich(proposal));
    }

    const exercises = await this.persistence.persist(patientId, enriched);
    info('recommendation:generated', {
      phase: 'complete',
      patient_id: patientId,
      exercise_count: exercises.length,
      with_video: exercises.filter((exercise) => exercise.video_url !== '').length,
    });
    return { exercises, source: 'generated' };
  }
}
