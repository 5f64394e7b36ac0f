import type { Exercise } from '../types/database.js';
import type { ExerciseRepository } from '../repositories/exercise.repository.js';
import type { PatientExerciseRepository } from '../repositories/patient-exercise.repository.js';
import type { PainPointRepository } from '../repositories/pain-point.repository.js';

/** Linked exercises needed before generation is skipped. */
export const CACHE_HIT_THRESHOLD = 3;
export const TEMPLATE_FALLBACK_LIMIT = 5;

export type CacheResolution =
  | { kind: 'linked'; exercises: Exercise[] }
  | { kind: 'template'; exercises: Exercise[] }
  | { kind: 'miss'; exercises: [] };

export interface ExerciseCacheDeps {
  exercises: Pick<ExerciseRepository, 'findByIds' | 'findTemplates'>;
  patientExercises: Pick<PatientExerciseRepository, 'findByPatientId'>;
  painPoints: Pick<PainPointRepository, 'hasPainPoints'>;
}

/**
 * Decides whether stored exercises can answer a request without calling any
 * generation provider or video search.
 *
 * The template fallback is an unfiltered slice of template exercises; it does
 * not match pain-point content against template content.
 */
export async function resolveCachedExercises(
  deps: ExerciseCacheDeps,
  patientId: string
): Promise<CacheResolution> {
  const links = await deps.patientExercises.findByPatientId(patientId);
  if (links.length > 0) {
    const linked = await deps.exercises.findByIds(links.map((link) => link.exercise_id));
    if (linked.length >= CACHE_HIT_THRESHOLD) {
      return { kind: 'linked', exercises: linked };
    }
  }

  const hasPainPoints = await deps.painPoints.hasPainPoints(patientId);
  if (!hasPainPoints) {
    return { kind: 'miss', exercises: [] };
  }

  const templates = await deps.exercises.findTemplates(TEMPLATE_FALLBACK_LIMIT);
  return { kind: 'template', exercises: templates };
}

export function isCacheHit(resolution: CacheResolution): boolean {
  return resolution.exercises.length >= CACHE_HIT_THRESHOLD;
}
