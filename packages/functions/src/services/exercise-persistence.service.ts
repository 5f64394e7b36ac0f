import { info, error as logError } from 'firebase-functions/logger';
import type { Exercise, ExerciseMediaBackfill } from '../types/database.js';
import type { EnrichedProposal } from '../types/video.js';
import { PersistenceError } from '../types/errors.js';
import type { ExerciseRepository } from '../repositories/exercise.repository.js';
import type { PatientExerciseRepository } from '../repositories/patient-exercise.repository.js';

export interface ExercisePersistenceDeps {
  exercises: Pick<ExerciseRepository, 'findByName' | 'create' | 'update'>;
  patientExercises: Pick<PatientExerciseRepository, 'create'>;
}

/**
 * Media fields the stored exercise lacks and the proposal can supply.
 * Populated fields are never part of the patch.
 */
export function buildMediaBackfill(
  existing: Pick<Exercise, 'video_url' | 'video_thumbnail_url'>,
  proposal: Pick<EnrichedProposal, 'video_url' | 'video_thumbnail_url'>
): ExerciseMediaBackfill {
  const patch: ExerciseMediaBackfill = {};
  if (existing.video_url === '' && proposal.video_url !== '') {
    patch.video_url = proposal.video_url;
  }
  if (existing.video_thumbnail_url === '' && proposal.video_thumbnail_url !== '') {
    patch.video_thumbnail_url = proposal.video_thumbnail_url;
  }
  return patch;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

/**
 * Write-through merge of enriched proposals, deduplicated by exercise name,
 * plus one patient link per proposal.
 *
 * The name lookup and the insert are separate operations: two concurrent runs
 * proposing the same new name can both insert.
 */
export class ExercisePersistenceService {
  constructor(private readonly deps: ExercisePersistenceDeps) {}

  async persist(patientId: string, proposals: readonly EnrichedProposal[]): Promise<Exercise[]> {
    const saved: Exercise[] = [];

    for (const proposal of proposals) {
      try {
        const exercise = await this.upsertExercise(proposal);
        await this.deps.patientExercises.create({
          patient_id: patientId,
          exercise_id: exercise.id,
        });
        saved.push(exercise);
      } catch (err) {
        logError('persistence:write_failed', {
          phase: 'persist',
          patient_id: patientId,
          exercise: proposal.name,
          written_before_failure: saved.length,
          error_message: describeError(err),
        });
        throw new PersistenceError(
          `Failed to save exercise "${proposal.name}": ${describeError(err)}`
        );
      }
    }

    info('persistence:complete', {
      phase: 'persist',
      patient_id: patientId,
      exercise_count: saved.length,
    });
    return saved;
  }

  private async upsertExercise(proposal: EnrichedProposal): Promise<Exercise> {
    const existing = await this.deps.exercises.findByName(proposal.name);
    if (existing === null) {
      return this.deps.exercises.create({
        name: proposal.name,
        description: proposal.description,
        target_joints: proposal.target_joints,
        instructions: proposal.instructions,
        video_url: proposal.video_url,
        video_thumbnail_url: proposal.video_thumbnail_url,
        source: 'llm-generated',
        is_template: false,
      });
    }

    const patch = buildMediaBackfill(existing, proposal);
    if (Object.keys(patch).length === 0) {
      return existing;
    }
    const updated = await this.deps.exercises.update(existing.id, patch);
    return updated ?? { ...existing, ...patch };
  }
}
