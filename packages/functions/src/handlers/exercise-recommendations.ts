/**
 * Exercise Recommendation Handlers
 *
 * POST / with `{ patient_id, provider }` returns the patient's exercises,
 * either from the store or freshly generated and enriched with video.
 */

import { type Request, type Response, type NextFunction } from 'express';
import { errorHandler } from '../middleware/error-handler.js';
import { createBaseApp } from '../middleware/create-base-app.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validate } from '../middleware/validate.js';
import { generateExercisesRequestSchema } from '../schemas/recommendation.schema.js';
import { ExerciseRepository } from '../repositories/exercise.repository.js';
import { PainPointRepository } from '../repositories/pain-point.repository.js';
import { PatientRepository } from '../repositories/patient.repository.js';
import { PatientExerciseRepository } from '../repositories/patient-exercise.repository.js';
import { ExerciseRecommendationService } from '../services/exercise-recommendation.service.js';
import { createGenerationProvider } from '../services/exercise-generation.service.js';
import { createVideoEnrichmentService } from '../services/video-enrichment.service.js';
import { FirebaseSecretStore } from '../services/secret-store.service.js';
import type { RecommendationResponse } from '../types/api.js';
import { getFirestoreDb } from '../firebase.js';

const app = createBaseApp();

// Lazy repository initialization
let repos: {
  patients: PatientRepository;
  painPoints: PainPointRepository;
  exercises: ExerciseRepository;
  patientExercises: PatientExerciseRepository;
} | null = null;
function getRepos(): NonNullable<typeof repos> {
  if (repos === null) {
    const db = getFirestoreDb();
    repos = {
      patients: new PatientRepository(db),
      painPoints: new PainPointRepository(db),
      exercises: new ExerciseRepository(db),
      patientExercises: new PatientExerciseRepository(db),
    };
  }
  return repos;
}

function createRecommendationService(): ExerciseRecommendationService {
  const secrets = new FirebaseSecretStore();
  return new ExerciseRecommendationService({
    ...getRepos(),
    createProvider: (tag) => createGenerationProvider(tag, secrets),
    createVideoEnricher: () => createVideoEnrichmentService(secrets),
  });
}

// POST /
app.post(
  '/',
  validate(generateExercisesRequestSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const body = generateExercisesRequestSchema.parse(req.body);
    const result = await createRecommendationService().recommend({
      patientId: body.patient_id,
      provider: body.provider,
    });

    const response: RecommendationResponse = {
      status: 'success',
      exercises: result.exercises,
      source: result.source,
    };
    res.json(response);
  })
);

// Error handler must be last
app.use(errorHandler);

export const exerciseRecommendationsApp = app;
