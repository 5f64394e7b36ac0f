import { type Request, type Response, type NextFunction } from 'express';
import { errorHandler } from '../middleware/error-handler.js';
import { createBaseApp } from '../middleware/create-base-app.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validateParams } from '../middleware/validate.js';
import { patientIdParamsSchema } from '../schemas/recommendation.schema.js';
import { ExerciseRepository } from '../repositories/exercise.repository.js';
import { PatientRepository } from '../repositories/patient.repository.js';
import { PatientExerciseRepository } from '../repositories/patient-exercise.repository.js';
import { getPatientPlan, type PatientPlanDeps } from '../services/patient-plan.service.js';
import type { PatientPlanResponse } from '../types/api.js';
import { getFirestoreDb } from '../firebase.js';

const app = createBaseApp();

let deps: PatientPlanDeps | null = null;
function getDeps(): PatientPlanDeps {
  if (deps === null) {
    const db = getFirestoreDb();
    deps = {
      patients: new PatientRepository(db),
      exercises: new ExerciseRepository(db),
      patientExercises: new PatientExerciseRepository(db),
    };
  }
  return deps;
}

// GET /patients/:patientId/exercises
app.get(
  '/:patientId/exercises',
  validateParams(patientIdParamsSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { patientId } = patientIdParamsSchema.parse(req.params);
    const entries = await getPatientPlan(getDeps(), patientId);

    const response: PatientPlanResponse = {
      status: 'success',
      patient_id: patientId,
      exercises: entries,
    };
    res.json(response);
  })
);

app.use(errorHandler);

export const patientsApp = app;
