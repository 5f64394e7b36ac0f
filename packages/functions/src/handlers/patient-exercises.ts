import { type Request, type Response, type NextFunction } from 'express';
import { errorHandler } from '../middleware/error-handler.js';
import { createBaseApp } from '../middleware/create-base-app.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validate, validateParams } from '../middleware/validate.js';
import {
  patientExerciseIdParamsSchema,
  updatePrescriptionSchema,
} from '../schemas/recommendation.schema.js';
import { ExerciseRepository } from '../repositories/exercise.repository.js';
import { PatientRepository } from '../repositories/patient.repository.js';
import { PatientExerciseRepository } from '../repositories/patient-exercise.repository.js';
import { updatePrescription, type PatientPlanDeps } from '../services/patient-plan.service.js';
import type { PrescriptionUpdateResponse } from '../types/api.js';
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

// PUT /patient-exercises/:id/prescription
app.put(
  '/:id/prescription',
  validateParams(patientExerciseIdParamsSchema),
  validate(updatePrescriptionSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { id } = patientExerciseIdParamsSchema.parse(req.params);
    const changes = updatePrescriptionSchema.parse(req.body);
    const patientExercise = await updatePrescription(getDeps(), id, changes);

    const response: PrescriptionUpdateResponse = {
      status: 'success',
      patient_exercise: patientExercise,
    };
    res.json(response);
  })
);

app.use(errorHandler);

export const patientExercisesApp = app;
