import { onRequest, type HttpsFunction, type HttpsOptions } from 'firebase-functions/v2/https';
import { initializeFirebase } from './firebase.js';

// Initialize Firebase at cold start
initializeFirebase();

import { exerciseRecommendationsApp } from './handlers/exercise-recommendations.js';
import { patientsApp } from './handlers/patients.js';
import { patientExercisesApp } from './handlers/patient-exercises.js';
import { recommendationSecrets } from './services/secret-store.service.js';

// Common options
const defaultOptions: HttpsOptions = {
  region: 'us-central1',
  cors: true,
};

// Generation plus up to two searches per proposal
const withRecommendationOptions: HttpsOptions = {
  ...defaultOptions,
  secrets: recommendationSecrets,
  timeoutSeconds: 300,
};

/** Register a dev/prod function pair from an Express app. */
function register(
  app: import('express').Application,
  options: HttpsOptions = defaultOptions
): { dev: HttpsFunction; prod: HttpsFunction } {
  return {
    dev: onRequest(options, app),
    prod: onRequest(options, app),
  };
}

// ============ Function Registration ============
const { dev: devExerciseRecommendations, prod: prodExerciseRecommendations } =
  register(exerciseRecommendationsApp, withRecommendationOptions);
const { dev: devPatients, prod: prodPatients } = register(patientsApp);
const { dev: devPatientExercises, prod: prodPatientExercises } = register(patientExercisesApp);

export {
  devExerciseRecommendations, prodExerciseRecommendations,
  devPatients, prodPatients,
  devPatientExercises, prodPatientExercises,
};
