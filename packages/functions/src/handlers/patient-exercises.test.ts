import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import {
  createMockExerciseRepository,
  createMockPatientExerciseRepository,
  createMockPatientRepository,
  createPatientExercise,
  resetIdCounter,
  type ApiResponse,
} from '../__tests__/utils/index.js';

// Mock firebase before importing the handler
vi.mock('../firebase.js', () => ({
  getFirestoreDb: vi.fn(),
}));

const mockPatientRepo = createMockPatientRepository();
const mockExerciseRepo = createMockExerciseRepository();
const mockPatientExerciseRepo = createMockPatientExerciseRepository();

vi.mock('../repositories/patient.repository.js', () => ({
  PatientRepository: vi.fn().mockImplementation(() => mockPatientRepo),
}));
vi.mock('../repositories/exercise.repository.js', () => ({
  ExerciseRepository: vi.fn().mockImplementation(() => mockExerciseRepo),
}));
vi.mock('../repositories/patient-exercise.repository.js', () => ({
  PatientExerciseRepository: vi.fn().mockImplementation(() => mockPatientExerciseRepo),
}));

// Import after mocks
import { patientExercisesApp } from './patient-exercises.js';

describe('Patient Exercises Handler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    resetIdCounter();
  });

  describe('PUT /patient-exercises/:id/prescription', () => {
    it('should update the prescription', async () => {
      const updated = createPatientExercise({
        id: 'link-1',
        sets: 4,
        notes: 'Stop if pain exceeds 5/10',
        pt_modified: true,
        pt_id: 'pt-3',
      });
      mockPatientExerciseRepo.updatePrescription.mockResolvedValue(updated);

      const response = await request(patientExercisesApp)
        .put('/link-1/prescription')
        .send({ sets: 4, notes: 'Stop if pain exceeds 5/10', pt_id: 'pt-3' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'success', patient_exercise: updated });
      expect(mockPatientExerciseRepo.updatePrescription).toHaveBeenCalledWith('link-1', {
        sets: 4,
        notes: 'Stop if pain exceeds 5/10',
        pt_id: 'pt-3',
      });
    });

    it('should reject a body without prescription fields', async () => {
      const response = await request(patientExercisesApp)
        .put('/link-1/prescription')
        .send({ pt_id: 'pt-3' });

      expect(response.status).toBe(400);
      expect((response.body as ApiResponse).code).toBe('VALIDATION_ERROR');
      expect(mockPatientExerciseRepo.updatePrescription).not.toHaveBeenCalled();
    });

    it('should reject out-of-range sets', async () => {
      const response = await request(patientExercisesApp)
        .put('/link-1/prescription')
        .send({ sets: 0 });

      expect(response.status).toBe(400);
    });

    it('should return 404 for an unknown assignment', async () => {
      mockPatientExerciseRepo.updatePrescription.mockResolvedValue(null);

      const response = await request(patientExercisesApp)
        .put('/missing/prescription')
        .send({ repetitions: 12 });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: 'Patient exercise with id missing not found',
        code: 'NOT_FOUND',
      });
    });
  });
});
