import { z } from 'zod';
import { GENERATION_PROVIDER_TAGS } from '../types/generation.js';

export const generateExercisesRequestSchema = z.object({
  patient_id: z.string().trim().min(1),
  provider: z.enum(GENERATION_PROVIDER_TAGS).default('A'),
});

export type GenerateExercisesRequest = z.infer<typeof generateExercisesRequestSchema>;

export const patientIdParamsSchema = z.object({
  patientId: z.string().min(1),
});

export const patientExerciseIdParamsSchema = z.object({
  id: z.string().min(1),
});

export const updatePrescriptionSchema = z
  .object({
    frequency: z.string().trim().min(1).max(50).optional(),
    sets: z.number().int().min(1).max(20).optional(),
    repetitions: z.number().int().min(1).max(100).optional(),
    notes: z.string().max(1000).optional(),
    pt_id: z.string().min(1).optional(),
  })
  .refine(
    (data) =>
      data.frequency !== undefined ||
      data.sets !== undefined ||
      data.repetitions !== undefined ||
      data.notes !== undefined,
    { message: 'At least one prescription field is required' }
  );

export type UpdatePrescriptionRequest = z.infer<typeof updatePrescriptionSchema>;
