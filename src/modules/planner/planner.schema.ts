import { z } from 'zod';
import { CAREER_PATH_IDS } from '../catalog/catalog.types';
import { DEFAULT_SEMESTERS } from './schedule.builder';

export const MAX_SEMESTERS = 12;

const planRequestBody = z.object({
    college: z.string().min(1, 'College is required'),
    completedCourses: z.array(z.string().min(1)).max(200).default([]),
    // Empty string means "no career path selected"
    careerPath: z
        .union([z.enum(CAREER_PATH_IDS), z.literal('')])
        .optional()
        .transform((value) => value || undefined),
    interests: z.string().max(500).default(''),
});

const scheduleRequestBody = planRequestBody.extend({
    semesters: z.number().int().min(1).max(MAX_SEMESTERS).default(DEFAULT_SEMESTERS),
});

export const recommendationRequestSchema = z.object({
    body: planRequestBody,
});

export const scheduleRequestSchema = z.object({
    body: scheduleRequestBody,
});

export type RecommendationRequest = z.infer<typeof planRequestBody>;
export type ScheduleRequest = z.infer<typeof scheduleRequestBody>;
