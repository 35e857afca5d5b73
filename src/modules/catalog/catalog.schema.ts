import { z } from 'zod';
import { ACADEMIC_LEVELS, CAREER_PATH_IDS } from './catalog.types';

// Data file schemas: courses.json and colleges.json

export const courseRecordSchema = z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    level: z.enum(ACADEMIC_LEVELS),
    credits: z.number().int().positive(),
    prerequisites: z.array(z.string().min(1)).default([]),
    tags: z.array(z.string().min(1)).default([]),
    careerPaths: z.array(z.enum(CAREER_PATH_IDS)).default([]),
});

export const courseDocumentSchema = z.object({
    courses: z.record(z.string().min(1), courseRecordSchema),
});

export const collegeRecordSchema = z.object({
    name: z.string().min(1),
    courses: z.array(z.string().min(1)).min(1),
});

export const collegeDocumentSchema = z.object({
    colleges: z.record(z.string().min(1), collegeRecordSchema),
});

export const collegeParamsSchema = z.object({
    params: z.object({
        collegeId: z.string().min(1).max(100),
    }),
});

export const courseParamsSchema = z.object({
    params: z.object({
        courseId: z.string().min(1).max(100),
    }),
});

export type CourseDocument = z.infer<typeof courseDocumentSchema>;
export type CollegeDocument = z.infer<typeof collegeDocumentSchema>;
