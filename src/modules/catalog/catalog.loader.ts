import fs from 'fs';
import path from 'path';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { AppError } from '../../utils/app-error';
import { logger } from '../../utils/logger';
import { Catalog, College, Course } from './catalog.types';
import { CollegeDocument, CourseDocument, collegeDocumentSchema, courseDocumentSchema } from './catalog.schema';

export const COURSES_FILE = 'courses.json';
export const COLLEGES_FILE = 'colleges.json';

export class CatalogLoadError extends AppError {
    constructor(message: string) {
        super(message, 500, false);
    }
}

// Self-references and unknown ids are reported separately and skipped here.
function findPrerequisiteCycles(courses: Map<string, Course>): string[][] {
    const state = new Map<string, 'visiting' | 'done'>();
    const trail: string[] = [];
    const cycles: string[][] = [];

    const visit = (id: string): void => {
        state.set(id, 'visiting');
        trail.push(id);
        for (const prereq of courses.get(id)?.prerequisites ?? []) {
            if (prereq === id || !courses.has(prereq)) {
                continue;
            }
            const seen = state.get(prereq);
            if (seen === 'visiting') {
                cycles.push([...trail.slice(trail.indexOf(prereq)), prereq]);
            } else if (seen === undefined) {
                visit(prereq);
            }
        }
        trail.pop();
        state.set(id, 'done');
    };

    for (const id of courses.keys()) {
        if (!state.has(id)) {
            visit(id);
        }
    }
    return cycles;
}

/**
 * Builds the immutable catalog from already-parsed documents.
 * Every prerequisite and every offered course must reference a known course,
 * and the prerequisite graph must be acyclic.
 */
export function buildCatalog(courseDoc: CourseDocument, collegeDoc: CollegeDocument): Catalog {
    const courses = new Map<string, Course>();
    for (const [id, record] of Object.entries(courseDoc.courses)) {
        courses.set(id, Object.freeze({
            id,
            name: record.name,
            description: record.description,
            level: record.level,
            credits: record.credits,
            prerequisites: Object.freeze([...record.prerequisites]),
            tags: Object.freeze(record.tags.map((tag) => tag.toLowerCase())),
            careerPaths: Object.freeze([...record.careerPaths]),
        }));
    }

    const problems: string[] = [];
    for (const course of courses.values()) {
        for (const prereq of course.prerequisites) {
            if (prereq === course.id) {
                problems.push(`${course.id} lists itself as a prerequisite`);
            } else if (!courses.has(prereq)) {
                problems.push(`${course.id} requires unknown course ${prereq}`);
            }
        }
    }
    for (const cycle of findPrerequisiteCycles(courses)) {
        problems.push(`prerequisite cycle: ${cycle.join(' -> ')}`);
    }

    const colleges = new Map<string, College>();
    for (const [id, record] of Object.entries(collegeDoc.colleges)) {
        const unknown = record.courses.filter((courseId) => !courses.has(courseId));
        if (unknown.length > 0) {
            problems.push(`college ${id} offers unknown courses: ${unknown.join(', ')}`);
        }
        colleges.set(id, Object.freeze({
            id,
            name: record.name,
            courses: Object.freeze([...new Set(record.courses)]),
        }));
    }

    if (problems.length > 0) {
        throw new CatalogLoadError(`Catalog data is inconsistent: ${problems.join('; ')}`);
    }

    return Object.freeze({ courses, colleges });
}

async function readDocument<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    let raw: string;
    try {
        raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CatalogLoadError(`Cannot read ${filePath}: ${reason}`);
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CatalogLoadError(`Malformed JSON in ${filePath}: ${reason}`);
    }

    try {
        return schema.parse(json);
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues.map((issue) => `${issue.path.join('.')} : ${issue.message}`).join(', ');
            throw new CatalogLoadError(`Invalid structure in ${filePath}: ${details}`);
        }
        throw error;
    }
}

export async function loadCatalog(dataDir: string): Promise<Catalog> {
    const courseDoc = await readDocument(path.join(dataDir, COURSES_FILE), courseDocumentSchema);
    const collegeDoc = await readDocument(path.join(dataDir, COLLEGES_FILE), collegeDocumentSchema);

    const catalog = buildCatalog(courseDoc, collegeDoc);
    logger.info('Catalog loaded', {
        dataDir,
        courses: catalog.courses.size,
        colleges: catalog.colleges.size,
    });

    return catalog;
}
