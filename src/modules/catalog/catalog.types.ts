export const ACADEMIC_LEVELS = ['freshman', 'sophomore', 'junior', 'senior'] as const;
export type AcademicLevel = typeof ACADEMIC_LEVELS[number];

export const CAREER_PATH_IDS = [
    'software-engineer',
    'data-scientist',
    'ai-researcher',
    'security-engineer',
    'systems-engineer',
    'full-stack-developer',
] as const;
export type CareerPathId = typeof CAREER_PATH_IDS[number];

const CAREER_PATH_NAMES: Record<CareerPathId, string> = {
    'software-engineer': 'Software Engineer',
    'data-scientist': 'Data Scientist',
    'ai-researcher': 'AI Researcher',
    'security-engineer': 'Security Engineer',
    'systems-engineer': 'Systems Engineer',
    'full-stack-developer': 'Full-Stack Developer',
};

export interface CareerPath {
    readonly id: CareerPathId;
    readonly name: string;
}

export const CAREER_PATHS: readonly CareerPath[] = CAREER_PATH_IDS.map((id) => ({ id, name: CAREER_PATH_NAMES[id] }));

export interface Course {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly level: AcademicLevel;
    readonly credits: number;
    readonly prerequisites: readonly string[];
    readonly tags: readonly string[];
    readonly careerPaths: readonly CareerPathId[];
}

export interface College {
    readonly id: string;
    readonly name: string;
    readonly courses: readonly string[];
}

/**
 * Read-only course and curriculum data, built once at startup and passed
 * explicitly to every service that needs it.
 */
export interface Catalog {
    readonly courses: ReadonlyMap<string, Course>;
    readonly colleges: ReadonlyMap<string, College>;
}

export const levelRank = (level: AcademicLevel): number => ACADEMIC_LEVELS.indexOf(level) + 1;

export const findCareerPath = (id: string): CareerPath | undefined =>
    CAREER_PATHS.find((path) => path.id === id);
