import { AcademicLevel, CareerPathId, Catalog } from '../catalog/catalog.types';
import { eligibleCourses } from './prerequisite.resolver';
import { rankRecommendations } from './recommendation.ranker';

export const DEFAULT_SEMESTERS = 8;

export interface ScheduleLimits {
    minCredits: number;
    maxCredits: number;
    maxCoursesPerSemester: number;
}

export const DEFAULT_LIMITS: ScheduleLimits = {
    minCredits: 12,
    maxCredits: 18,
    maxCoursesPerSemester: 5,
};

export interface ScheduledCourse {
    courseId: string;
    name: string;
    description: string;
    level: AcademicLevel;
    credits: number;
    tags: readonly string[];
    careerRelevant: boolean;
}

export interface ScheduleSlot {
    semester: number;
    year: number;
    term: 'Fall' | 'Spring';
    courses: ScheduledCourse[];
    totalCredits: number;
    /** Below the minimum credit band; planning continues regardless. */
    underFilled: boolean;
    availableCount: number;
}

export interface ScheduleOptions {
    careerPath?: CareerPathId;
    interests?: readonly string[];
    /** Courses already taken before the plan starts. Empty by default. */
    completed?: Iterable<string>;
    semesters?: number;
    limits?: ScheduleLimits;
}

/**
 * Greedy semester-by-semester planner.
 *
 * Eligibility is computed against courses completed before the plan plus
 * courses placed in earlier semesters, so a course always lands strictly
 * after its prerequisites. There is no backtracking: a semester that cannot
 * reach `minCredits` is emitted flagged as under-filled.
 */
export function buildSchedule(
    catalog: Catalog,
    offeredCourses: readonly string[],
    options: ScheduleOptions = {}
): ScheduleSlot[] {
    const semesters = options.semesters ?? DEFAULT_SEMESTERS;
    const limits = options.limits ?? DEFAULT_LIMITS;
    const completed = new Set<string>(options.completed ?? []);
    const schedule: ScheduleSlot[] = [];

    for (let semester = 1; semester <= semesters; semester++) {
        const ranked = rankRecommendations(eligibleCourses(catalog, offeredCourses, completed), {
            careerPath: options.careerPath,
            interests: options.interests,
        });

        const courses: ScheduledCourse[] = [];
        let totalCredits = 0;

        for (const candidate of ranked) {
            if (courses.length >= limits.maxCoursesPerSemester) {
                break;
            }
            if (totalCredits + candidate.credits > limits.maxCredits) {
                continue;
            }

            courses.push({
                courseId: candidate.courseId,
                name: candidate.name,
                description: candidate.description,
                level: candidate.level,
                credits: candidate.credits,
                tags: candidate.tags,
                careerRelevant: candidate.careerRelevant,
            });
            totalCredits += candidate.credits;
        }

        // Only after the semester is closed, so same-semester prerequisites never count
        for (const course of courses) {
            completed.add(course.courseId);
        }

        schedule.push({
            semester,
            year: Math.floor((semester - 1) / 2) + 1,
            term: (semester - 1) % 2 === 0 ? 'Fall' : 'Spring',
            courses,
            totalCredits,
            underFilled: totalCredits < limits.minCredits,
            availableCount: ranked.length,
        });
    }

    return schedule;
}
