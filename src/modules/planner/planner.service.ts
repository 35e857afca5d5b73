import { AppError } from '../../utils/app-error';
import { Catalog, CareerPathId, College, findCareerPath } from '../catalog/catalog.types';
import { SemesterWorkload, WorkloadNarrator } from '../workload/workload.types';
import { eligibleCourses } from './prerequisite.resolver';
import { Recommendation, parseInterests, rankRecommendations, suggestElectives } from './recommendation.ranker';
import { DEFAULT_LIMITS, ScheduleLimits, ScheduleSlot, buildSchedule } from './schedule.builder';
import { RecommendationRequest, ScheduleRequest } from './planner.schema';

export const MAX_ELECTIVE_SUGGESTIONS = 5;

export interface RecommendationResult {
    collegeId: string;
    collegeName: string;
    nextCourses: Recommendation[];
    electiveSuggestions: Recommendation[];
}

export interface PlannedSemester extends ScheduleSlot {
    workload: SemesterWorkload;
    guidance: string;
}

export interface ScheduleResult {
    collegeId: string;
    collegeName: string;
    careerPath: { id: CareerPathId; name: string } | null;
    narratorMode: WorkloadNarrator['mode'];
    schedule: PlannedSemester[];
}

interface StudentContext {
    college: College;
    completed: Set<string>;
    interests: string[];
}

export class PlannerService {
    constructor(
        private readonly catalog: Catalog,
        private readonly narrator: WorkloadNarrator,
        private readonly limits: ScheduleLimits = DEFAULT_LIMITS
    ) {}

    recommend(input: RecommendationRequest): RecommendationResult {
        const { college, completed, interests } = this.resolveStudent(input);

        const nextCourses = rankRecommendations(eligibleCourses(this.catalog, college.courses, completed), {
            careerPath: input.careerPath,
            interests,
        });

        const electivePool = college.courses.flatMap((courseId) => {
            const course = this.catalog.courses.get(courseId);
            return course && !completed.has(courseId) ? [course] : [];
        });

        return {
            collegeId: college.id,
            collegeName: college.name,
            nextCourses,
            electiveSuggestions: suggestElectives(electivePool, interests).slice(0, MAX_ELECTIVE_SUGGESTIONS),
        };
    }

    async generateSchedule(input: ScheduleRequest): Promise<ScheduleResult> {
        const { college, completed, interests } = this.resolveStudent(input);

        const slots = buildSchedule(this.catalog, college.courses, {
            careerPath: input.careerPath,
            interests,
            completed,
            semesters: input.semesters,
            limits: this.limits,
        });

        const workloads = await this.narrator.narrate(slots);

        const schedule: PlannedSemester[] = [];
        for (const [index, slot] of slots.entries()) {
            const guidance = await this.narrator.advise(slot, {
                careerPath: input.careerPath,
                interests,
                completed: [...completed],
                remainingSemesters: slots.length - index - 1,
            });
            schedule.push({ ...slot, workload: workloads[index], guidance });
        }

        const careerPath = input.careerPath ? findCareerPath(input.careerPath) : undefined;

        return {
            collegeId: college.id,
            collegeName: college.name,
            careerPath: careerPath ? { id: careerPath.id, name: careerPath.name } : null,
            narratorMode: this.narrator.mode,
            schedule,
        };
    }

    private resolveStudent(input: RecommendationRequest): StudentContext {
        const college = this.catalog.colleges.get(input.college);
        if (!college) {
            throw new AppError(`College not found: ${input.college}`, 400);
        }

        const unknown = input.completedCourses.filter((courseId) => !this.catalog.courses.has(courseId));
        if (unknown.length > 0) {
            throw new AppError(`Unknown course identifiers: ${unknown.join(', ')}`, 400);
        }

        return {
            college,
            completed: new Set(input.completedCourses),
            interests: parseInterests(input.interests),
        };
    }
}
