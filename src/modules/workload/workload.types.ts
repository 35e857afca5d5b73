import { CareerPathId } from '../catalog/catalog.types';
import { ScheduleSlot } from '../planner/schedule.builder';

export type NarrationMethod = 'ai' | 'heuristic';

/** Same shape whichever narrator produced it. */
export interface SemesterWorkload {
    semester: number;
    difficultyRating: number;
    weeklyHours: number;
    tips: string[];
    challenges: string;
    balance: string;
    totalCredits: number;
    method: NarrationMethod;
}

export interface GuidanceContext {
    careerPath?: CareerPathId;
    interests: readonly string[];
    completed: readonly string[];
    remainingSemesters: number;
}

export interface WorkloadNarrator {
    readonly mode: NarrationMethod;
    narrate(schedule: readonly ScheduleSlot[]): Promise<SemesterWorkload[]>;
    /** Free-text advisor note for one semester; empty when unavailable. */
    advise(slot: ScheduleSlot, context: GuidanceContext): Promise<string>;
}

/** Prompt in, text out. */
export interface TextGenerator {
    generate(prompt: string): Promise<string>;
}
