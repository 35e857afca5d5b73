import { ScheduleSlot } from '../planner/schedule.builder';
import { SemesterWorkload, WorkloadNarrator } from './workload.types';

export const HOURS_PER_CREDIT = 2;
export const MAX_TIPS = 3;
export const ADVANCED_TAG = 'advanced';

export const DEFAULT_TIP = 'Start assignments early and keep a consistent weekly study schedule.';

const TIP_BY_TAG = new Map<string, string>([
    ['math', 'Work practice problems every day instead of cramming before exams.'],
    ['theory', 'Rewrite proofs from memory after lectures to check your understanding.'],
    ['programming', 'Commit code in small increments and test as you go.'],
    ['systems', 'Budget extra time for debugging low-level projects.'],
    ['ai', 'Reproduce lecture examples in a notebook before starting assignments.'],
    ['ml', 'Review linear algebra and probability before each new model family.'],
    ['data', 'Keep a clean, versioned copy of every dataset you work with.'],
    ['security', 'Set up an isolated lab environment before the first hands-on exercise.'],
    ['networking', 'Trace real packets with a capture tool to connect theory to practice.'],
    ['web', 'Deploy small milestones early so integration problems surface sooner.'],
    ['project', 'Agree on team roles and a shared calendar in the first week.'],
    [ADVANCED_TAG, 'Attend office hours early in the term for advanced courses.'],
]);

export interface HeuristicNarratorOptions {
    minCredits: number;
}

export class HeuristicWorkloadNarrator implements WorkloadNarrator {
    readonly mode = 'heuristic' as const;

    constructor(private readonly options: HeuristicNarratorOptions = { minCredits: 12 }) {}

    async narrate(schedule: readonly ScheduleSlot[]): Promise<SemesterWorkload[]> {
        return schedule.map((slot) => this.analyze(slot));
    }

    async advise(): Promise<string> {
        return '';
    }

    analyze(slot: ScheduleSlot): SemesterWorkload {
        const credits = slot.totalCredits;
        const advanced = slot.courses.filter((course) => course.tags.includes(ADVANCED_TAG));

        return {
            semester: slot.semester,
            difficultyRating: this.difficulty(slot),
            weeklyHours: credits * HOURS_PER_CREDIT,
            tips: this.tips(slot),
            challenges: slot.courses.length === 0
                ? 'No courses scheduled.'
                : advanced.length > 0
                    ? `Advanced coursework (${advanced.map((course) => course.name).join(', ')}) may produce overlapping deadlines.`
                    : 'No advanced courses this term; expect a steady workload.',
            balance: this.balance(credits, advanced.length, slot.courses.length),
            totalCredits: credits,
            method: 'heuristic',
        };
    }

    private difficulty(slot: ScheduleSlot): number {
        if (slot.courses.length === 0) {
            return 1;
        }
        const credits = slot.totalCredits;
        const base = credits >= 15 ? 7 : credits >= 12 ? 6 : 4;
        const advanced = slot.courses.filter((course) => course.tags.includes(ADVANCED_TAG)).length;
        return Math.min(10, Math.max(1, base + advanced));
    }

    private tips(slot: ScheduleSlot): string[] {
        const tips = new Set<string>();
        for (const course of slot.courses) {
            for (const tag of course.tags) {
                const tip = TIP_BY_TAG.get(tag);
                if (tip !== undefined) {
                    tips.add(tip);
                }
            }
        }
        const selected = [...tips].slice(0, MAX_TIPS);
        return selected.length > 0 ? selected : [DEFAULT_TIP];
    }

    private balance(credits: number, advancedCount: number, courseCount: number): string {
        if (courseCount === 0) {
            return 'No courses scheduled this semester.';
        }
        if (credits < this.options.minCredits) {
            return `Light load of ${credits} credits, below the ${this.options.minCredits}-credit full-time minimum.`;
        }
        if (credits >= 16 || advancedCount >= 2) {
            return `Heavy load of ${credits} credits with ${advancedCount} advanced course(s); protect time for projects.`;
        }
        return `Balanced load of ${credits} credits.`;
    }
}
