import { logger } from '../../utils/logger';
import { ScheduleSlot } from '../planner/schedule.builder';
import { HeuristicWorkloadNarrator } from './heuristic.narrator';
import { buildGuidancePrompt, buildWorkloadPrompt, parseWorkloadResponse } from './workload.prompt';
import { GuidanceContext, SemesterWorkload, TextGenerator, WorkloadNarrator } from './workload.types';

/**
 * Narrates each semester through the text generator.
 * A failed or unparseable reply falls back to the heuristic for that semester only.
 */
export class AiWorkloadNarrator implements WorkloadNarrator {
    readonly mode = 'ai' as const;

    constructor(
        private readonly generator: TextGenerator,
        private readonly fallback: HeuristicWorkloadNarrator
    ) {}

    async narrate(schedule: readonly ScheduleSlot[]): Promise<SemesterWorkload[]> {
        const results: SemesterWorkload[] = [];
        // One outstanding generator call at a time
        for (const slot of schedule) {
            results.push(await this.analyze(slot));
        }
        return results;
    }

    async advise(slot: ScheduleSlot, context: GuidanceContext): Promise<string> {
        if (slot.courses.length === 0) {
            return '';
        }
        try {
            return (await this.generator.generate(buildGuidancePrompt(slot, context))).trim();
        } catch (error) {
            logger.warn('AI schedule guidance failed', { semester: slot.semester }, error);
            return '';
        }
    }

    private async analyze(slot: ScheduleSlot): Promise<SemesterWorkload> {
        if (slot.courses.length === 0) {
            return this.fallback.analyze(slot);
        }
        try {
            const reply = await this.generator.generate(buildWorkloadPrompt(slot));
            return parseWorkloadResponse(reply, slot);
        } catch (error) {
            logger.warn('AI workload analysis failed, using heuristic narration', { semester: slot.semester }, error);
            return this.fallback.analyze(slot);
        }
    }
}
