import { AppConfig } from '../../config/env-validator';
import { logger } from '../../utils/logger';
import { AiWorkloadNarrator } from './ai.narrator';
import { GeminiTextGenerator } from './gemini.client';
import { HeuristicWorkloadNarrator } from './heuristic.narrator';
import { WorkloadNarrator } from './workload.types';

/** Picks the narrator once at startup from configuration. */
export function createWorkloadNarrator(config: Pick<AppConfig, 'ai' | 'schedule'>): WorkloadNarrator {
    const heuristic = new HeuristicWorkloadNarrator({ minCredits: config.schedule.minCredits });

    if (!config.ai.apiKey) {
        logger.info('No GEMINI_API_KEY configured - using heuristic workload narration');
        return heuristic;
    }

    logger.info('AI workload narration enabled', { model: config.ai.model, timeoutMs: config.ai.timeoutMs });
    const generator = new GeminiTextGenerator({
        apiKey: config.ai.apiKey,
        model: config.ai.model,
        timeoutMs: config.ai.timeoutMs,
    });
    return new AiWorkloadNarrator(generator, heuristic);
}
