import { createWorkloadNarrator } from '../narrator.factory';
import { AiWorkloadNarrator } from '../ai.narrator';
import { HeuristicWorkloadNarrator } from '../heuristic.narrator';

describe('createWorkloadNarrator', () => {
  const schedule = { minCredits: 12, maxCredits: 18, maxCoursesPerSemester: 5 };

  it('should use heuristic narration without an API key', () => {
    const narrator = createWorkloadNarrator({ ai: { model: 'gemini-1.5-flash', timeoutMs: 8000 }, schedule });

    expect(narrator).toBeInstanceOf(HeuristicWorkloadNarrator);
    expect(narrator.mode).toBe('heuristic');
  });

  it('should use AI narration when an API key is configured', () => {
    const narrator = createWorkloadNarrator({
      ai: { apiKey: 'test-key', model: 'gemini-1.5-flash', timeoutMs: 8000 },
      schedule,
    });

    expect(narrator).toBeInstanceOf(AiWorkloadNarrator);
    expect(narrator.mode).toBe('ai');
  });
});
