import { DEFAULT_TIP, HeuristicWorkloadNarrator } from '../heuristic.narrator';
import { makeScheduledCourse, makeSlot } from '../../../__tests__/fixtures';

describe('HeuristicWorkloadNarrator', () => {
  const narrator = new HeuristicWorkloadNarrator({ minCredits: 12 });

  it('should rate a full semester with one advanced course', () => {
    const slot = makeSlot(3, [
      makeScheduledCourse('CS301', { name: 'Algorithms', credits: 4, tags: ['algorithms', 'theory', 'advanced'] }),
      makeScheduledCourse('CS320', { credits: 4, tags: ['data', 'sql'] }),
      makeScheduledCourse('CS330', { credits: 4, tags: ['networking'] }),
      makeScheduledCourse('CS225', { credits: 3, tags: ['project'] }),
    ]);

    expect(narrator.analyze(slot)).toEqual({
      semester: 3,
      difficultyRating: 8,
      weeklyHours: 30,
      tips: [
        'Rewrite proofs from memory after lectures to check your understanding.',
        'Attend office hours early in the term for advanced courses.',
        'Keep a clean, versioned copy of every dataset you work with.',
      ],
      challenges: 'Advanced coursework (Algorithms) may produce overlapping deadlines.',
      balance: 'Balanced load of 15 credits.',
      totalCredits: 15,
      method: 'heuristic',
    });
  });

  it('should flag a light semester below the full-time minimum', () => {
    const slot = makeSlot(7, [makeScheduledCourse('CS490', { tags: ['research'] }), makeScheduledCourse('CS460')]);

    const result = narrator.analyze(slot);

    expect(result.difficultyRating).toBe(4);
    expect(result.weeklyHours).toBe(12);
    expect(result.tips).toEqual([DEFAULT_TIP]);
    expect(result.challenges).toBe('No advanced courses this term; expect a steady workload.');
    expect(result.balance).toBe('Light load of 6 credits, below the 12-credit full-time minimum.');
  });

  it('should fall back to the default tip for tags named like object properties', () => {
    const slot = makeSlot(1, [makeScheduledCourse('X', { tags: ['constructor', 'toString', '__proto__'] })]);

    expect(narrator.analyze(slot).tips).toEqual([DEFAULT_TIP]);
  });

  it('should cap difficulty at 10 and call out heavy loads', () => {
    const slot = makeSlot(8, [
      makeScheduledCourse('A', { credits: 4, tags: ['advanced'] }),
      makeScheduledCourse('B', { credits: 4, tags: ['advanced'] }),
      makeScheduledCourse('C', { credits: 4, tags: ['advanced'] }),
      makeScheduledCourse('D', { credits: 4, tags: ['advanced'] }),
    ]);

    const result = narrator.analyze(slot);

    expect(result.difficultyRating).toBe(10);
    expect(result.tips).toEqual(['Attend office hours early in the term for advanced courses.']);
    expect(result.balance).toBe('Heavy load of 16 credits with 4 advanced course(s); protect time for projects.');
  });

  it('should describe an empty semester', () => {
    const result = narrator.analyze(makeSlot(8, []));

    expect(result).toEqual({
      semester: 8,
      difficultyRating: 1,
      weeklyHours: 0,
      tips: [DEFAULT_TIP],
      challenges: 'No courses scheduled.',
      balance: 'No courses scheduled this semester.',
      totalCredits: 0,
      method: 'heuristic',
    });
  });

  it('should narrate every semester and never give guidance', async () => {
    const schedule = [makeSlot(1, [makeScheduledCourse('A')]), makeSlot(2, [])];

    const results = await narrator.narrate(schedule);

    expect(results.map((r) => r.semester)).toEqual([1, 2]);
    await expect(narrator.advise()).resolves.toBe('');
  });
});
