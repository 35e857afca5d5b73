import { mock } from 'jest-mock-extended';
import { PlannerService } from '../planner.service';
import { HeuristicWorkloadNarrator } from '../../workload/heuristic.narrator';
import { WorkloadNarrator } from '../../workload/workload.types';
import { AppError } from '../../../utils/app-error';
import { makeCatalog, makeCourse } from '../../../__tests__/fixtures';

describe('PlannerService', () => {
  const catalog = makeCatalog(
    [
      makeCourse('A', { credits: 4, tags: ['programming'] }),
      makeCourse('B', { level: 'sophomore', credits: 4, prerequisites: ['A'], tags: ['ai', 'ml'], careerPaths: ['ai-researcher'] }),
      makeCourse('C', { credits: 4, tags: ['security'], careerPaths: ['security-engineer'] }),
      makeCourse('D', { level: 'junior', credits: 4, prerequisites: ['B'], tags: ['ai'] }),
      makeCourse('X', { credits: 4, tags: ['ai'] }),
    ],
    { uni: ['A', 'B', 'C', 'D'] }
  );
  const limits = { minCredits: 8, maxCredits: 8, maxCoursesPerSemester: 2 };
  const service = new PlannerService(catalog, new HeuristicWorkloadNarrator({ minCredits: 8 }), limits);

  describe('recommend', () => {
    it('should rank next courses and suggest electives offered by the college', () => {
      const result = service.recommend({
        college: 'uni',
        completedCourses: ['A'],
        careerPath: 'security-engineer',
        interests: 'AI, security',
      });

      expect(result.collegeName).toBe('College uni');
      expect(result.nextCourses.map((r) => r.courseId)).toEqual(['C', 'B']);
      expect(result.nextCourses[0].reason).toBe("Freshman level course; supports the Security Engineer path; matches 'security' tag");
      expect(result.electiveSuggestions.map((s) => [s.courseId, s.reason])).toEqual([
        ['C', "matches 'security' tag"],
        ['B', "matches 'ai' tag"],
        ['D', "matches 'ai' tag"],
      ]);
    });

    it('should reject an unknown college as client input', () => {
      expect(() => service.recommend({ college: 'nowhere', completedCourses: [], interests: '' }))
        .toThrow(new AppError('College not found: nowhere', 400));
    });

    it('should reject unknown completed courses', () => {
      let caught: unknown;
      try {
        service.recommend({ college: 'uni', completedCourses: ['A', 'ZZ9'], interests: '' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({ statusCode: 400, message: 'Unknown course identifiers: ZZ9' });
    });
  });

  describe('generateSchedule', () => {
    it('should plan semesters with heuristic workload for each one', async () => {
      const result = await service.generateSchedule({
        college: 'uni',
        completedCourses: [],
        careerPath: 'ai-researcher',
        interests: '',
        semesters: 4,
      });

      expect(result.narratorMode).toBe('heuristic');
      expect(result.careerPath).toEqual({ id: 'ai-researcher', name: 'AI Researcher' });
      expect(result.schedule.map((slot) => slot.courses.map((c) => c.courseId))).toEqual([['A', 'C'], ['B'], ['D'], []]);
      expect(result.schedule.map((slot) => slot.underFilled)).toEqual([false, true, true, true]);
      expect(result.schedule.map((slot) => slot.workload.semester)).toEqual([1, 2, 3, 4]);
      expect(result.schedule.every((slot) => slot.workload.method === 'heuristic' && slot.guidance === '')).toBe(true);
    });

    it('should seed planning with completed courses and pass guidance context', async () => {
      const narrator = mock<WorkloadNarrator>();
      narrator.narrate.mockImplementation(async (slots) =>
        new HeuristicWorkloadNarrator().narrate(slots)
      );
      narrator.advise.mockResolvedValue('Plan ahead.');
      const withMock = new PlannerService(catalog, narrator, limits);

      const result = await withMock.generateSchedule({
        college: 'uni',
        completedCourses: ['A'],
        interests: 'ai',
        semesters: 2,
      });

      expect(result.careerPath).toBeNull();
      expect(result.schedule.map((slot) => slot.courses.map((c) => c.courseId))).toEqual([['C', 'B'], ['D']]);
      expect(result.schedule.map((slot) => slot.guidance)).toEqual(['Plan ahead.', 'Plan ahead.']);
      expect(narrator.advise).toHaveBeenNthCalledWith(1, expect.objectContaining({ semester: 1 }), {
        careerPath: undefined,
        interests: ['ai'],
        completed: ['A'],
        remainingSemesters: 1,
      });
      expect(narrator.advise).toHaveBeenNthCalledWith(2, expect.objectContaining({ semester: 2 }), expect.objectContaining({ remainingSemesters: 0 }));
    });
  });
});
