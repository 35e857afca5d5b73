import path from 'path';
import { Catalog, College, Course } from '../modules/catalog/catalog.types';
import { ScheduleSlot, ScheduledCourse } from '../modules/planner/schedule.builder';

export const DATA_DIR = path.resolve(__dirname, '../../data');

export function makeCourse(id: string, overrides: Partial<Omit<Course, 'id'>> = {}): Course {
  return {
    id,
    name: `Course ${id}`,
    description: '',
    level: 'freshman',
    credits: 3,
    prerequisites: [],
    tags: [],
    careerPaths: [],
    ...overrides,
  };
}

export function makeCatalog(courses: Course[], colleges: Record<string, string[]> = {}): Catalog {
  const collegeEntries: [string, College][] = Object.entries(colleges).map(([id, offered]) => [
    id,
    { id, name: `College ${id}`, courses: offered },
  ]);
  return {
    courses: new Map(courses.map((course): [string, Course] => [course.id, course])),
    colleges: new Map(collegeEntries),
  };
}

export function makeScheduledCourse(id: string, overrides: Partial<Omit<ScheduledCourse, 'courseId'>> = {}): ScheduledCourse {
  return {
    courseId: id,
    name: `Course ${id}`,
    description: '',
    level: 'freshman',
    credits: 3,
    tags: [],
    careerRelevant: false,
    ...overrides,
  };
}

export function makeSlot(semester: number, courses: ScheduledCourse[]): ScheduleSlot {
  const totalCredits = courses.reduce((sum, course) => sum + course.credits, 0);
  return {
    semester,
    year: Math.floor((semester - 1) / 2) + 1,
    term: semester % 2 === 1 ? 'Fall' : 'Spring',
    courses,
    totalCredits,
    underFilled: totalCredits < 12,
    availableCount: courses.length,
  };
}
