import { AppError } from '../../utils/app-error';
import { CAREER_PATHS, CareerPath, Catalog, College, Course } from './catalog.types';

export interface CollegeSummary {
    id: string;
    name: string;
    courseCount: number;
}

export class CatalogService {
    constructor(private readonly catalog: Catalog) {}

    listColleges(): CollegeSummary[] {
        return [...this.catalog.colleges.values()].map((college) => ({
            id: college.id,
            name: college.name,
            courseCount: college.courses.length,
        }));
    }

    findCollege(collegeId: string): College | undefined {
        return this.catalog.colleges.get(collegeId);
    }

    getCollege(collegeId: string): College {
        const college = this.findCollege(collegeId);
        if (!college) {
            throw new AppError('College not found', 404);
        }
        return college;
    }

    getOfferedCourses(collegeId: string): Course[] {
        const college = this.getCollege(collegeId);
        return college.courses.flatMap((courseId) => {
            const course = this.catalog.courses.get(courseId);
            return course ? [course] : [];
        });
    }

    getCourse(courseId: string): Course {
        const course = this.catalog.courses.get(courseId);
        if (!course) {
            throw new AppError('Course not found', 404);
        }
        return course;
    }

    listCareerPaths(): readonly CareerPath[] {
        return CAREER_PATHS;
    }

    stats() {
        return {
            courses: this.catalog.courses.size,
            colleges: this.catalog.colleges.size,
        };
    }
}
