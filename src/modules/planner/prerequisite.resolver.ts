import { Catalog, Course } from '../catalog/catalog.types';

/**
 * A course is takeable once every listed prerequisite is completed.
 * Prerequisites are AND-only; alternative (OR) groups are not modelled.
 */
export function isEligible(course: Course, completed: ReadonlySet<string>): boolean {
    return !completed.has(course.id) && course.prerequisites.every((prereq) => completed.has(prereq));
}

/**
 * Courses the student can take next, in the college's offering order.
 * Offered ids missing from the catalog are ignored.
 */
export function eligibleCourses(
    catalog: Catalog,
    offeredCourses: readonly string[],
    completed: ReadonlySet<string>
): Course[] {
    const eligible: Course[] = [];
    const seen = new Set<string>();

    for (const courseId of offeredCourses) {
        const course = catalog.courses.get(courseId);
        if (!course || seen.has(courseId)) {
            continue;
        }
        seen.add(courseId);

        if (isEligible(course, completed)) {
            eligible.push(course);
        }
    }

    return eligible;
}
