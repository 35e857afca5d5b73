import { CareerPathId, Course, AcademicLevel, findCareerPath, levelRank } from '../catalog/catalog.types';

export interface Recommendation {
    courseId: string;
    name: string;
    description: string;
    level: AcademicLevel;
    credits: number;
    prerequisites: readonly string[];
    tags: readonly string[];
    careerRelevant: boolean;
    matches: string[];
    reason: string;
    score: number;
}

export interface RankingOptions {
    careerPath?: CareerPathId;
    interests?: readonly string[];
}

/** Splits free-text interests on commas into lower-cased, de-duplicated keywords. */
export function parseInterests(text: string | undefined): string[] {
    if (!text) {
        return [];
    }
    const keywords = text
        .split(',')
        .map((keyword) => keyword.trim().toLowerCase())
        .filter((keyword) => keyword.length > 0);
    return [...new Set(keywords)];
}

/**
 * One match per keyword, checked against tags, then name, then description.
 */
export function interestMatches(course: Course, keywords: readonly string[]): string[] {
    const name = course.name.toLowerCase();
    const description = course.description.toLowerCase();
    const matches: string[] = [];

    for (const keyword of keywords) {
        const tag = course.tags.find((candidate) => candidate === keyword)
            ?? course.tags.find((candidate) => candidate.includes(keyword));
        if (tag === keyword) {
            matches.push(`matches '${tag}' tag`);
        } else if (tag !== undefined) {
            matches.push(`'${keyword}' matches '${tag}' tag`);
        } else if (name.includes(keyword)) {
            matches.push(`course name contains '${keyword}'`);
        } else if (description.includes(keyword)) {
            matches.push(`description contains '${keyword}'`);
        }
    }

    return matches;
}

const compareIds = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const capitalize = (value: string) => value.charAt(0).toUpperCase() + value.slice(1);

function toRecommendation(course: Course, careerPath: CareerPathId | undefined, matches: string[]): Recommendation {
    const careerRelevant = careerPath !== undefined && course.careerPaths.includes(careerPath);
    const reasons = [`${capitalize(course.level)} level course`];
    if (careerRelevant && careerPath) {
        reasons.push(`supports the ${findCareerPath(careerPath)?.name ?? careerPath} path`);
    }
    reasons.push(...matches);

    return {
        courseId: course.id,
        name: course.name,
        description: course.description,
        level: course.level,
        credits: course.credits,
        prerequisites: course.prerequisites,
        tags: course.tags,
        careerRelevant,
        matches,
        reason: reasons.join('; '),
        score: matches.length + (careerRelevant ? 1 : 0),
    };
}

/**
 * Orders eligible courses: academic level ascending, career-tagged first,
 * interest score descending, then course id.
 */
export function rankRecommendations(courses: readonly Course[], options: RankingOptions = {}): Recommendation[] {
    const keywords = options.interests ?? [];

    return courses
        .map((course) => toRecommendation(course, options.careerPath, interestMatches(course, keywords)))
        .sort((a, b) =>
            levelRank(a.level) - levelRank(b.level)
            || Number(b.careerRelevant) - Number(a.careerRelevant)
            || b.matches.length - a.matches.length
            || compareIds(a.courseId, b.courseId)
        );
}

/**
 * Elective suggestions scored by interest keyword matches.
 * Courses without a single match are left out.
 */
export function suggestElectives(courses: readonly Course[], interests: readonly string[]): Recommendation[] {
    if (interests.length === 0) {
        return [];
    }

    return courses
        .map((course) => {
            const matches = interestMatches(course, interests);
            return { ...toRecommendation(course, undefined, matches), reason: matches.join('; '), score: matches.length };
        })
        .filter((suggestion) => suggestion.score > 0)
        .sort((a, b) =>
            b.score - a.score
            || levelRank(a.level) - levelRank(b.level)
            || compareIds(a.courseId, b.courseId)
        );
}
