import { z } from 'zod';
import { findCareerPath } from '../catalog/catalog.types';
import { ScheduleSlot } from '../planner/schedule.builder';
import { InvalidResponseError } from './workload.errors';
import { GuidanceContext, SemesterWorkload } from './workload.types';
import { MAX_TIPS } from './heuristic.narrator';

const aiWorkloadSchema = z.object({
    difficulty_rating: z.union([z.number(), z.string().trim().regex(/^\d+(?:\.\d+)?$/).transform(Number)]),
    weekly_hours: z.union([z.number().nonnegative(), z.string()]),
    challenges: z.string().default(''),
    tips: z.union([z.string(), z.array(z.string())]),
    balance_analysis: z.string().min(1),
});

export function buildWorkloadPrompt(slot: ScheduleSlot): string {
    const lines = slot.courses.map((course) => `- ${course.name} (${course.level}, ${course.credits} credits): ${course.description}`);

    return [
        'Analyze the workload for this computer science semester schedule and provide a brief, actionable analysis in JSON format.',
        '',
        'Courses:',
        ...lines,
        `Total Credits: ${slot.totalCredits}`,
        '',
        'Return a JSON object with these exact keys: difficulty_rating (1-10 integer), weekly_hours (number of study hours per week), '
            + 'challenges (string), tips (array of 1-3 short strings), balance_analysis (string).',
    ].join('\n');
}

export function buildGuidancePrompt(slot: ScheduleSlot, context: GuidanceContext): string {
    const careerName = context.careerPath ? findCareerPath(context.careerPath)?.name ?? context.careerPath : 'General CS';

    return [
        'As an academic advisor, provide brief, actionable guidance for this CS student:',
        '',
        `Career Goal: ${careerName}`,
        `Interests: ${context.interests.length > 0 ? context.interests.join(', ') : 'None specified'}`,
        `Completed Courses: ${context.completed.length > 0 ? context.completed.join(', ') : 'None yet'}`,
        `Remaining Semesters: ${context.remainingSemesters}`,
        '',
        'Current Semester Courses:',
        ...slot.courses.map((course) => `${course.name} (${course.level}): ${course.description}`),
        '',
        'Provide 2-3 specific, actionable recommendations to optimize their learning and career preparation. Keep it under 100 words.',
    ].join('\n');
}

/** Pulls the JSON object out of a reply that may be wrapped in prose or code fences. */
export function extractJsonObject(text: string): unknown {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
    const candidate = fenced ? fenced[1] : text;
    const start = candidate.indexOf('{');
    const end = candidate.lastIndexOf('}');

    if (start === -1 || end <= start) {
        throw new InvalidResponseError('No JSON object found in workload analysis');
    }

    try {
        return JSON.parse(candidate.slice(start, end + 1));
    } catch {
        throw new InvalidResponseError('Workload analysis is not valid JSON');
    }
}

function parseHours(value: number | string): number {
    if (typeof value === 'number') {
        return Math.round(value);
    }
    const numbers = (value.match(/\d+(?:\.\d+)?/g) ?? []).map(Number);
    if (numbers.length === 0) {
        throw new InvalidResponseError(`Cannot read weekly hours from "${value}"`);
    }
    // "20-25 hours" becomes the midpoint
    return Math.round(numbers.reduce((sum, n) => sum + n, 0) / numbers.length);
}

function parseTips(value: string | string[]): string[] {
    const raw = Array.isArray(value) ? value : value.split(/\n+/);
    const tips = raw
        .map((tip) => tip.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
        .filter((tip) => tip.length > 0)
        .slice(0, MAX_TIPS);

    if (tips.length === 0) {
        throw new InvalidResponseError('Workload analysis contains no tips');
    }
    return tips;
}

export function parseWorkloadResponse(text: string, slot: ScheduleSlot): SemesterWorkload {
    const result = aiWorkloadSchema.safeParse(extractJsonObject(text));
    if (!result.success) {
        const details = result.error.issues.map((issue) => `${issue.path.join('.')} : ${issue.message}`).join(', ');
        throw new InvalidResponseError(`Workload analysis has unexpected fields: ${details}`);
    }

    const analysis = result.data;
    if (!Number.isFinite(analysis.difficulty_rating)) {
        throw new InvalidResponseError('Workload analysis has no usable difficulty rating');
    }

    return {
        semester: slot.semester,
        difficultyRating: Math.min(10, Math.max(1, Math.round(analysis.difficulty_rating))),
        weeklyHours: parseHours(analysis.weekly_hours),
        tips: parseTips(analysis.tips),
        challenges: analysis.challenges,
        balance: analysis.balance_analysis,
        totalCredits: slot.totalCredits,
        method: 'ai',
    };
}
