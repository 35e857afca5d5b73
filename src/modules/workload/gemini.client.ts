import axios from 'axios';
import { z } from 'zod';
import { InvalidResponseError, ServiceUnavailableError } from './workload.errors';
import { TextGenerator } from './workload.types';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const generateContentResponseSchema = z.object({
    candidates: z
        .array(
            z.object({
                content: z
                    .object({
                        parts: z.array(z.object({ text: z.string().optional() })).default([]),
                    })
                    .optional(),
            })
        )
        .default([]),
});

export interface GeminiClientOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
}

/**
 * Gemini generateContent over REST.
 * Single attempt bounded by timeoutMs; callers decide what to do on failure.
 */
export class GeminiTextGenerator implements TextGenerator {
    constructor(private readonly options: GeminiClientOptions) {}

    async generate(prompt: string): Promise<string> {
        let data: unknown;
        try {
            const response = await axios.post(
                `${GEMINI_BASE_URL}/models/${encodeURIComponent(this.options.model)}:generateContent`,
                { contents: [{ role: 'user', parts: [{ text: prompt }] }] },
                {
                    headers: { 'x-goog-api-key': this.options.apiKey },
                    timeout: this.options.timeoutMs,
                }
            );
            data = response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                throw new ServiceUnavailableError(
                    status ? `Gemini request failed with status ${status}` : `Gemini request failed: ${error.code ?? error.message}`
                );
            }
            throw new ServiceUnavailableError(`Gemini request failed: ${error instanceof Error ? error.message : String(error)}`);
        }

        const parsed = generateContentResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new InvalidResponseError('Gemini response has an unexpected shape');
        }

        const text = (parsed.data.candidates[0]?.content?.parts ?? [])
            .map((part) => part.text ?? '')
            .join('')
            .trim();

        if (!text) {
            throw new InvalidResponseError('Gemini response contains no text');
        }
        return text;
    }
}
