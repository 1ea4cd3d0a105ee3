import { z } from 'zod';
import {
    EdgeRole,
    isEdgeRole,
    type EdgeRoleClassifier,
    type EdgeRoleInput,
    type EdgeRoleResult,
    type LlmProvider,
} from '../types/index.js';
import { MalformedClassificationError } from '../utils/errors.js';

export const EDGE_ROLE_SYSTEM_PROMPT = [
    'You are an expert assistant that classifies the rhetorical relationship between two academic papers. Paper A cites Paper B.',
    '',
    'You are given the titles and abstracts of both papers. Infer how A most likely uses B in its argument.',
    '',
    'Allowed roles:',
    "- SUPPORT: A agrees with, confirms, extends, or relies positively on B's findings.",
    '- DISPUTE: A disagrees with, challenges, contradicts, or shows opposing results to B.',
    '- BACKGROUND: A mainly cites B as background, context, a general reference, or neutral mention without clear support or dispute.',
    "- METHOD: A mainly uses, adapts, or evaluates methods from B, independent of whether it supports or disputes B's substantive claims.",
    '',
    "If you cannot clearly infer support or dispute from A's abstract, prefer BACKGROUND or METHOD.",
    '',
    'Return a JSON object with fields:',
    '{',
    '  "role": "SUPPORT" | "DISPUTE" | "BACKGROUND" | "METHOD",',
    '  "confidence": number between 0 and 1,',
    '  "reason": short explanation (1-3 sentences)',
    '}',
].join('\n');

export function buildEdgeRolePrompt(input: EdgeRoleInput): string {
    return [
        'Classify the relationship between these two papers.',
        '',
        'Paper A (citing):',
        `TITLE: ${input.citing.title}`,
        `ABSTRACT: ${input.citing.abstract}`,
        '',
        'Paper B (cited):',
        `TITLE: ${input.cited.title}`,
        `ABSTRACT: ${input.cited.abstract}`,
    ].join('\n');
}

const responseSchema = z.object({
    role: z.unknown(),
    confidence: z.unknown(),
    reason: z.unknown(),
});

/**
 * Read a classifier answer.
 *
 * Unknown roles become BACKGROUND, a non-numeric confidence becomes 0.5 and
 * numeric ones are clamped to [0, 1]. Text that is not a JSON object throws
 * MalformedClassificationError.
 */
export function parseEdgeRoleResponse(content: string): EdgeRoleResult {
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch {
        throw new MalformedClassificationError(content);
    }

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
        throw new MalformedClassificationError(content);
    }

    const rawRole = String(parsed.data.role ?? EdgeRole.BACKGROUND).trim().toUpperCase();
    const role = isEdgeRole(rawRole) ? rawRole : EdgeRole.BACKGROUND;

    const rawConfidence = parsed.data.confidence ?? 0.5;
    const numeric = typeof rawConfidence === 'number' || typeof rawConfidence === 'string'
        ? Number(rawConfidence)
        : NaN;
    const confidence = Number.isFinite(numeric) ? Math.min(1, Math.max(0, numeric)) : 0.5;

    const reason = parsed.data.reason === undefined || parsed.data.reason === null
        ? ''
        : String(parsed.data.reason).trim();

    return { role, confidence, reason };
}

/**
 * Edge-role classifier backed by an LLM provider, using titles and abstracts
 * of both papers.
 */
export class LlmEdgeRoleClassifier implements EdgeRoleClassifier {
    constructor(
        private readonly provider: LlmProvider,
        private readonly options: { model?: string; temperature?: number } = {}
    ) {}

    async classify(input: EdgeRoleInput): Promise<EdgeRoleResult> {
        const result = await this.provider.complete(buildEdgeRolePrompt(input), {
            model: this.options.model,
            temperature: this.options.temperature ?? 0.2,
            jsonMode: true,
            systemPrompt: EDGE_ROLE_SYSTEM_PROMPT,
        });
        return parseEdgeRoleResponse(result.text);
    }
}
