import { describe, it, expect } from 'vitest';
import {
    EDGE_ROLE_SYSTEM_PROMPT,
    LlmEdgeRoleClassifier,
    buildEdgeRolePrompt,
    parseEdgeRoleResponse,
} from '../llm/edge-role-classifier.js';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider } from '../types/index.js';
import { EdgeRole } from '../types/index.js';
import { MalformedClassificationError } from '../utils/errors.js';

class FixedProvider implements LlmProvider {
    readonly name = 'fixed';
    readonly calls: Array<{ prompt: string; params?: LlmCompletionParams }> = [];

    constructor(private readonly text: string) {}

    async complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult> {
        this.calls.push({ prompt, params });
        return {
            text: this.text,
            usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
            model: 'fixed-model',
            provider: this.name,
        };
    }
}

const input = {
    citing: { title: 'Citing title', abstract: 'Citing abstract' },
    cited: { title: 'Cited title', abstract: '' },
};

describe('parseEdgeRoleResponse', () => {
    it('should read a well-formed answer', () => {
        expect(parseEdgeRoleResponse('{"role":"DISPUTE","confidence":0.8,"reason":" contradicts B "}')).toEqual({
            role: EdgeRole.DISPUTE,
            confidence: 0.8,
            reason: 'contradicts B',
        });
    });

    it('should normalise role case and unknown roles', () => {
        expect(parseEdgeRoleResponse('{"role":" method ","confidence":1}').role).toBe(EdgeRole.METHOD);
        expect(parseEdgeRoleResponse('{"role":"EXTENDS","confidence":1}').role).toBe(EdgeRole.BACKGROUND);
        expect(parseEdgeRoleResponse('{}').role).toBe(EdgeRole.BACKGROUND);
    });

    it('should clamp and default confidence', () => {
        expect(parseEdgeRoleResponse('{"role":"SUPPORT","confidence":1.7}').confidence).toBe(1);
        expect(parseEdgeRoleResponse('{"role":"SUPPORT","confidence":-3}').confidence).toBe(0);
        expect(parseEdgeRoleResponse('{"role":"SUPPORT","confidence":"0.25"}').confidence).toBe(0.25);
        expect(parseEdgeRoleResponse('{"role":"SUPPORT","confidence":"high"}').confidence).toBe(0.5);
        expect(parseEdgeRoleResponse('{"role":"SUPPORT"}')).toEqual({
            role: EdgeRole.SUPPORT,
            confidence: 0.5,
            reason: '',
        });
    });

    it('should throw on text that is not a JSON object', () => {
        expect(() => parseEdgeRoleResponse('SUPPORT, fairly sure')).toThrow(MalformedClassificationError);
        expect(() => parseEdgeRoleResponse('[1, 2]')).toThrow(MalformedClassificationError);
        expect(() => parseEdgeRoleResponse('"SUPPORT"')).toThrow(
            'Could not parse JSON from model: "\\"SUPPORT\\""'
        );
    });
});

describe('buildEdgeRolePrompt', () => {
    it('should include both titles and abstracts', () => {
        const prompt = buildEdgeRolePrompt(input);
        expect(prompt).toContain('TITLE: Citing title\nABSTRACT: Citing abstract');
        expect(prompt).toContain('TITLE: Cited title\nABSTRACT: ');
    });
});

describe('LlmEdgeRoleClassifier', () => {
    it('should request JSON output and parse the answer', async () => {
        const provider = new FixedProvider('{"role":"support","confidence":0.7,"reason":"builds on it"}');
        const classifier = new LlmEdgeRoleClassifier(provider, { model: 'test-model', temperature: 0 });

        const result = await classifier.classify(input);

        expect(result).toEqual({ role: EdgeRole.SUPPORT, confidence: 0.7, reason: 'builds on it' });
        expect(provider.calls[0]?.params).toEqual({
            model: 'test-model',
            temperature: 0,
            jsonMode: true,
            systemPrompt: EDGE_ROLE_SYSTEM_PROMPT,
        });
        expect(provider.calls[0]?.prompt).toBe(buildEdgeRolePrompt(input));
    });

    it('should surface unparseable answers as MalformedClassificationError', async () => {
        const classifier = new LlmEdgeRoleClassifier(new FixedProvider('I think SUPPORT'));
        await expect(classifier.classify(input)).rejects.toBeInstanceOf(MalformedClassificationError);
    });
});
