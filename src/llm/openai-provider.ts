import { z } from 'zod';
import type {
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    LlmProviderOptions,
} from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { RoleGraphError } from '../utils/errors.js';

const OPENAI_BASE = 'https://api.openai.com/v1';

const chatCompletionSchema = z.object({
    model: z.string().catch(''),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullish() }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number().catch(0),
            completion_tokens: z.number().catch(0),
            total_tokens: z.number().catch(0),
        })
        .optional(),
});

/**
 * OpenAI chat-completions provider on top of the shared HttpClient.
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(
        private readonly httpClient: HttpClient,
        options: LlmProviderOptions
    ) {
        if (!options.apiKey) {
            throw new RoleGraphError('OPENAI_API_KEY is not set');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? OPENAI_BASE;
        this.model = options.model;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const body: Record<string, unknown> = {
            model: params.model ?? this.model,
            messages,
            temperature: params.temperature ?? 0.2,
        };
        if (params.maxTokens !== undefined) body['max_tokens'] = params.maxTokens;
        if (params.jsonMode) body['response_format'] = { type: 'json_object' };

        const response = await this.httpClient.post(`${this.baseUrl}/chat/completions`, body, {
            source: 'openai',
            headers: { Authorization: `Bearer ${this.apiKey}` },
        });

        const parsed = chatCompletionSchema.safeParse(response.data);
        if (!parsed.success) {
            // An unreadable envelope is handed on as raw text; the caller decides
            return {
                text: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
                usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
                model: params.model ?? this.model,
                provider: this.name,
            };
        }

        const { choices, usage, model } = parsed.data;
        return {
            text: choices[0]?.message.content ?? '',
            usage: {
                promptTokens: usage?.prompt_tokens ?? 0,
                completionTokens: usage?.completion_tokens ?? 0,
                totalTokens: usage?.total_tokens ?? 0,
            },
            model: model || (params.model ?? this.model),
            provider: this.name,
        };
    }
}
