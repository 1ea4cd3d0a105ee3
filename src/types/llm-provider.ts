/**
 * Chat-completion backend used by the edge-role classifier.
 */
export interface LlmProvider {
    readonly name: string;
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;
}

export interface LlmCompletionParams {
    /** Overrides the provider's default model */
    model?: string;
    temperature?: number;
    maxTokens?: number;
    /** Ask the service for a JSON object answer */
    jsonMode?: boolean;
    systemPrompt?: string;
}

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export interface LlmCompletionResult {
    /** Message content as returned, unparsed */
    text: string;
    usage: TokenUsage;
    model: string;
    provider: string;
}

export interface LlmProviderOptions {
    apiKey?: string;
    baseUrl?: string;
    model: string;
}
