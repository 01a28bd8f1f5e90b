export type Message = {
    role: "system" | "user" | "assistant";
    content: string;
};

export interface CompletionOptions {
    model?: string;
    temperature?: number;
    timeout?: number;
    traceId?: string;
}

/**
 * Stateless text generation: one call, no conversation kept between calls.
 */
export interface LLMProvider {
    readonly defaultModel: string;

    complete(messages: Message[], opts?: CompletionOptions): Promise<string>;
}
