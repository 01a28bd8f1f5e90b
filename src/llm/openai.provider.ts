import OpenAI from "openai";
import type { CompletionOptions, LLMProvider, Message } from "./types.js";
import { RetryHandler } from "./retry-handler.js";
import { LLM_RETRY_ATTEMPTS, LLM_RETRY_BACKOFF_MS } from "../config/index.js";
import { logger } from "../lib/logger/structured-logger.js";

export interface OpenAiProviderOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
}

function toInput(messages: Message[]) {
    return messages.map(m => ({ role: m.role, content: m.content }));
}

export class OpenAiProvider implements LLMProvider {
    readonly defaultModel: string;
    private readonly client: OpenAI;
    private readonly timeoutMs: number;
    private readonly retry = new RetryHandler({
        maxAttempts: LLM_RETRY_ATTEMPTS,
        backoffMs: LLM_RETRY_BACKOFF_MS
    });

    constructor(options: OpenAiProviderOptions) {
        // SDK-level retries are off; RetryHandler owns retry policy
        this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
        this.defaultModel = options.model;
        this.timeoutMs = options.timeoutMs;
    }

    async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
        const temperature = opts?.temperature ?? 0;
        const timeoutMs = opts?.timeout ?? this.timeoutMs;
        const model = opts?.model ?? this.defaultModel;
        const tStart = Date.now();

        const text = await this.retry.executeWithRetry(async () => {
            const controller = new AbortController();
            const t = setTimeout(() => controller.abort(), timeoutMs);
            try {
                const resp = await this.client.responses.create({
                    model,
                    input: toInput(messages),
                    temperature
                }, { signal: controller.signal });
                return resp.output_text || '';
            } finally {
                clearTimeout(t);
            }
        }, opts?.traceId ? { traceId: opts.traceId } : undefined);

        logger.debug({
            model,
            traceId: opts?.traceId,
            durationMs: Date.now() - tStart,
            outputChars: text.length
        }, '[LLM] completion ok');

        return text;
    }
}
