import type { LLMProvider } from "./types.js";
import { OpenAiProvider } from "./openai.provider.js";
import { ConfigError, requireCredential, type AppConfig } from "../config/env.js";

/**
 * Build the configured ranking model provider.
 * A missing credential is a ConfigError; the pipeline cannot run without a model.
 */
export function createLLMProvider(config: AppConfig): LLMProvider {
    switch (config.llm.provider) {
        case "openai":
            return new OpenAiProvider({
                apiKey: requireCredential(config, "OPENAI_API_KEY"),
                model: config.llm.model,
                timeoutMs: config.llm.timeoutMs
            });
        case "none":
            throw new ConfigError("LLM_PROVIDER=none: a ranking model is required", ["LLM_PROVIDER"]);
    }
}
