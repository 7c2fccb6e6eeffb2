import { LLMConfig } from "../config/config";
import { logger } from "../utils/logger";
import { GenerationProvider } from "./providers/provider";
import { OpenAIProvider } from "./providers/openai-provider";

/**
 * Builds the configured generation provider, or `null` for offline mode.
 */
export function createGenerationProvider(
  llmConfig: LLMConfig
): GenerationProvider | null {
  switch (llmConfig.provider) {
    case "none":
      logger.info("LLM provider disabled, running in offline mode");
      return null;
    case "openai":
    default:
      if (!llmConfig.apiKey) {
        logger.warn(
          "LLM_API_KEY is not set, running in offline mode (fallback summaries only)"
        );
        return null;
      }
      return new OpenAIProvider({
        apiKey: llmConfig.apiKey,
        baseUrl: llmConfig.baseUrl,
        maxRetries: llmConfig.maxRetries,
        logInteractions: llmConfig.logInteractions,
      });
  }
}
