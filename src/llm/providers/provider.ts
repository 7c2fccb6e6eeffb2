import { GenerationConfig } from "../../types";

/**
 * Produces a single text completion for a system + user instruction pair.
 * Failures surface as `ProviderError` (or `RateLimitError`).
 */
export interface GenerationProvider {
  readonly name: string;
  generate(
    systemPrompt: string,
    userPrompt: string,
    config: GenerationConfig
  ): Promise<string>;
}
