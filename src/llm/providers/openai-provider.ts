import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import fs from "fs";
import path from "path";
import { GenerationConfig } from "../../types";
import { logger } from "../../utils/logger";
import { ProviderError, RateLimitError } from "../../utils/errors";
import { GenerationProvider } from "./provider";

/**
 * The slice of the OpenAI client this provider talks to.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
  models: {
    list(): Promise<unknown>;
  };
}

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  maxRetries?: number;
  logInteractions?: boolean;
  /** Directory for interaction transcripts, defaults to `output/chat`. */
  interactionLogDir?: string;
  client?: ChatCompletionClient;
}

export class OpenAIProvider implements GenerationProvider {
  public readonly name = "openai";
  private client: ChatCompletionClient;
  private logInteractions: boolean;
  private interactionLogDir: string;

  constructor(options: OpenAIProviderOptions = {}) {
    if (options.client) {
      this.client = options.client;
    } else {
      if (!options.apiKey) {
        throw new ProviderError("An API key is required for the OpenAI provider");
      }
      this.client = new OpenAI({
        baseURL: options.baseUrl,
        apiKey: options.apiKey,
        maxRetries: options.maxRetries ?? 0,
      });
    }
    this.logInteractions = options.logInteractions ?? false;
    this.interactionLogDir =
      options.interactionLogDir ?? path.resolve(process.cwd(), "output", "chat");
  }

  /**
   * Lists models as a cheap authenticated round trip.
   */
  public async testConnection(): Promise<boolean> {
    try {
      logger.info("Testing LLM connection...");
      await this.client.models.list();
      logger.info("LLM connection OK");
      return true;
    } catch (error) {
      logger.error("LLM connection failed", error);
      return false;
    }
  }

  public async generate(
    systemPrompt: string,
    userPrompt: string,
    config: GenerationConfig
  ): Promise<string> {
    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: config.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
        temperature: config.temperature,
        max_tokens: config.maxTokens,
      });
    } catch (error) {
      throw this.translateError(error);
    }

    this.logTokenUsage(response.usage);

    const content = response.choices[0]?.message.content ?? "";

    await this.saveInteractionLog(config.model, systemPrompt, userPrompt, content);

    return content;
  }

  private translateError(error: unknown): unknown {
    if (error instanceof OpenAI.RateLimitError) {
      return new RateLimitError(error.message, { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
      return new ProviderError(error.message, {
        status: error.status,
        cause: error,
      });
    }
    return error;
  }

  private logTokenUsage(usage: ChatCompletion["usage"]) {
    if (!usage) return;
    const promptK = (usage.prompt_tokens / 1000).toFixed(3);
    const completionK = (usage.completion_tokens / 1000).toFixed(3);
    const totalK = (usage.total_tokens / 1000).toFixed(3);
    logger.info(
      `[Token usage] prompt: ${promptK}k | completion: ${completionK}k | total: ${totalK}k`
    );
  }

  private async saveInteractionLog(
    model: string,
    systemPrompt: string,
    userPrompt: string,
    response: string
  ) {
    if (!this.logInteractions) return;

    try {
      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

      if (!fs.existsSync(this.interactionLogDir)) {
        fs.mkdirSync(this.interactionLogDir, { recursive: true });
      }

      const filePath = path.join(this.interactionLogDir, `${timestamp}_generation.md`);

      const content = `# LLM Interaction Log
Date: ${new Date().toISOString()}
Model: ${model}

## System Prompt
\`\`\`text
${systemPrompt}
\`\`\`

## User Prompt
\`\`\`text
${userPrompt}
\`\`\`

## Response
\`\`\`text
${response}
\`\`\`
`;

      await fs.promises.writeFile(filePath, content, "utf-8");
      logger.info(`LLM interaction log saved: ${filePath}`);
    } catch (error) {
      logger.error("Failed to save LLM interaction log", error);
    }
  }
}
