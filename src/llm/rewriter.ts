import { RewriteRequest } from "../types";
import { ValidationError } from "../utils/errors";
import { GenerationProvider } from "./providers/provider";
import {
  buildRewriteSystemPrompt,
  buildRewriteUserPrompt,
  resolveRewriteStyle,
} from "./prompts/rewrite-prompts";

export interface MessageRewriterOptions {
  provider: GenerationProvider;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class MessageRewriter {
  private provider: GenerationProvider;
  private model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(options: MessageRewriterOptions) {
    this.provider = options.provider;
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 300;
  }

  /**
   * Rewrites `request.text` in the requested style. Unknown styles fall back
   * to "professional".
   */
  public async rewrite(request: RewriteRequest): Promise<string> {
    if (!request.text.trim()) {
      throw new ValidationError("Text to rewrite must not be empty");
    }

    const style = resolveRewriteStyle(request.style);
    const systemPrompt = buildRewriteSystemPrompt(style, request.extraInstructions);
    const userPrompt = buildRewriteUserPrompt(request.text);

    return this.provider.generate(systemPrompt, userPrompt, {
      model: this.model,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });
  }
}
