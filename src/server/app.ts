import Fastify, { FastifyInstance } from "fastify";
import { z, ZodError } from "zod";
import { ETHAnalysisResult } from "../types";
import { RewriteConfig } from "../config/config";
import { GenerationProvider } from "../llm/providers/provider";
import { MessageRewriter } from "../llm/rewriter";
import {
  DataUnavailableError,
  InsufficientDataError,
  ProviderError,
  ProviderUnavailableError,
  ValidationError,
} from "../utils/errors";
import { logger } from "../utils/logger";

export interface Analyzer {
  analyze(): Promise<ETHAnalysisResult>;
}

export interface ServerDeps {
  analyzer: Analyzer;
  provider: GenerationProvider | null;
  model: string;
  rewrite: RewriteConfig;
}

const RewriteBodySchema = z.object({
  text: z.string().min(1),
  style: z.string().default("professional"),
  extra_instructions: z.string().optional(),
  model: z.string().min(1).optional(),
});

export function buildServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({ logger: false });

  // Normalize domain errors into consistent HTTP responses
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.status(400).send({ error: "validation_error", issues: err.issues });
    }
    if (err instanceof ValidationError) {
      return reply.status(400).send({ error: "validation_error", message: err.message });
    }
    if (err instanceof DataUnavailableError) {
      return reply.status(502).send({ error: "market_data_unavailable", message: err.message });
    }
    if (err instanceof InsufficientDataError) {
      return reply.status(422).send({ error: "insufficient_data", message: err.message });
    }
    if (err instanceof ProviderUnavailableError) {
      return reply.status(503).send({ error: "provider_unavailable", message: err.message });
    }
    if (err instanceof ProviderError) {
      return reply
        .status(502)
        .send({ error: "provider_error", status: err.status ?? null, message: err.message });
    }

    logger.error(`[HTTP] ${req.method} ${req.url} failed`, err);
    return reply.status(500).send({ error: "internal_error" });
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/analyze", async () => {
    const result = await deps.analyzer.analyze();
    return {
      metrics: result.metrics,
      summary: result.summary,
      summarySource: result.summarySource,
    };
  });

  app.post("/rewrite", async req => {
    const body = RewriteBodySchema.parse(req.body);
    if (!deps.provider) {
      throw new ProviderUnavailableError();
    }

    const rewriter = new MessageRewriter({
      provider: deps.provider,
      model: body.model ?? deps.model,
      temperature: deps.rewrite.temperature,
      maxTokens: deps.rewrite.maxTokens,
    });
    const result = await rewriter.rewrite({
      text: body.text,
      style: body.style,
      extraInstructions: body.extra_instructions,
    });
    return { result };
  });

  return app;
}
