#!/usr/bin/env node
import { parseArgs } from "util";
import { AppConfig, ConfigLoader } from "./config/config";
import { logger } from "./utils/logger";
import { ProviderUnavailableError } from "./utils/errors";
import { ETHAnalysisResult } from "./types";
import { ETHPriceAnalyzer } from "./analysis/analyzer";
import { createMarketDataSource } from "./market/source-factory";
import { createGenerationProvider } from "./llm/llm-factory";
import { GenerationProvider } from "./llm/providers/provider";
import { OpenAIProvider } from "./llm/providers/openai-provider";
import { MessageRewriter } from "./llm/rewriter";
import { buildServer } from "./server/app";
import { formatSignedPct, formatUsd } from "./utils/format";

const USAGE = `Usage:
  eth-commentary analyze [--json]
  eth-commentary rewrite <text> [--style professional|casual|concise|friendly] [--extra <instructions>] [--model <model>]
  eth-commentary check-llm
  eth-commentary serve`;

export function formatAnalysis(result: ETHAnalysisResult): string {
  const { metrics } = result;
  return `ETH price: ${formatUsd(metrics.currentPrice)}
1h change: ${formatSignedPct(metrics.hourlyChangePct)}
24h change: ${formatSignedPct(metrics.dailyChangePct)}
24h high: ${formatUsd(metrics.high24h)}
24h low: ${formatUsd(metrics.low24h)}

${result.summary}`;
}

function createAnalyzer(config: AppConfig, provider: GenerationProvider | null) {
  return new ETHPriceAnalyzer({
    dataSource: createMarketDataSource(config.market),
    provider,
    model: config.llm.model,
    recentWindow: config.analysis.recentWindow,
    temperature: config.analysis.temperature,
    maxTokens: config.analysis.maxTokens,
  });
}

async function runAnalyze(config: AppConfig, args: string[]) {
  const { values } = parseArgs({
    args,
    options: { json: { type: "boolean", default: false } },
  });

  const provider = createGenerationProvider(config.llm);
  const result = await createAnalyzer(config, provider).analyze();

  console.log(values.json ? JSON.stringify(result, null, 2) : formatAnalysis(result));
}

async function runRewrite(config: AppConfig, args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      style: { type: "string", default: "professional" },
      extra: { type: "string" },
      model: { type: "string" },
    },
  });

  const text = positionals.join(" ");
  const provider = createGenerationProvider(config.llm);
  if (!provider) {
    throw new ProviderUnavailableError("Rewriting needs a configured LLM provider (set LLM_API_KEY)");
  }

  const rewriter = new MessageRewriter({
    provider,
    model: values.model ?? config.llm.model,
    temperature: config.rewrite.temperature,
    maxTokens: config.rewrite.maxTokens,
  });
  const result = await rewriter.rewrite({
    text,
    style: values.style,
    extraInstructions: values.extra,
  });

  console.log(result);
}

async function runCheckLlm(config: AppConfig) {
  const provider = createGenerationProvider(config.llm);
  if (!(provider instanceof OpenAIProvider)) {
    throw new ProviderUnavailableError();
  }
  if (!(await provider.testConnection())) {
    process.exitCode = 1;
  }
}

async function runServe(config: AppConfig) {
  const provider = createGenerationProvider(config.llm);
  const app = buildServer({
    analyzer: createAnalyzer(config, provider),
    provider,
    model: config.llm.model,
    rewrite: config.rewrite,
  });

  const { host, port } = config.server;
  await app.listen({ host, port });
  logger.info(`API listening on http://${host}:${port}`);
}

async function main() {
  const [command, ...args] = process.argv.slice(2);

  try {
    const config = ConfigLoader.getInstance();
    logger.setLevel(config.logLevel);
    logger.debug(
      `Config: LLM ${config.llm.provider} (${config.llm.model}), market ${config.market.source}`
    );

    switch (command) {
      case "analyze":
        await runAnalyze(config, args);
        break;
      case "rewrite":
        await runRewrite(config, args);
        break;
      case "check-llm":
        await runCheckLlm(config);
        break;
      case "serve":
        await runServe(config);
        break;
      default:
        process.stderr.write(`${USAGE}\n`);
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error(`Command ${command ?? "(none)"} failed`, error);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
