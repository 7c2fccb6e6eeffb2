import dotenv from "dotenv";
import fs from "fs";
import toml from "@iarna/toml";
import path from "path";
import { z } from "zod";
import { logger, resolveLogDir, resolveLogLevel, type LogLevel } from "../utils/logger";
import { ConfigError } from "../utils/errors";

export type LLMProviderKind = "openai" | "none";
export type MarketSourceKind = "coingecko" | "exchange";

export interface LLMConfig {
  provider: LLMProviderKind;
  apiKey: string;
  baseUrl?: string;
  model: string;
  maxRetries: number;
  logInteractions: boolean;
}

export interface AnalysisConfig {
  recentWindow: number;
  temperature: number;
  maxTokens: number;
}

export interface MarketConfig {
  source: MarketSourceKind;
  days: number;
  interval: string;
  baseUrl: string;
  timeoutMs: number;
  apiKey?: string;
  exchangeId: string;
  symbol: string;
}

export interface RewriteConfig {
  temperature: number;
  maxTokens: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  // Environment Variables
  llm: LLMConfig;
  server: ServerConfig;
  logLevel: LogLevel;

  // TOML Config
  analysis: AnalysisConfig;
  market: MarketConfig;
  rewrite: RewriteConfig;
}

const TomlSchema = z.object({
  llm: z
    .object({
      log_interactions: z.boolean().default(false),
      max_retries: z.number().int().min(0).max(10).default(0),
    })
    .default({}),
  analysis: z
    .object({
      recent_window: z.number().int().positive().default(6),
      temperature: z.number().min(0).max(2).default(0.3),
      max_tokens: z.number().int().positive().default(400),
    })
    .default({}),
  market: z
    .object({
      source: z.enum(["coingecko", "exchange"]).default("coingecko"),
      days: z.number().positive().default(1),
      interval: z.string().min(1).default("hourly"),
      base_url: z.string().url().default("https://api.coingecko.com/api/v3"),
      timeout_ms: z.number().int().positive().default(10_000),
      exchange_id: z.string().min(1).default("binance"),
      symbol: z.string().min(1).default("ETH/USDT"),
    })
    .default({}),
  rewrite: z
    .object({
      temperature: z.number().min(0).max(2).default(0.2),
      max_tokens: z.number().int().positive().default(300),
    })
    .default({}),
});

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "none"]).default("openai"),
  LLM_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().optional(),
  LLM_MODEL: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  COINGECKO_API_KEY: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  PORT: z.string().regex(/^\d+$/).optional(),
  HOST: z.string().optional(),
});

export type ConfigEnv = Record<string, string | undefined>;

export class ConfigLoader {
  private static instance: AppConfig | undefined;

  private constructor() {}

  public static getInstance(): AppConfig {
    if (!ConfigLoader.instance) {
      // Load environment variables before reading them
      dotenv.config();
      logger.setLogDir(resolveLogDir(process.env));
      ConfigLoader.instance = ConfigLoader.load(
        path.resolve(process.cwd(), "config.toml"),
        process.env
      );
    }
    return ConfigLoader.instance;
  }

  /**
   * Builds the config from a TOML file and an environment map without
   * caching it. A missing file falls back to defaults.
   */
  public static load(configPath: string, env: ConfigEnv): AppConfig {
    const tomlConfig = TomlSchema.safeParse(ConfigLoader.readToml(configPath));
    if (!tomlConfig.success) {
      throw new ConfigError(
        `Invalid configuration in ${configPath}: ${tomlConfig.error.issues
          .map(issue => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`
      );
    }

    const parsedEnv = EnvSchema.safeParse(env);
    if (!parsedEnv.success) {
      throw new ConfigError(
        `Invalid environment: ${parsedEnv.error.issues
          .map(issue => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`
      );
    }

    const file = tomlConfig.data;
    const vars = parsedEnv.data;

    return {
      llm: {
        provider: vars.LLM_PROVIDER,
        apiKey: vars.LLM_API_KEY || vars.OPENAI_API_KEY || "",
        baseUrl: vars.LLM_BASE_URL || undefined,
        model: vars.LLM_MODEL || vars.OPENAI_MODEL || "gpt-4o-mini",
        maxRetries: file.llm.max_retries,
        logInteractions: file.llm.log_interactions,
      },
      server: {
        host: vars.HOST || "127.0.0.1",
        port: vars.PORT ? Number(vars.PORT) : 8788,
      },
      logLevel: resolveLogLevel(vars.LOG_LEVEL),

      analysis: {
        recentWindow: file.analysis.recent_window,
        temperature: file.analysis.temperature,
        maxTokens: file.analysis.max_tokens,
      },
      market: {
        source: file.market.source,
        days: file.market.days,
        interval: file.market.interval,
        baseUrl: file.market.base_url,
        timeoutMs: file.market.timeout_ms,
        apiKey: vars.COINGECKO_API_KEY || undefined,
        exchangeId: file.market.exchange_id,
        symbol: file.market.symbol,
      },
      rewrite: {
        temperature: file.rewrite.temperature,
        maxTokens: file.rewrite.max_tokens,
      },
    };
  }

  private static readToml(configPath: string): unknown {
    if (!fs.existsSync(configPath)) {
      logger.warn(`No config file at ${configPath}, using defaults.`);
      return {};
    }

    try {
      const fileContent = fs.readFileSync(configPath, "utf-8");
      return toml.parse(fileContent);
    } catch (error) {
      throw new ConfigError(`Failed to read ${configPath}`, { cause: error });
    }
  }
}
