import OpenAI from "openai";
import { RateLimitError } from "../utils/errors";

export type ProviderFailureKind = "rate_limited" | "other";

const RATE_LIMIT_MESSAGE_MARKERS = ["insufficient_quota", "rate limit"];

function statusOf(error: unknown): unknown {
  if (typeof error === "object" && error !== null && "status" in error) {
    return error.status;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error) {
    return typeof error.message === "string" ? error.message : "";
  }
  return typeof error === "string" ? error : "";
}

/**
 * Splits provider failures into rate-limit/quota conditions and everything
 * else. Rate-limited when the error is a rate-limit type, carries status 429,
 * or its message mentions `insufficient_quota` / `rate limit`.
 */
export function classifyProviderError(error: unknown): ProviderFailureKind {
  if (error instanceof RateLimitError || error instanceof OpenAI.RateLimitError) {
    return "rate_limited";
  }

  if (statusOf(error) === 429) {
    return "rate_limited";
  }

  const message = messageOf(error).toLowerCase();
  if (RATE_LIMIT_MESSAGE_MARKERS.some(marker => message.includes(marker))) {
    return "rate_limited";
  }

  return "other";
}
