import OpenAI from "openai";
import { classifyProviderError } from "./error-classifier";
import { ProviderError, RateLimitError } from "../utils/errors";

describe("classifyProviderError", () => {
  it("treats the rate-limit error types as rate limited", () => {
    expect(classifyProviderError(new RateLimitError("slow down"))).toBe("rate_limited");
    expect(
      classifyProviderError(new OpenAI.RateLimitError(429, undefined, "Too many requests", {}))
    ).toBe("rate_limited");
  });

  it("treats status 429 as rate limited", () => {
    expect(classifyProviderError(new ProviderError("busy", { status: 429 }))).toBe("rate_limited");
    expect(classifyProviderError({ status: 429, message: "busy" })).toBe("rate_limited");
  });

  it("matches quota and rate-limit wording case-insensitively", () => {
    expect(
      classifyProviderError(new Error("You exceeded your current quota (INSUFFICIENT_QUOTA)"))
    ).toBe("rate_limited");
    expect(classifyProviderError(new Error("Rate Limit exceeded for model"))).toBe("rate_limited");
    expect(classifyProviderError({ message: "hit the rate limit" })).toBe("rate_limited");
    expect(classifyProviderError("rate limit")).toBe("rate_limited");
  });

  it("classifies everything else as other", () => {
    expect(classifyProviderError(new ProviderError("server error", { status: 500 }))).toBe("other");
    expect(classifyProviderError(new Error("ratelimiter offline"))).toBe("other");
    expect(classifyProviderError({ status: "429" })).toBe("other");
    expect(classifyProviderError(undefined)).toBe("other");
    expect(classifyProviderError(null)).toBe("other");
  });
});
