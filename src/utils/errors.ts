/**
 * Error taxonomy shared by the market pipeline, the providers and the
 * transports.
 */

export class DataUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataUnavailableError";
  }
}

export class InsufficientDataError extends Error {
  constructor(
    public readonly count: number,
    message = `At least two price points are required for analysis (got ${count})`
  ) {
    super(message);
    this.name = "InsufficientDataError";
  }
}

export class ProviderError extends Error {
  public readonly status: number | undefined;

  constructor(
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
    this.status = options?.status;
  }
}

export class RateLimitError extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { status: 429, cause: options?.cause });
    this.name = "RateLimitError";
  }
}

export class ProviderUnavailableError extends Error {
  constructor(message = "No language model provider is configured") {
    super(message);
    this.name = "ProviderUnavailableError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
