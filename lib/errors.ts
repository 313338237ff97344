import { z } from "zod";

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

/** A remote service answered, but not with something we can use. */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status: number | null;

  constructor(provider: string, message: string, status: number | null = null) {
    super(message);
    this.name = "ProviderError";
    this.provider = provider;
    this.status = status;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const issues = error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return `Validation failed (${issues.join("; ")})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
