export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class SinkError extends Error {
  readonly location: string;

  constructor(location: string, options?: { cause?: unknown }) {
    super(`Failed to write ${location}: ${describeError(options?.cause)}`, options);
    this.name = "SinkError";
    this.location = location;
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e ?? "unknown error");
}
