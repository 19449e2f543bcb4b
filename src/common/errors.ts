const LOCAL_RESOURCE_CODES = new Set(["ENOSPC", "EDQUOT", "EROFS", "EMFILE", "ENFILE", "ENOMEM"]);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Halts a shard process; the in-flight match is never recorded. */
export class FatalShardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalShardError";
  }
}

export class PageParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PageParseError";
  }
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

export function isAbortError(value: unknown): boolean {
  return value instanceof Error && value.name === "AbortError";
}

export function errorCode(value: unknown): string | undefined {
  if (!value || typeof value !== "object" || !("code" in value)) {
    return undefined;
  }
  const code = value.code;
  return typeof code === "string" ? code : undefined;
}

export function isLocalResourceError(value: unknown): boolean {
  const code = errorCode(value);
  return typeof code === "string" && LOCAL_RESOURCE_CODES.has(code);
}
