import { z } from "zod";
import { ConfigError } from "./common/errors.js";
import { DEFAULT_RETRY_POLICY } from "./throttle/rateGovernor.js";
import type { RunConfig } from "./types.js";

const commonSchema = z.object({
  input: z.string().min(1),
  outputBase: z.string().min(1),
  debug: z.boolean(),
});

const scrapeSchema = commonSchema
  .extend({
    mode: z.literal("scrape"),
    shardId: z.number().int().min(0),
    totalShards: z.number().int().min(1).max(1024),
    resume: z.boolean(),
    limit: z.number().int().positive().optional(),
    only: z.array(z.string().min(1)).min(1).optional(),
    delayMinMs: z.number().int().min(0).max(600_000),
    delayMaxMs: z.number().int().min(0).max(600_000),
    retry: z.object({
      maxAttempts: z.number().int().min(1).max(20),
      baseDelayMs: z.number().int().min(0).max(600_000),
      maxDelayMs: z.number().int().min(0).max(3_600_000),
      jitterRatio: z.number().min(0).max(1),
    }),
    timeoutMs: z.number().int().min(1000).max(120_000),
    pageUrlTemplate: z.string().includes("{url}").optional(),
    userAgent: z.string().min(1).optional(),
  })
  .refine((value) => value.shardId < value.totalShards, {
    message: "shard must be lower than total-shards",
    path: ["shardId"],
  })
  .refine((value) => value.delayMinMs <= value.delayMaxMs, {
    message: "delay-min-ms must not exceed delay-max-ms",
    path: ["delayMinMs"],
  });

const combineSchema = commonSchema.extend({
  mode: z.literal("combine"),
  totalShards: z.number().int().min(1).max(1024).optional(),
});

const applySchema = commonSchema.extend({
  mode: z.literal("apply"),
  dryRun: z.boolean(),
});

const DEFAULTS = {
  input: "data/matches.csv",
  outputBase: "data/ha_check",
  delayMinMs: 400,
  delayMaxMs: 800,
  timeoutMs: 30_000,
} as const;

type CliRaw = Record<string, string | boolean>;

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);
  const common = {
    input: readString(args, "input", DEFAULTS.input),
    outputBase: readString(args, "output-base", DEFAULTS.outputBase),
    debug: readBool(args, "debug", false),
  };

  const modes = ["shard", "combine", "apply"].filter((key) => key in args);
  if (modes.length !== 1) {
    throw new ConfigError(
      modes.length === 0
        ? "Choose a mode: --shard <i> --total-shards <n>, --combine or --apply."
        : `Modes are mutually exclusive, got --${modes.join(" --")}.`,
    );
  }

  if (modes[0] === "combine") {
    return validate(combineSchema, {
      ...common,
      mode: "combine",
      totalShards: readOptionalInt(args, "total-shards"),
    });
  }

  if (modes[0] === "apply") {
    return validate(applySchema, {
      ...common,
      mode: "apply",
      dryRun: readBool(args, "dry-run", false),
    });
  }

  if (!("total-shards" in args)) {
    throw new ConfigError("--shard requires --total-shards <n>.");
  }
  return validate(scrapeSchema, {
    ...common,
    mode: "scrape",
    shardId: readOptionalInt(args, "shard"),
    totalShards: readOptionalInt(args, "total-shards"),
    resume: readBool(args, "resume", false),
    limit: readOptionalInt(args, "limit"),
    only: readList(args, "only"),
    delayMinMs: readInt(args, "delay-min-ms", DEFAULTS.delayMinMs),
    delayMaxMs: readInt(args, "delay-max-ms", DEFAULTS.delayMaxMs),
    retry: {
      maxAttempts: readInt(args, "max-attempts", DEFAULT_RETRY_POLICY.maxAttempts),
      baseDelayMs: readInt(args, "backoff-base-ms", DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: readInt(args, "backoff-max-ms", DEFAULT_RETRY_POLICY.maxDelayMs),
      jitterRatio: DEFAULT_RETRY_POLICY.jitterRatio,
    },
    timeoutMs: readInt(args, "timeout-ms", DEFAULTS.timeoutMs),
    pageUrlTemplate: readOptionalString(args, "page-url-template"),
    userAgent: env.SCRAPER_USER_AGENT?.trim() || undefined,
  });
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const detail = result.error.issues
    .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("; ");
  throw new ConfigError(`Invalid configuration: ${detail}`);
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      throw new ConfigError(`Unexpected argument: ${token}`);
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function readList(args: CliRaw, key: string): string[] | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readOptionalInt(args: CliRaw, key: string): number | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return parseInteger(key, value);
}

function readInt(args: CliRaw, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return parseInteger(key, value);
}

function parseInteger(key: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`--${key} expects an integer, got "${value}".`);
  }
  return Number.parseInt(value, 10);
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}
