export type HomeAwayStatus = "correct" | "swapped" | "error";
export type HomeAwayMethod = "id_match" | "name_match";

export interface MatchRecord {
  matchUid: string;
  url: string;
  homeName: string;
  homeId?: string;
  awayName: string;
  awayId?: string;
}

export interface PagePlayer {
  name?: string;
  id?: string;
}

export interface PageSetScore {
  home?: string;
  away?: string;
  tiebreakHome?: string;
  tiebreakAway?: string;
}

export interface PageDurations {
  overall?: string;
  sets: [string | undefined, string | undefined, string | undefined];
}

export interface PageModel {
  home: PagePlayer;
  away: PagePlayer;
  sets: [PageSetScore, PageSetScore, PageSetScore];
  durations: PageDurations;
  dateTime?: string;
  /** Raw surface text as captured, e.g. `HARD` or `Clay (indoor)`. */
  courtType?: string;
}

/**
 * `retryable: false` halts the shard unless `permanent` is set, in which case
 * the match is recorded as an error without further attempts.
 */
export interface FetchFailure {
  retryable: boolean;
  permanent?: boolean;
  message: string;
  code?: string;
}

export type FetchResult =
  | { kind: "page"; page: PageModel }
  | { kind: "failure"; failure: FetchFailure };

export interface PageFetcher {
  readonly name: string;
  fetch(match: MatchRecord, signal?: AbortSignal): Promise<FetchResult>;
}

export type HomeAwayVerdict =
  | { status: "correct" | "swapped"; method: HomeAwayMethod }
  | { status: "error"; method?: HomeAwayMethod; reason: string };

export interface ScrapeResult {
  matchUid: string;
  haStatus: HomeAwayStatus;
  haMethod?: HomeAwayMethod;
  csvHomeName: string;
  csvHomeId?: string;
  csvAwayName: string;
  csvAwayId?: string;
  pageHomeName?: string;
  pageHomeId?: string;
  pageAwayName?: string;
  pageAwayId?: string;
  sets: [PageSetScore, PageSetScore, PageSetScore];
  durations: PageDurations;
  dateTime?: string;
  courtType?: string;
  error?: string;
}

export type KnownSurface = "hard" | "clay" | "grass";

export type CourtSurface =
  | { kind: "known"; surface: KnownSurface; indoor: boolean }
  | { kind: "unrecognized"; raw: string };

export interface ShardState {
  shardId: number;
  totalShards: number;
  done: Set<string>;
  rowsRead: number;
  repairedTail: boolean;
}

export type CombinedDataset = Map<string, ScrapeResult>;

export interface CanonicalDataset {
  columns: string[];
  rows: Record<string, string>[];
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
}

interface BaseConfig {
  input: string;
  outputBase: string;
  debug: boolean;
}

export interface ScrapeConfig extends BaseConfig {
  mode: "scrape";
  shardId: number;
  totalShards: number;
  resume: boolean;
  limit?: number;
  only?: string[];
  delayMinMs: number;
  delayMaxMs: number;
  retry: RetryPolicy;
  timeoutMs: number;
  pageUrlTemplate?: string;
  userAgent?: string;
}

export interface CombineConfig extends BaseConfig {
  mode: "combine";
  totalShards?: number;
}

export interface ApplyConfig extends BaseConfig {
  mode: "apply";
  dryRun: boolean;
}

export type RunConfig = ScrapeConfig | CombineConfig | ApplyConfig;

export interface ShardRunSummary {
  startedAt: string;
  finishedAt: string;
  shardId: number;
  totalShards: number;
  owned: number;
  skippedDone: number;
  processed: number;
  correct: number;
  swapped: number;
  errors: number;
  fetchFailures: number;
  tiebreaksFound: number;
  timesFound: number;
  surfacesFound: number;
  aborted: boolean;
}
