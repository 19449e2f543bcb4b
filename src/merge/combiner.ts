import { readdir, readFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { ConfigError, errorCode } from "../common/errors.js";
import { writeCsvAtomic } from "../dataset/canonical.js";
import { parseCsv } from "../dataset/csv.js";
import { SHARD_COLUMNS, fromShardRow, hasSameColumns, toShardRow } from "../dataset/resultRow.js";
import type { Logger } from "../logger.js";
import { committedPart } from "../shard/resumeTracker.js";
import { combinedPath } from "../shard/planner.js";
import type { CombineConfig, CombinedDataset, ScrapeResult } from "../types.js";

export interface ShardLogInput {
  path: string;
  shardId: number;
  totalShards: number;
  results: ScrapeResult[];
  malformedRows: number;
}

export interface CombineSummary {
  files: number;
  missingShards: number[];
  rowsRead: number;
  malformedRows: number;
  unique: number;
  duplicatesResolved: number;
  correct: number;
  swapped: number;
  errors: number;
  withTiebreaks: number;
  withTimes: number;
  withSurface: number;
  surfaceDistribution: Record<string, number>;
  outputPath?: string;
}

interface Candidate {
  result: ScrapeResult;
  logKey: string;
}

/**
 * Unions shard results by match_uid. A non-error row beats an error row;
 * otherwise the lowest shard id wins, and within one log the latest row.
 */
export function combineShardResults(logs: readonly ShardLogInput[]): {
  combined: CombinedDataset;
  duplicatesResolved: number;
} {
  const ordered = [...logs].sort(
    (a, b) => a.shardId - b.shardId || a.totalShards - b.totalShards,
  );
  const best = new Map<string, Candidate>();
  let duplicatesResolved = 0;

  for (const log of ordered) {
    const logKey = `${log.shardId}of${log.totalShards}`;
    for (const result of log.results) {
      const current = best.get(result.matchUid);
      if (!current) {
        best.set(result.matchUid, { result, logKey });
        continue;
      }
      duplicatesResolved += 1;
      const currentOk = current.result.haStatus !== "error";
      const nextOk = result.haStatus !== "error";
      if ((nextOk && !currentOk) || (nextOk === currentOk && current.logKey === logKey)) {
        best.set(result.matchUid, { result, logKey });
      }
    }
  }

  const combined: CombinedDataset = new Map();
  for (const [matchUid, candidate] of best) {
    combined.set(matchUid, candidate.result);
  }
  return { combined, duplicatesResolved };
}

export function summarizeCombined(
  combined: CombinedDataset,
  logs: readonly ShardLogInput[],
  duplicatesResolved: number,
  missingShards: number[],
): CombineSummary {
  const summary: CombineSummary = {
    files: logs.length,
    missingShards,
    rowsRead: logs.reduce((sum, log) => sum + log.results.length, 0),
    malformedRows: logs.reduce((sum, log) => sum + log.malformedRows, 0),
    unique: combined.size,
    duplicatesResolved,
    correct: 0,
    swapped: 0,
    errors: 0,
    withTiebreaks: 0,
    withTimes: 0,
    withSurface: 0,
    surfaceDistribution: {},
  };
  for (const result of combined.values()) {
    if (result.haStatus === "correct") {
      summary.correct += 1;
    } else if (result.haStatus === "swapped") {
      summary.swapped += 1;
    } else {
      summary.errors += 1;
    }
    if (result.sets.some((set) => set.tiebreakHome || set.tiebreakAway)) {
      summary.withTiebreaks += 1;
    }
    if (result.durations.overall) {
      summary.withTimes += 1;
    }
    if (result.courtType) {
      summary.withSurface += 1;
      summary.surfaceDistribution[result.courtType] =
        (summary.surfaceDistribution[result.courtType] ?? 0) + 1;
    }
  }
  return summary;
}

export async function discoverShardLogs(outputBase: string, logger: Logger): Promise<ShardLogInput[]> {
  const dir = dirname(outputBase);
  const pattern = new RegExp(`^${escapeRegex(basename(outputBase))}_shard(\\d+)of(\\d+)\\.csv$`);
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }

  const logs: ShardLogInput[] = [];
  for (const entry of entries.sort()) {
    const match = entry.match(pattern);
    if (!match) {
      continue;
    }
    const path = join(dir, entry);
    const log = await readShardLog(path, Number(match[1]), Number(match[2]), logger);
    if (log) {
      logs.push(log);
    }
  }
  return logs;
}

export async function readShardLog(
  path: string,
  shardId: number,
  totalShards: number,
  logger: Logger,
): Promise<ShardLogInput | undefined> {
  const { committed, repairedTail } = committedPart(await readFile(path, "utf8"));
  if (repairedTail) {
    logger.warn(`${path}: ignoring unterminated last row.`);
  }
  const table = parseCsv(committed);
  if (table.columns.length > 0 && !hasSameColumns(table.columns)) {
    logger.warn(`${path}: unexpected header, skipping file.`);
    return undefined;
  }

  const results: ScrapeResult[] = [];
  let malformedRows = 0;
  table.rows.forEach((row, index) => {
    const parsed = fromShardRow(row);
    if (parsed.ok) {
      results.push(parsed.result);
      return;
    }
    malformedRows += 1;
    logger.warn(`${path}: skipping malformed row ${index + 2}: ${parsed.reason}`);
  });
  logger.info(`  ${path}: ${results.length} rows`);
  return { path, shardId, totalShards, results, malformedRows };
}

export async function runCombine(config: CombineConfig, logger: Logger): Promise<CombineSummary> {
  const logs = await discoverShardLogs(config.outputBase, logger);
  if (logs.length === 0) {
    throw new ConfigError(`No shard logs found matching ${config.outputBase}_shard*of*.csv`);
  }
  logger.info(`Found ${logs.length} shard logs.`);

  const missingShards = findMissingShards(logs, config.totalShards);
  for (const { shardId, totalShards } of missingShards) {
    logger.warn(`Shard ${shardId}/${totalShards} has no log yet; combining without it.`);
  }

  const { combined, duplicatesResolved } = combineShardResults(logs);
  const outputPath = combinedPath(config.outputBase);
  await writeCsvAtomic(outputPath, {
    columns: [...SHARD_COLUMNS],
    rows: Array.from(combined.values(), (result) => toShardRow(result)),
  });

  const summary = {
    ...summarizeCombined(
      combined,
      logs,
      duplicatesResolved,
      missingShards.map((missing) => missing.shardId),
    ),
    outputPath,
  };
  logCombineSummary(summary, logger);
  return summary;
}

/**
 * Expected partitions come from `--total-shards` when given, otherwise from
 * the `of<n>` suffix of every discovered log.
 */
export function findMissingShards(
  logs: readonly ShardLogInput[],
  totalShards?: number,
): Array<{ shardId: number; totalShards: number }> {
  const partitions =
    typeof totalShards === "number"
      ? [totalShards]
      : [...new Set(logs.map((log) => log.totalShards))].sort((a, b) => a - b);
  const missing: Array<{ shardId: number; totalShards: number }> = [];
  for (const total of partitions) {
    for (let shardId = 0; shardId < total; shardId += 1) {
      const present = logs.some((log) => log.shardId === shardId && log.totalShards === total);
      if (!present) {
        missing.push({ shardId, totalShards: total });
      }
    }
  }
  return missing;
}

function logCombineSummary(summary: CombineSummary, logger: Logger): void {
  logger.info(
    `Combine summary: files=${summary.files}, rows=${summary.rowsRead}, unique=${summary.unique}, ` +
      `duplicates_resolved=${summary.duplicatesResolved}, malformed=${summary.malformedRows}, ` +
      `missing_shards=${summary.missingShards.length > 0 ? summary.missingShards.join(",") : "none"}`,
  );
  logger.info(
    `Home/away: correct=${summary.correct}, swapped=${summary.swapped}, errors=${summary.errors} | ` +
      `tiebreaks=${summary.withTiebreaks}, times=${summary.withTimes}, surface=${summary.withSurface}`,
  );
  const distribution = Object.entries(summary.surfaceDistribution).sort((a, b) => b[1] - a[1]);
  for (const [surface, count] of distribution) {
    logger.info(`  surface ${surface}: ${count}`);
  }
  if (summary.outputPath) {
    logger.info(`Saved to: ${summary.outputPath}`);
  }
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
