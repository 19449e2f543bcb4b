import { access } from "node:fs/promises";
import { ConfigError } from "../common/errors.js";
import { backupCanonical, readCanonical, writeCsvAtomic } from "../dataset/canonical.js";
import type { Logger } from "../logger.js";
import {
  cleanText,
  formatCourtSurface,
  isCanonicalBlank,
  normalizeName,
  parseCourtSurface,
} from "../normalize.js";
import { combinedPath } from "../shard/planner.js";
import type { ApplyConfig, CanonicalDataset, CombinedDataset, ScrapeResult } from "../types.js";
import { readShardLog } from "./combiner.js";

const SET_NUMBERS = [1, 2, 3] as const;
const SCORE_PAIR_RE = /^\s*(\S+?)\s*-\s*(\S+?)\s*$/;

export interface ApplySummary {
  rows: number;
  merged: number;
  unchanged: number;
  skippedError: number;
  noEntry: number;
  swapsApplied: number;
  alreadyOriented: number;
  swapConflicts: number;
  tiebreaksFilled: number;
  timesFilled: number;
  dateTimesFilled: number;
  surfacesFilled: number;
  surfacesRejected: number;
  scoreMismatches: number;
}

type Orientation = "csv" | "page" | "other";

/**
 * Upserts combined results into a copy of the canonical dataset. Only
 * swapped rows still in their recorded orientation are flipped, and
 * supplementary fields are only written into blank cells, so a second pass
 * with the same input changes nothing.
 */
export function applyCombined(
  dataset: CanonicalDataset,
  combined: CombinedDataset,
  logger?: Logger,
): { dataset: CanonicalDataset; summary: ApplySummary } {
  const columns = [...dataset.columns];
  const summary: ApplySummary = {
    rows: dataset.rows.length,
    merged: 0,
    unchanged: 0,
    skippedError: 0,
    noEntry: 0,
    swapsApplied: 0,
    alreadyOriented: 0,
    swapConflicts: 0,
    tiebreaksFilled: 0,
    timesFilled: 0,
    dateTimesFilled: 0,
    surfacesFilled: 0,
    surfacesRejected: 0,
    scoreMismatches: 0,
  };

  const rows = dataset.rows.map((source) => {
    const matchUid = cleanText(source.match_uid);
    const result = matchUid ? combined.get(matchUid) : undefined;
    if (!result) {
      summary.noEntry += 1;
      return source;
    }
    if (result.haStatus === "error") {
      summary.skippedError += 1;
      return source;
    }

    const row = { ...source };
    let changed = false;

    if (result.haStatus === "swapped") {
      const orientation = orientationOf(row, result);
      if (orientation === "other") {
        summary.swapConflicts += 1;
        logger?.warn(
          `${result.matchUid}: canonical players match neither recorded nor page order; left untouched.`,
        );
        return source;
      }
      if (orientation === "csv") {
        swapSides(row, columns);
        summary.swapsApplied += 1;
        changed = true;
      } else {
        summary.alreadyOriented += 1;
      }
    }

    const fill = (column: string, value: string | undefined): boolean => {
      if (!value || !isCanonicalBlank(row[column])) {
        return false;
      }
      if (!columns.includes(column)) {
        columns.push(column);
      }
      row[column] = value;
      changed = true;
      return true;
    };

    SET_NUMBERS.forEach((n, index) => {
      const set = result.sets[index];
      if (fill(`home_set${n}_tb`, set.tiebreakHome)) {
        summary.tiebreaksFilled += 1;
      }
      if (fill(`away_set${n}_tb`, set.tiebreakAway)) {
        summary.tiebreaksFilled += 1;
      }
    });

    if (fill("time_overall", result.durations.overall)) {
      summary.timesFilled += 1;
    }
    SET_NUMBERS.forEach((n, index) => {
      if (fill(`time_set${n}`, result.durations.sets[index])) {
        summary.timesFilled += 1;
      }
    });

    if (fill("list_date_time", result.dateTime)) {
      summary.dateTimesFilled += 1;
    }

    if (result.courtType && isCanonicalBlank(row.court_type)) {
      const surface = parseCourtSurface(result.courtType);
      if (surface.kind === "known") {
        fill("court_type", formatCourtSurface(surface.surface, surface.indoor));
        summary.surfacesFilled += 1;
      } else {
        summary.surfacesRejected += 1;
        logger?.debug(`${result.matchUid}: rejected court type "${surface.raw}".`);
      }
    }

    if (hasScoreMismatch(row, result)) {
      summary.scoreMismatches += 1;
      logger?.debug(`${result.matchUid}: page set scores differ from canonical scores.`);
    }

    if (changed) {
      summary.merged += 1;
      return row;
    }
    summary.unchanged += 1;
    return source;
  });

  return { dataset: { columns, rows }, summary };
}

export async function runApply(config: ApplyConfig, logger: Logger): Promise<ApplySummary> {
  const combinedFile = combinedPath(config.outputBase);
  try {
    await access(combinedFile);
  } catch {
    throw new ConfigError(`${combinedFile} not found. Run --combine first.`);
  }

  logger.info(`Loading ${config.input}...`);
  const canonical = await readCanonical(config.input);
  const log = await readShardLog(combinedFile, 0, 1, logger);
  if (!log) {
    throw new ConfigError(`${combinedFile} does not have the shard log header.`);
  }
  const combined: CombinedDataset = new Map(log.results.map((result) => [result.matchUid, result]));
  logger.info(`Canonical: ${canonical.rows.length} rows | Combined: ${combined.size} rows`);

  const { dataset, summary } = applyCombined(canonical, combined, logger);
  logApplySummary(summary, logger);

  if (config.dryRun) {
    logger.info("Dry run: no file written.");
    return summary;
  }
  if (summary.merged === 0) {
    logger.info(`No changes; ${config.input} left as is.`);
    return summary;
  }
  const backup = await backupCanonical(config.input);
  logger.info(`Backup: ${backup}`);
  await writeCsvAtomic(config.input, dataset);
  logger.info(`Written: ${config.input}`);
  return summary;
}

function orientationOf(row: Record<string, string>, result: ScrapeResult): Orientation {
  const byId = orient(
    [cleanText(row.player_home_id), cleanText(row.player_away_id)],
    [result.csvHomeId, result.csvAwayId],
    (value) => value,
  );
  if (byId) {
    return byId;
  }
  return (
    orient(
      [cleanText(row.player_home), cleanText(row.player_away)],
      [cleanText(result.csvHomeName), cleanText(result.csvAwayName)],
      normalizeName,
    ) ?? "other"
  );
}

/** Undefined when the recorded pair cannot tell the two sides apart. */
function orient(
  current: [string | undefined, string | undefined],
  recorded: [string | undefined, string | undefined],
  key: (value: string) => string,
): Orientation | undefined {
  const [recordedHome, recordedAway] = recorded.map((value) => (value ? key(value) : ""));
  if (!recordedHome || !recordedAway || recordedHome === recordedAway) {
    return undefined;
  }
  const [home, away] = current.map((value) => (value ? key(value) : ""));
  if (home === recordedHome && away === recordedAway) {
    return "csv";
  }
  if (home === recordedAway && away === recordedHome) {
    return "page";
  }
  return "other";
}

function swapSides(row: Record<string, string>, columns: readonly string[]): void {
  for (const column of columns) {
    const partner = awayPartner(column);
    if (!partner || !columns.includes(partner)) {
      continue;
    }
    const home = row[column] ?? "";
    row[column] = row[partner] ?? "";
    row[partner] = home;
  }
  const score = row.match_score?.match(SCORE_PAIR_RE);
  if (score) {
    row.match_score = `${score[2]}-${score[1]}`;
  }
}

function awayPartner(column: string): string | undefined {
  if (column.startsWith("home_")) {
    return `away_${column.slice("home_".length)}`;
  }
  if (column.startsWith("player_home")) {
    return `player_away${column.slice("player_home".length)}`;
  }
  return undefined;
}

function hasScoreMismatch(row: Record<string, string>, result: ScrapeResult): boolean {
  return SET_NUMBERS.some((n, index) => {
    const set = result.sets[index];
    return (
      differs(row[`home_set${n}`], set.home) || differs(row[`away_set${n}`], set.away)
    );
  });
}

function differs(canonical: string | undefined, page: string | undefined): boolean {
  if (isCanonicalBlank(canonical) || !page) {
    return false;
  }
  const a = Number(canonical);
  const b = Number(page);
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    return false;
  }
  return a !== b;
}

function logApplySummary(summary: ApplySummary, logger: Logger): void {
  logger.info(
    `Apply summary: rows=${summary.rows}, merged=${summary.merged}, unchanged=${summary.unchanged}, ` +
      `skipped_error=${summary.skippedError}, no_entry=${summary.noEntry}`,
  );
  logger.info(
    `Home/away: swapped=${summary.swapsApplied}, already_oriented=${summary.alreadyOriented}, ` +
      `conflicts=${summary.swapConflicts}`,
  );
  logger.info(
    `Filled: tiebreaks=${summary.tiebreaksFilled}, times=${summary.timesFilled}, ` +
      `date_time=${summary.dateTimesFilled}, surface=${summary.surfacesFilled} ` +
      `(rejected=${summary.surfacesRejected}) | score_mismatches=${summary.scoreMismatches}`,
  );
}
