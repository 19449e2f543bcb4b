import { isAbortError } from "../common/errors.js";
import { throwIfAborted, toSeconds, type SleepFn } from "../common/time.js";
import { readCanonical, toMatchRecords } from "../dataset/canonical.js";
import { HttpPageFetcher } from "../fetch/httpFetcher.js";
import type { Logger } from "../logger.js";
import { acquireShardLock, shardLockPath } from "../shard/lock.js";
import { describePlan, planShard, shardLogPath } from "../shard/planner.js";
import { openShardLog } from "../shard/resumeTracker.js";
import type { AppendFn } from "../shard/writer.js";
import { RateGovernor } from "../throttle/rateGovernor.js";
import type { MatchRecord, PageFetcher, ScrapeConfig, ScrapeResult, ShardRunSummary } from "../types.js";
import { driveMatch } from "../verify/matchState.js";

const TALLY_EVERY = 50;

export interface RunShardOptions {
  signal?: AbortSignal;
  fetcher?: PageFetcher;
  sleepFn?: SleepFn;
  random?: () => number;
  now?: () => number;
  appendFn?: AppendFn;
  isProcessAlive?: (pid: number) => boolean;
}

export async function runShard(
  config: ScrapeConfig,
  logger: Logger,
  options: RunShardOptions = {},
): Promise<ShardRunSummary> {
  const signal = options.signal;
  throwIfAborted(signal);
  const log = logger.child(`shard ${config.shardId}/${config.totalShards}`);
  const startedAt = new Date().toISOString();
  const startedMs = Date.now();
  const summary: ShardRunSummary = {
    startedAt,
    finishedAt: startedAt,
    shardId: config.shardId,
    totalShards: config.totalShards,
    owned: 0,
    skippedDone: 0,
    processed: 0,
    correct: 0,
    swapped: 0,
    errors: 0,
    fetchFailures: 0,
    tiebreaksFound: 0,
    timesFound: 0,
    surfacesFound: 0,
    aborted: false,
  };

  const dataset = await readCanonical(config.input);
  const matches = toMatchRecords(dataset);
  const owned = selectTargets(planShard(matches, config.shardId, config.totalShards), config, log);
  summary.owned = owned.length;
  log.debug(`Partition sizes: ${describePlan(matches, config.totalShards).join(", ")}`);
  log.info(`Owned matches: ${owned.length} of ${matches.length} (resume=${config.resume}).`);

  const logPath = shardLogPath(config.outputBase, config.shardId, config.totalShards);
  const lock = await acquireShardLock({
    lockFilePath: shardLockPath(logPath),
    shardId: config.shardId,
    totalShards: config.totalShards,
    isProcessAlive: options.isProcessAlive,
  });

  try {
    const { state, writer } = await openShardLog(logPath, {
      shardId: config.shardId,
      totalShards: config.totalShards,
      resume: config.resume,
      logger: log,
      appendFn: options.appendFn,
    });
    // --only re-targets recorded matches, error rows included.
    const pending = config.only ? owned : owned.filter((match) => !state.done.has(match.matchUid));
    summary.skippedDone = owned.length - pending.length;
    log.info(`To process: ${pending.length} (already done: ${summary.skippedDone}). Output: ${logPath}`);

    const fetcher =
      options.fetcher ??
      new HttpPageFetcher({
        timeoutMs: config.timeoutMs,
        logger: log,
        pageUrlTemplate: config.pageUrlTemplate,
        userAgent: config.userAgent,
      });
    const governor = new RateGovernor({
      minDelayMs: config.delayMinMs,
      maxDelayMs: config.delayMaxMs,
      random: options.random,
      now: options.now,
      sleepFn: options.sleepFn,
    });

    for (let index = 0; index < pending.length; index += 1) {
      throwIfAborted(signal);
      const match = pending[index];
      log.info(`[${index + 1}/${pending.length}] ${match.matchUid} ${match.homeName} vs ${match.awayName}`);

      const outcome = await driveMatch(match, {
        fetcher,
        governor,
        retry: config.retry,
        logger: log,
        signal,
        random: options.random,
        sleepFn: options.sleepFn,
      });
      await writer.append(outcome.result);
      state.done.add(match.matchUid);
      outcome.trace.push("recorded");
      log.debug(`${match.matchUid}: ${outcome.trace.join(" -> ")}`);

      tally(summary, outcome.result, outcome.attempts);
      logOutcome(log, outcome.result);
      if (summary.processed % TALLY_EVERY === 0) {
        logTally(log, summary, pending.length, startedMs);
      }
    }
  } catch (error) {
    if (!isAbortError(error)) {
      throw error;
    }
    summary.aborted = true;
    log.warn(`Aborted after ${summary.processed} matches; rerun with --resume to continue.`);
  } finally {
    await lock.release();
  }

  summary.finishedAt = new Date().toISOString();
  logTally(log, summary, summary.owned - summary.skippedDone, startedMs);
  return summary;
}

function selectTargets(owned: MatchRecord[], config: ScrapeConfig, log: Logger): MatchRecord[] {
  let targets = owned;
  if (config.only) {
    const wanted = new Set(config.only);
    targets = targets.filter((match) => wanted.has(match.matchUid));
    if (targets.length < wanted.size) {
      log.warn(`${wanted.size - targets.length} of the --only matches are not owned by this shard.`);
    }
  }
  if (typeof config.limit === "number") {
    targets = targets.slice(0, config.limit);
  }
  return targets;
}

function tally(summary: ShardRunSummary, result: ScrapeResult, attempts: number): void {
  summary.processed += 1;
  if (result.haStatus === "correct") {
    summary.correct += 1;
  } else if (result.haStatus === "swapped") {
    summary.swapped += 1;
  } else {
    summary.errors += 1;
  }
  if (!result.pageHomeName && !result.pageAwayName && attempts > 0) {
    summary.fetchFailures += 1;
  }
  if (result.sets.some((set) => set.tiebreakHome || set.tiebreakAway)) {
    summary.tiebreaksFound += 1;
  }
  if (result.durations.overall) {
    summary.timesFound += 1;
  }
  if (result.courtType) {
    summary.surfacesFound += 1;
  }
}

function logOutcome(log: Logger, result: ScrapeResult): void {
  if (result.haStatus === "error") {
    log.warn(`  error: ${result.error ?? "unknown"}`);
    return;
  }
  const tiebreaks = result.sets
    .map((set, index) =>
      set.tiebreakHome || set.tiebreakAway
        ? `S${index + 1}:${set.tiebreakHome ?? "-"}-${set.tiebreakAway ?? "-"}`
        : undefined,
    )
    .filter((item): item is string => typeof item === "string");
  log.info(
    `  ${result.haStatus} (${result.haMethod ?? "-"}) | ` +
      `tb=${tiebreaks.length > 0 ? tiebreaks.join(",") : "none"} | ` +
      `time=${result.durations.overall ?? "-"} | surface=${result.courtType ?? "-"}`,
  );
}

function logTally(log: Logger, summary: ShardRunSummary, total: number, startedMs: number): void {
  const elapsed = toSeconds(Date.now() - startedMs);
  const rate = elapsed > 0 ? summary.processed / elapsed : 0;
  log.info(
    `Progress: ${summary.processed}/${total} | correct=${summary.correct} swapped=${summary.swapped} ` +
      `errors=${summary.errors} fetch_failures=${summary.fetchFailures} | ` +
      `tb=${summary.tiebreaksFound} time=${summary.timesFound} surface=${summary.surfacesFound} | ` +
      `${rate.toFixed(2)} matches/s`,
  );
}
