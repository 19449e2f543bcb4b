import {
  FatalShardError,
  isAbortError,
  isLocalResourceError,
  stringifyError,
} from "../common/errors.js";
import { sleep, throwIfAborted, type SleepFn } from "../common/time.js";
import type { Logger } from "../logger.js";
import { cleanDuration, cleanScore, cleanText, normalizeWhitespace } from "../normalize.js";
import { backoffDelayMs, type RateGovernor } from "../throttle/rateGovernor.js";
import type {
  FetchFailure,
  FetchResult,
  HomeAwayVerdict,
  MatchRecord,
  PageFetcher,
  PageModel,
  PageSetScore,
  RetryPolicy,
  ScrapeResult,
} from "../types.js";
import { verifyHomeAway } from "./homeAway.js";

export type MatchPhase = "pending" | "fetching" | "parsing" | "verified" | "failed" | "recorded";

export interface MatchOutcome {
  phase: "verified" | "failed";
  result: ScrapeResult;
  attempts: number;
  trace: MatchPhase[];
}

export interface MatchStateDeps {
  fetcher: PageFetcher;
  governor: RateGovernor;
  retry: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
  random?: () => number;
  sleepFn?: SleepFn;
}

/**
 * Runs one match from pending to a recordable outcome. Retryable fetch
 * failures are retried with backoff; exhausting them yields an error result,
 * as does a permanent failure on its first attempt.
 * Fatal failures and aborts throw, leaving the match unrecorded.
 */
export async function driveMatch(match: MatchRecord, deps: MatchStateDeps): Promise<MatchOutcome> {
  const trace: MatchPhase[] = ["pending"];
  if (!match.url) {
    trace.push("failed");
    return {
      phase: "failed",
      result: failedResult(match, "match url missing"),
      attempts: 0,
      trace,
    };
  }

  const sleepFn = deps.sleepFn ?? sleep;
  const maxAttempts = Math.max(1, deps.retry.maxAttempts);
  let lastFailure: FetchFailure | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    throwIfAborted(deps.signal);
    await deps.governor.admit(deps.signal);
    trace.push("fetching");

    const fetched = await fetchOnce(match, deps);
    if (fetched.kind === "page") {
      trace.push("parsing");
      const verdict = verifyHomeAway(match, fetched.page);
      const phase = verdict.status === "error" ? "failed" : "verified";
      trace.push(phase);
      return {
        phase,
        result: verifiedResult(match, fetched.page, verdict),
        attempts: attempt,
        trace,
      };
    }

    const failure = fetched.failure;
    if (failure.permanent) {
      trace.push("failed");
      return {
        phase: "failed",
        result: failedResult(match, `not retried: ${failure.message}`),
        attempts: attempt,
        trace,
      };
    }
    if (!failure.retryable) {
      throw new FatalShardError(`Fatal fetch failure for ${match.matchUid}: ${failure.message}`);
    }
    lastFailure = failure;
    if (attempt < maxAttempts) {
      const waitMs = backoffDelayMs(deps.retry, attempt, deps.random);
      deps.logger.warn(
        `${match.matchUid}: fetch failed (${attempt}/${maxAttempts}): ${failure.message}; ` +
          `retrying in ${waitMs}ms`,
      );
      await sleepFn(waitMs, deps.signal);
    }
  }

  trace.push("failed");
  const detail = lastFailure ? lastFailure.message : "no attempt made";
  return {
    phase: "failed",
    result: failedResult(match, `retries exhausted after ${maxAttempts} attempts: ${detail}`),
    attempts: maxAttempts,
    trace,
  };
}

async function fetchOnce(match: MatchRecord, deps: MatchStateDeps): Promise<FetchResult> {
  try {
    return await deps.fetcher.fetch(match, deps.signal);
  } catch (error) {
    if (isAbortError(error) || error instanceof FatalShardError) {
      throw error;
    }
    if (isLocalResourceError(error)) {
      throw new FatalShardError(
        `Local resource failure while fetching ${match.matchUid}: ${stringifyError(error)}`,
        { cause: error },
      );
    }
    return { kind: "failure", failure: { retryable: true, message: stringifyError(error) } };
  }
}

function verifiedResult(match: MatchRecord, page: PageModel, verdict: HomeAwayVerdict): ScrapeResult {
  return {
    ...csvFields(match),
    haStatus: verdict.status,
    haMethod: verdict.method,
    pageHomeName: cleanText(page.home.name),
    pageHomeId: cleanText(page.home.id),
    pageAwayName: cleanText(page.away.name),
    pageAwayId: cleanText(page.away.id),
    sets: [cleanSet(page.sets[0]), cleanSet(page.sets[1]), cleanSet(page.sets[2])],
    durations: {
      overall: cleanDuration(page.durations.overall),
      sets: [
        cleanDuration(page.durations.sets[0]),
        cleanDuration(page.durations.sets[1]),
        cleanDuration(page.durations.sets[2]),
      ],
    },
    dateTime: cleanText(page.dateTime),
    courtType: cleanText(page.courtType),
    error: verdict.status === "error" ? normalizeWhitespace(verdict.reason) : undefined,
  };
}

function failedResult(match: MatchRecord, message: string): ScrapeResult {
  return {
    ...csvFields(match),
    haStatus: "error",
    sets: [{}, {}, {}],
    durations: { sets: [undefined, undefined, undefined] },
    error: normalizeWhitespace(message),
  };
}

function csvFields(match: MatchRecord): Pick<
  ScrapeResult,
  "matchUid" | "csvHomeName" | "csvHomeId" | "csvAwayName" | "csvAwayId"
> {
  return {
    matchUid: match.matchUid,
    csvHomeName: match.homeName,
    csvHomeId: match.homeId,
    csvAwayName: match.awayName,
    csvAwayId: match.awayId,
  };
}

function cleanSet(set: PageSetScore): PageSetScore {
  return {
    home: cleanScore(set.home),
    away: cleanScore(set.away),
    tiebreakHome: cleanScore(set.tiebreakHome),
    tiebreakAway: cleanScore(set.tiebreakAway),
  };
}
