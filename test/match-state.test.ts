import test from "node:test";
import assert from "node:assert/strict";
import { FatalShardError } from "../src/common/errors.js";
import { silentLogger } from "../src/logger.js";
import { RateGovernor } from "../src/throttle/rateGovernor.js";
import type { FetchResult, MatchRecord, PageFetcher, RetryPolicy } from "../src/types.js";
import { driveMatch, type MatchStateDeps } from "../src/verify/matchState.js";
import { makeMatch, makePage, noSleep } from "./helpers.js";

const retry: RetryPolicy = { maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 30_000, jitterRatio: 0.25 };

class ScriptedFetcher implements PageFetcher {
  readonly name = "scripted";
  calls = 0;

  constructor(private readonly steps: Array<FetchResult | Error>) {}

  async fetch(_match: MatchRecord): Promise<FetchResult> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls += 1;
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

function deps(fetcher: PageFetcher, sleeps: number[] = []): MatchStateDeps {
  return {
    fetcher,
    governor: new RateGovernor({ minDelayMs: 0, maxDelayMs: 0, sleepFn: noSleep }),
    retry,
    logger: silentLogger(),
    random: () => 0,
    sleepFn: async (ms) => {
      sleeps.push(ms);
    },
  };
}

const unavailable: FetchResult = {
  kind: "failure",
  failure: { retryable: true, message: "HTTP 503 for https://scores.test/match/abc/" },
};

test("a swapped page verifies with all fields extracted", async () => {
  const page = makePage({
    home: { name: "Bella Beta", id: "B2" },
    away: { name: "Anna Alpha", id: "A1" },
  });
  const fetcher = new ScriptedFetcher([{ kind: "page", page }]);
  const outcome = await driveMatch(makeMatch(), deps(fetcher));

  assert.equal(outcome.phase, "verified");
  assert.deepEqual(outcome.trace, ["pending", "fetching", "parsing", "verified"]);
  assert.equal(outcome.attempts, 1);
  assert.equal(outcome.result.haStatus, "swapped");
  assert.equal(outcome.result.haMethod, "id_match");
  assert.equal(outcome.result.pageHomeId, "B2");
  assert.deepEqual(outcome.result.sets[0], { home: "7", away: "6", tiebreakHome: "7", tiebreakAway: "4" });
  assert.equal(outcome.result.durations.overall, "1:42");
  assert.equal(outcome.result.courtType, "HARD");
  assert.equal(outcome.result.error, undefined);
});

test("retryable failures stop after maxAttempts with an error result", async () => {
  const fetcher = new ScriptedFetcher([unavailable]);
  const sleeps: number[] = [];
  const outcome = await driveMatch(makeMatch(), deps(fetcher, sleeps));

  assert.equal(fetcher.calls, 3);
  assert.equal(outcome.phase, "failed");
  assert.equal(outcome.attempts, 3);
  assert.equal(outcome.result.haStatus, "error");
  assert.equal(
    outcome.result.error,
    "retries exhausted after 3 attempts: HTTP 503 for https://scores.test/match/abc/",
  );
  assert.deepEqual(sleeps, [2000, 4000]);
  assert.deepEqual(outcome.trace, ["pending", "fetching", "fetching", "fetching", "failed"]);
});

test("a thrown transport error is retried", async () => {
  const fetcher = new ScriptedFetcher([new Error("socket hang up"), { kind: "page", page: makePage() }]);
  const outcome = await driveMatch(makeMatch(), deps(fetcher));
  assert.equal(fetcher.calls, 2);
  assert.equal(outcome.attempts, 2);
  assert.equal(outcome.result.haStatus, "correct");
});

test("a non-retryable failure halts the shard", async () => {
  const fetcher = new ScriptedFetcher([
    { kind: "failure", failure: { retryable: false, message: "disk full", code: "ENOSPC" } },
  ]);
  await assert.rejects(
    () => driveMatch(makeMatch(), deps(fetcher)),
    (error: unknown) =>
      error instanceof FatalShardError && error.message === "Fatal fetch failure for m-1: disk full",
  );
  assert.equal(fetcher.calls, 1);
});

test("a local resource error thrown by the fetcher is fatal", async () => {
  const fetcher = new ScriptedFetcher([
    Object.assign(new Error("too many open files"), { code: "EMFILE" }),
  ]);
  await assert.rejects(() => driveMatch(makeMatch(), deps(fetcher)), FatalShardError);
});

test("a match without url fails without fetching", async () => {
  const fetcher = new ScriptedFetcher([unavailable]);
  const outcome = await driveMatch(makeMatch({ url: "" }), deps(fetcher));
  assert.equal(fetcher.calls, 0);
  assert.equal(outcome.attempts, 0);
  assert.equal(outcome.result.error, "match url missing");
});

test("an unresolved page still records what it found", async () => {
  const page = makePage({ home: { name: "Cara Gamma" }, away: { name: "Dana Delta" } });
  const outcome = await driveMatch(makeMatch(), deps(new ScriptedFetcher([{ kind: "page", page }])));
  assert.equal(outcome.phase, "failed");
  assert.equal(outcome.result.haStatus, "error");
  assert.equal(outcome.result.pageHomeName, "Cara Gamma");
  assert.equal(outcome.result.durations.overall, "1:42");
});

test("page values are cleaned before they are recorded", async () => {
  const page = makePage({
    sets: [{ home: " 6 ", away: "x" }, {}, {}],
    durations: { overall: "1:75", sets: ["0:41", "n/a", undefined] },
    dateTime: "  12.03.2024   14:30 ",
  });
  const outcome = await driveMatch(makeMatch(), deps(new ScriptedFetcher([{ kind: "page", page }])));
  assert.deepEqual(outcome.result.sets[0], {
    home: "6",
    away: undefined,
    tiebreakHome: undefined,
    tiebreakAway: undefined,
  });
  assert.equal(outcome.result.durations.overall, undefined);
  assert.deepEqual(outcome.result.durations.sets, ["0:41", undefined, undefined]);
  assert.equal(outcome.result.dateTime, "12.03.2024 14:30");
});

test("an aborted signal stops before fetching", async () => {
  const controller = new AbortController();
  controller.abort();
  const fetcher = new ScriptedFetcher([unavailable]);
  await assert.rejects(
    () => driveMatch(makeMatch(), { ...deps(fetcher), signal: controller.signal }),
    { name: "AbortError" },
  );
  assert.equal(fetcher.calls, 0);
});

test("a permanent failure is recorded on the first attempt without backoff", async () => {
  const sleeps: number[] = [];
  const fetcher = new ScriptedFetcher([
    {
      kind: "failure",
      failure: { retryable: false, permanent: true, message: "HTTP 404 for https://scores.test/match/abc/" },
    },
  ]);
  const outcome = await driveMatch(makeMatch(), deps(fetcher, sleeps));

  assert.equal(fetcher.calls, 1);
  assert.equal(outcome.phase, "failed");
  assert.equal(outcome.attempts, 1);
  assert.deepEqual(outcome.trace, ["pending", "fetching", "failed"]);
  assert.equal(outcome.result.haStatus, "error");
  assert.equal(outcome.result.error, "not retried: HTTP 404 for https://scores.test/match/abc/");
  assert.deepEqual(sleeps, []);
});
