import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger } from "../src/logger.js";
import type { MatchRecord, PageModel, ScrapeResult } from "../src/types.js";

export function makeMatch(overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    matchUid: "m-1",
    url: "https://scores.test/match/abc/",
    homeName: "Anna Alpha",
    homeId: "A1",
    awayName: "Bella Beta",
    awayId: "B2",
    ...overrides,
  };
}

export function makePage(overrides: Partial<PageModel> = {}): PageModel {
  return {
    home: { name: "Anna Alpha", id: "A1" },
    away: { name: "Bella Beta", id: "B2" },
    sets: [{ home: "7", away: "6", tiebreakHome: "7", tiebreakAway: "4" }, { home: "6", away: "3" }, {}],
    durations: { overall: "1:42", sets: ["0:58", "0:44", undefined] },
    dateTime: "12.03.2024 14:30",
    courtType: "HARD",
    ...overrides,
  };
}

export function makeResult(overrides: Partial<ScrapeResult> = {}): ScrapeResult {
  return {
    matchUid: "m-1",
    haStatus: "correct",
    haMethod: "id_match",
    csvHomeName: "Anna Alpha",
    csvHomeId: "A1",
    csvAwayName: "Bella Beta",
    csvAwayId: "B2",
    pageHomeName: "Anna Alpha",
    pageHomeId: "A1",
    pageAwayName: "Bella Beta",
    pageAwayId: "B2",
    sets: [{}, {}, {}],
    durations: { sets: [undefined, undefined, undefined] },
    ...overrides,
  };
}

export function errorResult(matchUid: string, error = "retries exhausted after 3 attempts: HTTP 503"): ScrapeResult {
  return makeResult({
    matchUid,
    haStatus: "error",
    haMethod: undefined,
    pageHomeName: undefined,
    pageHomeId: undefined,
    pageAwayName: undefined,
    pageAwayId: undefined,
    error,
  });
}

export function captureLogger(debugEnabled = true): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ debugEnabled, write: (line) => lines.push(line) });
  return { logger, lines };
}

export async function withTempDir(prefix: string, fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), `ha-audit-${prefix}-`));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export const noSleep = async (): Promise<void> => undefined;
