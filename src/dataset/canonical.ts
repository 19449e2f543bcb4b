import { copyFile, readFile, rename, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { ConfigError, errorCode, stringifyError } from "../common/errors.js";
import { formatStamp } from "../common/time.js";
import { cleanText } from "../normalize.js";
import type { CanonicalDataset, MatchRecord } from "../types.js";
import { formatCsv, parseCsv } from "./csv.js";

export const REQUIRED_COLUMNS = [
  "match_uid",
  "match_url",
  "player_home",
  "player_away",
  "player_home_id",
  "player_away_id",
] as const;

export async function readCanonical(path: string): Promise<CanonicalDataset> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new ConfigError(`Input file not found: ${path}`);
    }
    throw error;
  }
  const table = parseCanonical(path, text);
  const missing = REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new ConfigError(`Missing required columns in ${path}: ${missing.join(", ")}`);
  }
  return table;
}

/** Rows are rewritten whole by apply, so a ragged row would lose cells. */
function parseCanonical(path: string, text: string): CanonicalDataset {
  try {
    return parseCsv(text, { strictColumns: true });
  } catch (error) {
    if (errorCode(error) === "CSV_RECORD_INCONSISTENT_FIELDS_LENGTH") {
      throw new ConfigError(`${path}: ${stringifyError(error)}. Fix the row before running.`);
    }
    throw error;
  }
}

export function toMatchRecords(dataset: CanonicalDataset): MatchRecord[] {
  const seen = new Set<string>();
  const records: MatchRecord[] = [];
  for (const row of dataset.rows) {
    const matchUid = cleanText(row.match_uid);
    if (!matchUid || seen.has(matchUid)) {
      continue;
    }
    seen.add(matchUid);
    records.push({
      matchUid,
      url: cleanText(row.match_url) ?? "",
      homeName: cleanText(row.player_home) ?? "",
      homeId: cleanText(row.player_home_id),
      awayName: cleanText(row.player_away) ?? "",
      awayId: cleanText(row.player_away_id),
    });
  }
  return records;
}

/** Writes through a temp file and rename so readers never see half a file. */
export async function writeCsvAtomic(path: string, dataset: CanonicalDataset): Promise<void> {
  const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  await writeFile(tmpPath, formatCsv(dataset), "utf8");
  await rename(tmpPath, path);
}

export function backupPath(path: string, now: Date): string {
  const ext = extname(path);
  const stem = ext ? path.slice(0, -ext.length) : path;
  return `${stem}_backup_${formatStamp(now)}${ext || ".csv"}`;
}

export async function backupCanonical(path: string, now: Date = new Date()): Promise<string> {
  const target = backupPath(path, now);
  await copyFile(path, target);
  return target;
}
