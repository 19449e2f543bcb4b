import { z } from "zod";
import { cleanText } from "../normalize.js";
import type { PageDurations, PageSetScore, ScrapeResult } from "../types.js";

const SET_NUMBERS = [1, 2, 3] as const;

export const SHARD_COLUMNS: readonly string[] = [
  "match_uid",
  "ha_status",
  "ha_method",
  "csv_home_name",
  "csv_home_id",
  "csv_away_name",
  "csv_away_id",
  "page_home_name",
  "page_home_id",
  "page_away_name",
  "page_away_id",
  ...SET_NUMBERS.flatMap((n) => [`page_set${n}_tb_home`, `page_set${n}_tb_away`]),
  ...SET_NUMBERS.flatMap((n) => [`page_set${n}_home`, `page_set${n}_away`]),
  "page_time_overall",
  ...SET_NUMBERS.map((n) => `page_time_set${n}`),
  "page_date_time",
  "page_court_type",
  "error",
];

const rowSchema = z.object({
  match_uid: z.string().trim().min(1),
  ha_status: z.enum(["correct", "swapped", "error"]),
  ha_method: z
    .enum(["id_match", "name_match", ""])
    .transform((value) => (value === "" ? undefined : value)),
});

export function toShardRow(result: ScrapeResult): Record<string, string> {
  const row: Record<string, string> = {
    match_uid: result.matchUid,
    ha_status: result.haStatus,
    ha_method: result.haMethod ?? "",
    csv_home_name: result.csvHomeName,
    csv_home_id: result.csvHomeId ?? "",
    csv_away_name: result.csvAwayName,
    csv_away_id: result.csvAwayId ?? "",
    page_home_name: result.pageHomeName ?? "",
    page_home_id: result.pageHomeId ?? "",
    page_away_name: result.pageAwayName ?? "",
    page_away_id: result.pageAwayId ?? "",
    page_time_overall: result.durations.overall ?? "",
    page_date_time: result.dateTime ?? "",
    page_court_type: result.courtType ?? "",
    error: result.error ?? "",
  };
  SET_NUMBERS.forEach((n, index) => {
    const set = result.sets[index];
    row[`page_set${n}_tb_home`] = set.tiebreakHome ?? "";
    row[`page_set${n}_tb_away`] = set.tiebreakAway ?? "";
    row[`page_set${n}_home`] = set.home ?? "";
    row[`page_set${n}_away`] = set.away ?? "";
    row[`page_time_set${n}`] = result.durations.sets[index] ?? "";
  });
  return row;
}

export type ParsedShardRow =
  | { ok: true; result: ScrapeResult }
  | { ok: false; reason: string };

export function fromShardRow(row: Record<string, string>): ParsedShardRow {
  const head = rowSchema.safeParse({
    match_uid: row.match_uid ?? "",
    ha_status: (row.ha_status ?? "").trim(),
    ha_method: (row.ha_method ?? "").trim(),
  });
  if (!head.success) {
    const issue = head.error.issues[0];
    return { ok: false, reason: `${issue.path.join(".") || "row"}: ${issue.message}` };
  }

  const sets = SET_NUMBERS.map(
    (n): PageSetScore => ({
      home: cleanText(row[`page_set${n}_home`]),
      away: cleanText(row[`page_set${n}_away`]),
      tiebreakHome: cleanText(row[`page_set${n}_tb_home`]),
      tiebreakAway: cleanText(row[`page_set${n}_tb_away`]),
    }),
  );
  const durations: PageDurations = {
    overall: cleanText(row.page_time_overall),
    sets: [
      cleanText(row.page_time_set1),
      cleanText(row.page_time_set2),
      cleanText(row.page_time_set3),
    ],
  };

  return {
    ok: true,
    result: {
      matchUid: head.data.match_uid,
      haStatus: head.data.ha_status,
      haMethod: head.data.ha_method,
      csvHomeName: row.csv_home_name ?? "",
      csvHomeId: cleanText(row.csv_home_id),
      csvAwayName: row.csv_away_name ?? "",
      csvAwayId: cleanText(row.csv_away_id),
      pageHomeName: cleanText(row.page_home_name),
      pageHomeId: cleanText(row.page_home_id),
      pageAwayName: cleanText(row.page_away_name),
      pageAwayId: cleanText(row.page_away_id),
      sets: [sets[0], sets[1], sets[2]],
      durations,
      dateTime: cleanText(row.page_date_time),
      courtType: cleanText(row.page_court_type),
      error: cleanText(row.error),
    },
  };
}

export function hasSameColumns(columns: readonly string[]): boolean {
  return (
    columns.length === SHARD_COLUMNS.length &&
    columns.every((column, index) => column === SHARD_COLUMNS[index])
  );
}
