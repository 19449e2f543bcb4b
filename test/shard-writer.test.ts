import test from "node:test";
import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { FatalShardError } from "../src/common/errors.js";
import { parseCsv } from "../src/dataset/csv.js";
import { SHARD_COLUMNS, fromShardRow, toShardRow } from "../src/dataset/resultRow.js";
import { ShardWriter } from "../src/shard/writer.js";
import { errorResult, makeResult, withTempDir } from "./helpers.js";

test("ShardWriter writes the header once, then one row per append", async () => {
  await withTempDir("writer", async (dir) => {
    const path = join(dir, "out_shard0of1.csv");
    const writer = new ShardWriter(path, { headerWritten: false });
    await writer.append(makeResult({ matchUid: "m-1" }));
    await writer.append(errorResult("m-2"));

    const table = parseCsv(await readFile(path, "utf8"));
    assert.deepEqual(table.columns, [...SHARD_COLUMNS]);
    assert.deepEqual(
      table.rows.map((row) => [row.match_uid, row.ha_status]),
      [
        ["m-1", "correct"],
        ["m-2", "error"],
      ],
    );
    assert.equal(writer.rowsWritten, 2);
  });
});

test("ShardWriter issues a single append per row", async () => {
  const calls: string[] = [];
  const writer = new ShardWriter("unused.csv", {
    headerWritten: true,
    appendFn: async (_path, text) => {
      calls.push(text);
    },
  });
  await writer.append(makeResult());
  assert.equal(calls.length, 1);
  assert.ok(calls[0].startsWith("m-1,correct,id_match,"));
  assert.ok(calls[0].endsWith("\n"));
});

test("storage exhaustion while appending is fatal", async () => {
  const writer = new ShardWriter("unused.csv", {
    headerWritten: true,
    appendFn: async () => {
      throw Object.assign(new Error("no space left on device"), { code: "ENOSPC" });
    },
  });
  await assert.rejects(() => writer.append(makeResult()), FatalShardError);
  assert.equal(writer.rowsWritten, 0);
});

test("result rows keep names with commas and quotes", () => {
  const row = toShardRow(
    makeResult({
      csvHomeName: 'Smith, "Jr" Anna',
      sets: [{ home: "7", away: "6", tiebreakHome: "7", tiebreakAway: "5" }, {}, {}],
      durations: { overall: "2:05", sets: ["1:01", undefined, undefined] },
      courtType: "Clay (indoor)",
    }),
  );
  const parsed = fromShardRow(row);
  assert.equal(parsed.ok, true);
  if (!parsed.ok) {
    return;
  }
  assert.equal(parsed.result.csvHomeName, 'Smith, "Jr" Anna');
  assert.deepEqual(parsed.result.sets[0], { home: "7", away: "6", tiebreakHome: "7", tiebreakAway: "5" });
  assert.equal(parsed.result.durations.overall, "2:05");
  assert.equal(parsed.result.durations.sets[0], "1:01");
  assert.equal(parsed.result.durations.sets[1], undefined);
  assert.equal(parsed.result.courtType, "Clay (indoor)");
});

test("fromShardRow rejects an unknown status", () => {
  const row = { ...toShardRow(makeResult()), ha_status: "maybe" };
  const parsed = fromShardRow(row);
  assert.equal(parsed.ok, false);
});
