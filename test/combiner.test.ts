import test from "node:test";
import assert from "node:assert/strict";
import { appendFile, readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "../src/common/errors.js";
import { parseCsv } from "../src/dataset/csv.js";
import { silentLogger } from "../src/logger.js";
import {
  combineShardResults,
  findMissingShards,
  runCombine,
  type ShardLogInput,
} from "../src/merge/combiner.js";
import { shardLogPath } from "../src/shard/planner.js";
import { ShardWriter } from "../src/shard/writer.js";
import type { ScrapeResult } from "../src/types.js";
import { captureLogger, errorResult, makeResult, withTempDir } from "./helpers.js";

function log(shardId: number, totalShards: number, results: ScrapeResult[]): ShardLogInput {
  return { path: `shard${shardId}`, shardId, totalShards, results, malformedRows: 0 };
}

test("a non-error row beats an error row from any shard", () => {
  const { combined, duplicatesResolved } = combineShardResults([
    log(0, 2, [errorResult("m-1")]),
    log(1, 2, [makeResult({ matchUid: "m-1", haStatus: "swapped" })]),
  ]);
  assert.equal(combined.get("m-1")?.haStatus, "swapped");
  assert.equal(duplicatesResolved, 1);
});

test("among equals the lowest shard wins", () => {
  const { combined } = combineShardResults([
    log(3, 4, [errorResult("m-1", "from shard 3")]),
    log(1, 4, [errorResult("m-1", "from shard 1")]),
    log(2, 4, [makeResult({ matchUid: "m-2", haMethod: "name_match" })]),
    log(0, 4, [makeResult({ matchUid: "m-2", haMethod: "id_match" })]),
  ]);
  assert.equal(combined.get("m-1")?.error, "from shard 1");
  assert.equal(combined.get("m-2")?.haMethod, "id_match");
});

test("within one log the latest row wins", () => {
  const { combined } = combineShardResults([
    log(0, 1, [
      errorResult("m-1", "first"),
      errorResult("m-1", "second"),
      makeResult({ matchUid: "m-2", haStatus: "correct" }),
      makeResult({ matchUid: "m-2", haStatus: "swapped" }),
    ]),
  ]);
  assert.equal(combined.get("m-1")?.error, "second");
  assert.equal(combined.get("m-2")?.haStatus, "swapped");
});

test("runCombine merges logs on disk and tolerates missing shards", async () => {
  await withTempDir("combine", async (dir) => {
    const base = join(dir, "ha_check");
    const shard0 = new ShardWriter(shardLogPath(base, 0, 3), { headerWritten: false });
    await shard0.append(makeResult({ matchUid: "m-1", courtType: "HARD" }));
    await shard0.append(errorResult("m-2"));
    const shard1 = new ShardWriter(shardLogPath(base, 1, 3), { headerWritten: false });
    await shard1.append(makeResult({ matchUid: "m-3", haStatus: "swapped", courtType: "HARD" }));
    await appendFile(shardLogPath(base, 1, 3), "m-4,unknown" + ",".repeat(30) + "\n", "utf8");

    const summary = await runCombine(
      { mode: "combine", input: "unused.csv", outputBase: base, debug: false, totalShards: 3 },
      silentLogger(),
    );

    assert.equal(summary.files, 2);
    assert.deepEqual(summary.missingShards, [2]);
    assert.equal(summary.rowsRead, 3);
    assert.equal(summary.malformedRows, 1);
    assert.equal(summary.unique, 3);
    assert.equal(summary.correct, 1);
    assert.equal(summary.swapped, 1);
    assert.equal(summary.errors, 1);
    assert.deepEqual(summary.surfaceDistribution, { HARD: 2 });

    const table = parseCsv(await readFile(join(dir, "ha_check_combined.csv"), "utf8"));
    assert.deepEqual(
      table.rows.map((row) => row.match_uid),
      ["m-1", "m-2", "m-3"],
    );
  });
});

test("runCombine without shard logs is a configuration error", async () => {
  await withTempDir("combine-empty", async (dir) => {
    await assert.rejects(
      () =>
        runCombine(
          { mode: "combine", input: "unused.csv", outputBase: join(dir, "ha_check"), debug: false },
          silentLogger(),
        ),
      ConfigError,
    );
  });
});

test("runCombine warns about shards missing from the partition named by the logs", async () => {
  await withTempDir("combine-partition", async (dir) => {
    const base = join(dir, "ha_check");
    await new ShardWriter(shardLogPath(base, 0, 3), { headerWritten: false }).append(
      makeResult({ matchUid: "m-1" }),
    );
    await new ShardWriter(shardLogPath(base, 1, 3), { headerWritten: false }).append(
      makeResult({ matchUid: "m-2" }),
    );
    const { logger, lines } = captureLogger(false);

    const summary = await runCombine(
      { mode: "combine", input: "unused.csv", outputBase: base, debug: false },
      logger,
    );

    assert.deepEqual(summary.missingShards, [2]);
    assert.deepEqual(
      lines.filter((line) => line.includes("[WARN]")).map((line) => line.replace(/^\[[^\]]+\] /, "")),
      ["[WARN] Shard 2/3 has no log yet; combining without it.\n"],
    );
  });
});

test("findMissingShards checks every partition present on disk", () => {
  assert.deepEqual(findMissingShards([log(0, 2, []), log(1, 4, []), log(3, 4, [])]), [
    { shardId: 1, totalShards: 2 },
    { shardId: 0, totalShards: 4 },
    { shardId: 2, totalShards: 4 },
  ]);
  assert.deepEqual(findMissingShards([log(0, 2, []), log(1, 2, [])], 3), [{ shardId: 2, totalShards: 3 }]);
});
