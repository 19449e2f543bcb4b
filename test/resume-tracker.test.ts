import test from "node:test";
import assert from "node:assert/strict";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "../src/common/errors.js";
import { formatCsvHeader, formatCsvRows } from "../src/dataset/csv.js";
import { SHARD_COLUMNS, toShardRow } from "../src/dataset/resultRow.js";
import { silentLogger } from "../src/logger.js";
import { committedPart, openShardLog } from "../src/shard/resumeTracker.js";
import { captureLogger, errorResult, makeResult, withTempDir } from "./helpers.js";

function logText(...uids: string[]): string {
  const rows = uids.map((uid) =>
    toShardRow(uid.startsWith("err") ? errorResult(uid) : makeResult({ matchUid: uid })),
  );
  return formatCsvHeader(SHARD_COLUMNS) + formatCsvRows(SHARD_COLUMNS, rows);
}

test("a missing log starts an empty done-set and a fresh header", async () => {
  await withTempDir("resume-new", async (dir) => {
    const path = join(dir, "out_shard0of2.csv");
    const { state, writer } = await openShardLog(path, {
      shardId: 0,
      totalShards: 2,
      resume: true,
      logger: silentLogger(),
    });
    assert.equal(state.done.size, 0);
    assert.equal(state.rowsRead, 0);
    await writer.append(makeResult({ matchUid: "m-9" }));
    const text = await readFile(path, "utf8");
    assert.equal(text, logText("m-9"));
  });
});

test("resume marks every recorded match done, error rows included", async () => {
  await withTempDir("resume-done", async (dir) => {
    const path = join(dir, "out_shard0of1.csv");
    await writeFile(path, logText("m-1", "err-2", "m-3"), "utf8");
    const { state } = await openShardLog(path, {
      shardId: 0,
      totalShards: 1,
      resume: true,
      logger: silentLogger(),
    });
    assert.deepEqual([...state.done], ["m-1", "err-2", "m-3"]);
    assert.equal(state.rowsRead, 3);
    assert.equal(state.repairedTail, false);
  });
});

test("without resume prior rows are kept and new rows appended", async () => {
  await withTempDir("resume-off", async (dir) => {
    const path = join(dir, "out_shard0of1.csv");
    await writeFile(path, logText("m-1"), "utf8");
    const { logger, lines } = captureLogger();
    const { state, writer } = await openShardLog(path, {
      shardId: 0,
      totalShards: 1,
      resume: false,
      logger,
    });
    assert.equal(state.done.size, 0);
    assert.ok(lines.some((line) => line.includes("[WARN] Resume disabled: 1 existing rows")));

    await writer.append(makeResult({ matchUid: "m-1" }));
    assert.equal(await readFile(path, "utf8"), logText("m-1", "m-1"));
  });
});

test("an unterminated last row is dropped from the log", async () => {
  await withTempDir("resume-tail", async (dir) => {
    const path = join(dir, "out_shard0of1.csv");
    const complete = logText("m-1", "m-2");
    await writeFile(path, `${complete}m-3,corr`, "utf8");
    const { state } = await openShardLog(path, {
      shardId: 0,
      totalShards: 1,
      resume: true,
      logger: silentLogger(),
    });
    assert.equal(state.repairedTail, true);
    assert.deepEqual([...state.done], ["m-1", "m-2"]);
    assert.equal(await readFile(path, "utf8"), complete);
  });
});

test("a log with another header is refused", async () => {
  await withTempDir("resume-header", async (dir) => {
    const path = join(dir, "out_shard0of1.csv");
    await writeFile(path, "match_uid,status\nm-1,ok\n", "utf8");
    await assert.rejects(
      () =>
        openShardLog(path, { shardId: 0, totalShards: 1, resume: true, logger: silentLogger() }),
      ConfigError,
    );
  });
});

test("committedPart keeps everything up to the last newline", () => {
  assert.deepEqual(committedPart(""), { committed: "", repairedTail: false });
  assert.deepEqual(committedPart("a\nb\n"), { committed: "a\nb\n", repairedTail: false });
  assert.deepEqual(committedPart("a\nb"), { committed: "a\n", repairedTail: true });
  assert.deepEqual(committedPart("abc"), { committed: "", repairedTail: true });
});
