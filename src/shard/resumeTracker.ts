import { open, truncate, type FileHandle } from "node:fs/promises";
import { ConfigError, errorCode } from "../common/errors.js";
import { parseCsv } from "../dataset/csv.js";
import { SHARD_COLUMNS, hasSameColumns } from "../dataset/resultRow.js";
import type { Logger } from "../logger.js";
import { cleanText } from "../normalize.js";
import type { ShardState } from "../types.js";
import { ShardWriter, type AppendFn } from "./writer.js";

export interface OpenShardLogOptions {
  shardId: number;
  totalShards: number;
  resume: boolean;
  logger: Logger;
  appendFn?: AppendFn;
}

export interface OpenedShardLog {
  state: ShardState;
  writer: ShardWriter;
}

/**
 * Reads the whole shard log before a writer exists. Every recorded
 * match_uid is done, errors included. Without resume the done-set starts
 * empty but the log is still appended to, never rewritten.
 */
export async function openShardLog(
  path: string,
  options: OpenShardLogOptions,
): Promise<OpenedShardLog> {
  const { committed, repairedTail } = committedPart(await readLogText(path));

  const table = parseCsv(committed);
  if (table.columns.length > 0 && !hasSameColumns(table.columns)) {
    throw new ConfigError(
      `Shard log ${path} has an unexpected header (${table.columns.length} columns, ` +
        `expected ${SHARD_COLUMNS.length}). Move it aside or pick another --output-base.`,
    );
  }

  if (repairedTail) {
    options.logger.warn(
      `Shard log ${path} ends with an unterminated row; dropping it before appending.`,
    );
    await truncate(path, Buffer.byteLength(committed, "utf8"));
  }

  const done = new Set<string>();
  if (options.resume) {
    for (const row of table.rows) {
      const matchUid = cleanText(row.match_uid);
      if (matchUid) {
        done.add(matchUid);
      }
    }
    options.logger.info(
      `Resuming: ${done.size} already recorded in ${path} (${table.rows.length} rows), skipping them.`,
    );
  } else if (table.rows.length > 0) {
    options.logger.warn(
      `Resume disabled: ${table.rows.length} existing rows in ${path} are kept, new rows are appended.`,
    );
  }

  return {
    state: {
      shardId: options.shardId,
      totalShards: options.totalShards,
      done,
      rowsRead: table.rows.length,
      repairedTail,
    },
    writer: new ShardWriter(path, {
      headerWritten: committed.length > 0,
      appendFn: options.appendFn,
    }),
  };
}

/** Everything up to the last newline; a row after it was never committed. */
export function committedPart(text: string): { committed: string; repairedTail: boolean } {
  const committedLength = text.endsWith("\n") ? text.length : text.lastIndexOf("\n") + 1;
  const committed = text.slice(0, committedLength);
  return { committed, repairedTail: committed.length < text.length };
}

async function readLogText(path: string): Promise<string> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return "";
    }
    throw error;
  }
  try {
    return await handle.readFile({ encoding: "utf8" });
  } finally {
    await handle.close();
  }
}
