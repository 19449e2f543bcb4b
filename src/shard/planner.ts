import { createHash } from "node:crypto";
import { ConfigError } from "../common/errors.js";
import type { MatchRecord } from "../types.js";

export function shardOwner(matchUid: string, totalShards: number): number {
  assertTotalShards(totalShards);
  const digest = createHash("sha256").update(matchUid, "utf8").digest();
  return digest.readUInt32BE(0) % totalShards;
}

/** Keeps input order; ownership depends only on the match_uid. */
export function planShard(
  matches: readonly MatchRecord[],
  shardId: number,
  totalShards: number,
): MatchRecord[] {
  assertTotalShards(totalShards);
  if (!Number.isInteger(shardId) || shardId < 0 || shardId >= totalShards) {
    throw new ConfigError(
      `Shard id must be an integer in [0, ${totalShards - 1}], got ${shardId}.`,
    );
  }
  return matches.filter((match) => shardOwner(match.matchUid, totalShards) === shardId);
}

export function describePlan(matches: readonly MatchRecord[], totalShards: number): number[] {
  assertTotalShards(totalShards);
  const counts = new Array<number>(totalShards).fill(0);
  for (const match of matches) {
    counts[shardOwner(match.matchUid, totalShards)] += 1;
  }
  return counts;
}

export function shardLogPath(outputBase: string, shardId: number, totalShards: number): string {
  return `${outputBase}_shard${shardId}of${totalShards}.csv`;
}

export function combinedPath(outputBase: string): string {
  return `${outputBase}_combined.csv`;
}

function assertTotalShards(totalShards: number): void {
  if (!Number.isInteger(totalShards) || totalShards < 1) {
    throw new ConfigError(`Total shards must be a positive integer, got ${totalShards}.`);
  }
}
