import { randomUUID } from "node:crypto";
import { readFile, unlink, writeFile } from "node:fs/promises";
import { z } from "zod";
import { errorCode } from "../common/errors.js";

const lockPayloadSchema = z.object({
  pid: z.number().int(),
  ownerId: z.string(),
  shard: z.string().catch(""),
  createdAt: z.string().catch(""),
});

type LockFilePayload = z.infer<typeof lockPayloadSchema>;

export interface AcquireShardLockOptions {
  lockFilePath: string;
  shardId: number;
  totalShards: number;
  isProcessAlive?: (pid: number) => boolean;
}

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export function shardLockPath(shardLogPath: string): string {
  return `${shardLogPath}.lock`;
}

/** One live writer per shard log; a lock left by a dead process is taken over. */
export async function acquireShardLock(options: AcquireShardLockOptions): Promise<LockHandle> {
  const lockPath = options.lockFilePath;
  const shard = `${options.shardId}/${options.totalShards}`;
  const alive = options.isProcessAlive ?? isProcessAlive;
  const ownerId = randomUUID();
  const payload: LockFilePayload = {
    pid: process.pid,
    ownerId,
    shard,
    createdAt: new Date().toISOString(),
  };

  for (let attempt = 0; attempt < 3; attempt += 1) {
    try {
      await writeFile(lockPath, JSON.stringify(payload), {
        encoding: "utf8",
        flag: "wx",
        mode: 0o600,
      });
      return createHandle(lockPath, ownerId);
    } catch (error) {
      if (errorCode(error) !== "EEXIST") {
        throw error;
      }
    }

    const existing = await readLockPayload(lockPath);
    const existingPid = existing?.pid;
    if (typeof existingPid === "number" && alive(existingPid)) {
      throw new Error(
        `Shard ${shard} already running (pid=${existingPid}, lock ${lockPath}). ` +
          `Stop the duplicate process and retry.`,
      );
    }

    try {
      await unlink(lockPath);
    } catch (error) {
      // Another process may have removed the stale lock first.
      if (errorCode(error) !== "ENOENT") {
        throw error;
      }
    }
  }

  throw new Error(`Failed to acquire shard lock: ${lockPath}`);
}

function createHandle(path: string, ownerId: string): LockHandle {
  let released = false;
  return {
    path,
    async release(): Promise<void> {
      if (released) {
        return;
      }
      released = true;
      const existing = await readLockPayload(path);
      if (!existing || existing.ownerId !== ownerId) {
        return;
      }
      try {
        await unlink(path);
      } catch (error) {
        if (errorCode(error) !== "ENOENT") {
          throw error;
        }
      }
    },
  };
}

async function readLockPayload(path: string): Promise<LockFilePayload | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = lockPayloadSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === "EPERM";
  }
}
