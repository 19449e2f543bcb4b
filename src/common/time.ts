import { setTimeout as delay } from "node:timers/promises";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    throwIfAborted(signal);
    return;
  }
  await delay(ms, undefined, { signal });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (!signal?.aborted) {
    return;
  }
  const error = new Error("Run aborted");
  error.name = "AbortError";
  throw error;
}

export function toSeconds(ms: number): number {
  if (!Number.isFinite(ms)) {
    return 0;
  }
  return Math.max(0, ms / 1000);
}

/** `YYYYMMDD_HHMMSS` in local time, used for backup file names. */
export function formatStamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
