import { appendFile } from "node:fs/promises";
import { FatalShardError, isLocalResourceError, stringifyError } from "../common/errors.js";
import { formatCsvHeader, formatCsvRows } from "../dataset/csv.js";
import { SHARD_COLUMNS, toShardRow } from "../dataset/resultRow.js";
import type { ScrapeResult } from "../types.js";

export type AppendFn = (path: string, text: string) => Promise<void>;

export interface ShardWriterOptions {
  headerWritten: boolean;
  appendFn?: AppendFn;
}

export class ShardWriter {
  private headerWritten: boolean;
  private readonly appendFn: AppendFn;
  private written = 0;

  constructor(
    readonly path: string,
    options: ShardWriterOptions,
  ) {
    this.headerWritten = options.headerWritten;
    this.appendFn = options.appendFn ?? ((target, text) => appendFile(target, text, "utf8"));
  }

  get rowsWritten(): number {
    return this.written;
  }

  /** One append call per row, so a crash never leaves two rows half-written. */
  async append(result: ScrapeResult): Promise<void> {
    const header = this.headerWritten ? "" : formatCsvHeader(SHARD_COLUMNS);
    const text = header + formatCsvRows(SHARD_COLUMNS, [toShardRow(result)]);
    try {
      await this.appendFn(this.path, text);
    } catch (error) {
      if (isLocalResourceError(error)) {
        throw new FatalShardError(
          `Cannot append to ${this.path}: ${stringifyError(error)}`,
          { cause: error },
        );
      }
      throw error;
    }
    this.headerWritten = true;
    this.written += 1;
  }
}
