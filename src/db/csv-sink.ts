import { mkdir, open } from "fs/promises";
import { dirname } from "path";
import { stringify } from "csv-stringify/sync";
import { SinkWriteError, errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";

const logger = createChildLogger("csv-sink");

/**
 * Append-only CSV file with a header written on first use.
 * Single writer: appends are sequential and never interleave.
 *
 * Without explicit columns, the first record's key order fixes the layout.
 */
export class CsvSink<T extends Record<string, string>> {
  private columns: string[] | null;
  private rowsWritten = 0;

  constructor(
    readonly filePath: string,
    columns?: readonly (keyof T & string)[]
  ) {
    this.columns = columns ? [...columns] : null;
  }

  /**
   * Create the parent directory and check the file can be opened for append
   */
  async ensureWritable(): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const handle = await open(this.filePath, "a");
      await handle.close();
    } catch (error) {
      throw new SinkWriteError(
        `Cannot open ${this.filePath} for append: ${errorMessage(error)}`,
        this.filePath,
        { cause: error }
      );
    }
  }

  /**
   * Append one record. The header and the row go out in a single write,
   * and the handle is synced and closed before this resolves.
   */
  async append(record: T): Promise<void> {
    const columns = this.columns ?? Object.keys(record);

    try {
      const handle = await open(this.filePath, "a");
      try {
        const { size } = await handle.stat();
        const rows: string[][] = [];
        if (size === 0) {
          rows.push(columns);
        }
        rows.push(columns.map((column) => record[column] ?? ""));

        await handle.writeFile(stringify(rows), "utf-8");
        await handle.sync();

        if (size === 0) {
          logger.info({ filePath: this.filePath, columns }, "Wrote CSV header");
        }
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw new SinkWriteError(
        `Failed to append to ${this.filePath}: ${errorMessage(error)}`,
        this.filePath,
        { cause: error }
      );
    }

    this.columns = columns;
    this.rowsWritten++;
  }

  getStats(): { rowsWritten: number; columns: string[] | null } {
    return { rowsWritten: this.rowsWritten, columns: this.columns };
  }
}
